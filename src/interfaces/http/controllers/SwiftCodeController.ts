/**
 * SWIFT Code Controller — HTTP Boundary
 * Layer: Interfaces (HTTP)
 *
 * Kept thin: read path params or the validated body, call SwiftCodeService,
 * send the `{ status, data, meta }` envelope. Rules and data access stay in
 * the service. Handlers are arrow functions so `this` stays bound when
 * Express calls them.
 */
import '@shared/express';

import { SwiftCodeService } from '@application/services/SwiftCodeService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { ValidationError } from '@shared/errors/AppError';
import type { CreateSwiftCodeInput, ResponseMeta } from '@shared/types';
import type { Request, Response } from 'express';

export class SwiftCodeController {
  private service: SwiftCodeService;

  constructor() {
    this.service = container.resolve<SwiftCodeService>(TOKENS.SwiftCodeService);
  }

  getByCode = async (req: Request, res: Response): Promise<void> => {
    const details = await this.service.getByCode(pathParam(req, 'swiftCode'));
    res.status(200).json({ status: 'success', data: details, meta: buildMeta(req) });
  };

  getByCountry = async (req: Request, res: Response): Promise<void> => {
    const country = await this.service.getByCountry(pathParam(req, 'countryISO2'));
    res.status(200).json({ status: 'success', data: country, meta: buildMeta(req) });
  };

  create = async (req: Request, res: Response): Promise<void> => {
    // validate(createSwiftCodeBodySchema, 'body') has already replaced the body
    const input: CreateSwiftCodeInput = req.body;
    const created = await this.service.create(input);

    res.status(201).json({
      status: 'success',
      message: `SWIFT code created: ${created.swiftCode}`,
      data: created,
      meta: buildMeta(req),
    });
  };

  delete = async (req: Request, res: Response): Promise<void> => {
    const swiftCode = await this.service.delete(pathParam(req, 'swiftCode'));

    res.status(200).json({
      status: 'success',
      message: `SWIFT code deleted: ${swiftCode}`,
      meta: buildMeta(req),
    });
  };
}

function pathParam(req: Request, name: string): string {
  const value: unknown = req.params[name];
  if (typeof value !== 'string') {
    throw new ValidationError(`Missing path parameter: ${name}`);
  }
  return value;
}

function buildMeta(req: Request): ResponseMeta {
  return req.requestStartTime != null
    ? { totalTimeMs: Math.round(Date.now() - req.requestStartTime) }
    : {};
}
