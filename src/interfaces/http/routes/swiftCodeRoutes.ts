/**
 * SWIFT Code Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/v1/swift-codes` in app.ts:
 *
 *   GET    /v1/swift-codes/country/PL     →  controller.getByCountry
 *   GET    /v1/swift-codes/AAAABBCCXXX    →  controller.getByCode
 *   POST   /v1/swift-codes                →  controller.create
 *   DELETE /v1/swift-codes/AAAABBCCXXX    →  controller.delete
 *
 * The country route is declared first so "country" is never read as a code.
 */
import { SwiftCodeController } from '@interfaces/http/controllers/SwiftCodeController';
import { validate } from '@interfaces/http/middleware/validation';
import {
  countryParamsSchema,
  createSwiftCodeBodySchema,
  swiftCodeParamsSchema,
} from '@interfaces/http/schemas/swiftCodeSchemas';
import { Router } from 'express';

export function createSwiftCodeRoutes(): Router {
  const router = Router();
  const controller = new SwiftCodeController();

  router.get('/country/:countryISO2', validate(countryParamsSchema, 'params'), controller.getByCountry);
  router.get('/:swiftCode', validate(swiftCodeParamsSchema, 'params'), controller.getByCode);
  router.post('/', validate(createSwiftCodeBodySchema, 'body'), controller.create);
  router.delete('/:swiftCode', validate(swiftCodeParamsSchema, 'params'), controller.delete);

  return router;
}
