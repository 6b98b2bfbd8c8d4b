/**
 * Request Schemas — SWIFT Code Endpoints
 * Layer: Interfaces (HTTP)
 *
 * Zod schemas for path params and the create body, consumed by the
 * `validate()` middleware. Format rules come from the domain's describe*
 * helpers so the API and the loader reject exactly the same values with the
 * same messages; each field reports only its first broken rule.
 */
import {
  describeCountryNameProblem,
  describeIso2Problem,
  describeSwiftCodeProblem,
} from '@domain/rules/swiftCodeRules';
import { z } from 'zod/v4';

function ruleChecked(field: string, describeProblem: (value: string) => string | null) {
  return z.string({ error: `${field} is required.` }).superRefine((value, ctx) => {
    const problem = describeProblem(value);
    if (problem) ctx.addIssue({ code: 'custom', message: problem });
  });
}

export const swiftCodeSchema = ruleChecked('swiftCode', describeSwiftCodeProblem);
export const iso2Schema = ruleChecked('countryISO2', describeIso2Problem);
export const countryNameSchema = ruleChecked('countryName', describeCountryNameProblem);

export const swiftCodeParamsSchema = z.object({ swiftCode: swiftCodeSchema });

export const countryParamsSchema = z.object({ countryISO2: iso2Schema });

export const createSwiftCodeBodySchema = z.object({
  address: z.string({ error: 'address must be a string.' }).default(''),
  bankName: z
    .string({ error: 'bankName is required.' })
    .trim()
    .min(1, { error: 'bankName is required.' }),
  countryISO2: iso2Schema,
  countryName: countryNameSchema,
  isHeadquarters: z.boolean({ error: 'isHeadquarters must be true or false.' }),
  swiftCode: swiftCodeSchema,
});

export type CreateSwiftCodeBody = z.infer<typeof createSwiftCodeBodySchema>;
