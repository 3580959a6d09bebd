// Input validation for pipeline invocations

import { z } from 'zod';
import { createValidationError } from '../shared/errors.js';

export const clientIdSchema = z
  .string()
  .trim()
  .min(1, 'client id is required')
  .max(64, 'client id is longer than 64 characters')
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'client id may only contain letters, digits, "-" and "_"');

// "Phoenix", "Phoenix AZ", "St. Louis, MO", "Coeur d'Alene", "Coeur d’Alene"
export const citySchema = z
  .string()
  .trim()
  .min(2, 'city is too short')
  .max(80, 'city is longer than 80 characters')
  .regex(/^\p{L}[\p{L}\p{M} .,'’-]*$/u, 'city may only contain letters, spaces and . , \' ’ -');

export const researchRecordIdSchema = z.string().trim().uuid('research record id must be a UUID');

const parseWith = <T>(schema: z.ZodType<T>, label: string, value: unknown): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw createValidationError(`Invalid ${label} ${JSON.stringify(value)}: ${reason}`);
  }
  return result.data;
};

export const validateClientId = (value: unknown): string => parseWith(clientIdSchema, 'client id', value);

export const validateCity = (value: unknown): string => parseWith(citySchema, 'city', value);

export const validateResearchRecordId = (value: unknown): string =>
  parseWith(researchRecordIdSchema, 'research record id', value);
