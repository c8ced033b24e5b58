// src/models/fields.ts
// Permissive zod field parsers shared by the response schemas.
import { z } from 'zod';

/** Identifier that may arrive as a string or number; missing becomes "". */
export const idField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

/** Identifier that stays absent when the server omits it or sends an empty value. */
export const optionalIdField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === '' ? undefined : String(value)));

export const stringField = (fallback: string = '') =>
  z.string().nullish().transform((value) => value ?? fallback);

export const numberField = (fallback: number = 0) =>
  z.number().nullish().transform((value) => value ?? fallback);

export const optionalString = z.string().nullish().transform((value) => value ?? undefined);

export const optionalInt = z.number().int().nullish().transform((value) => value ?? undefined);

/** ISO timestamp; missing or unparsable values stay absent. */
export const timestampField = z
  .string()
  .nullish()
  .transform((value) => {
    if (!value) return undefined;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  });
