import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseDecimal, tryParseDecimal } from '../utils/decimal-utils.js';

// Decimal schema - accepts string, number, or Decimal instance, transforms to Decimal
// Used for parsing from DB (strings), JSON input (numbers) or validating in-memory objects
export const DecimalSchema = z
  .union([z.string().min(1), z.number().finite(), z.instanceof(Decimal)])
  .refine((val) => val instanceof Decimal || tryParseDecimal(val), { message: 'Must be a valid decimal number' })
  .transform((val) => (val instanceof Decimal ? val : parseDecimal(val)));

// Date schema - accepts Unix timestamp (number), ISO 8601 string, or Date instance, transforms to Date
export const DateSchema = z
  .union([
    z.number().int().positive(),
    z.string().refine((val) => !isNaN(Date.parse(val)), { message: 'Invalid date string' }),
    z.date(),
  ])
  .transform((val) => {
    if (typeof val === 'number' || typeof val === 'string') {
      return new Date(val);
    }
    return val;
  });
