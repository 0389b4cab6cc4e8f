import { z } from 'zod';
import { MAX_AMOUNT } from '../../config/constants';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when `value` is `YYYY-MM-DD` and names a real calendar day
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Local calendar day of a Date, as `YYYY-MM-DD`
 */
export function toIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Amount typed by a user: "25000", "25.000", "25,000" or "12.50"
 */
export const AmountSchema = z
  .string()
  .trim()
  .regex(/^(?:\d{1,3}(?:[.,]\d{3})+|\d+)(?:[.,]\d{1,2})?$/, 'Must be a valid amount (e.g., 25000 or 12.50)')
  .transform((val) => parseAmount(val))
  .refine((val) => val > 0, 'Amount must be greater than 0')
  .refine((val) => val <= MAX_AMOUNT, 'Amount too large');

export const DescriptionSchema = z
  .string()
  .trim()
  .min(1, 'Description is required')
  .max(200, 'Description too long (max 200 characters)');

export const IsoDateSchema = z
  .string()
  .trim()
  .refine(isCalendarDate, 'Invalid date format (YYYY-MM-DD)');

export const TransactionIdSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Transaction ID must be a whole number')
  .transform(Number)
  .refine((val) => Number.isSafeInteger(val) && val > 0, 'Transaction ID must be greater than 0');

/**
 * Category label matched case-insensitively against the configured list.
 * Yields the label as configured.
 */
export function createCategorySchema(categories: readonly string[]) {
  return z
    .string()
    .trim()
    .min(1, 'Category is required')
    .transform((val, ctx) => {
      const label = categories.find((c) => c.toLowerCase() === val.toLowerCase());
      if (!label) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown category. Available: ${categories.join(', ')}`,
        });
        return z.NEVER;
      }
      return label;
    });
}

/**
 * Shape the ledger accepts before writing a row
 */
export const TransactionInputSchema = z.object({
  description: DescriptionSchema,
  amount: z.number().finite().positive('Amount must be greater than 0').max(MAX_AMOUNT, 'Amount too large'),
  category: z.string().trim().min(1, 'Category is required'),
  date: z.union([
    z.date().transform(toIsoDate),
    IsoDateSchema,
  ]),
});

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Invalid input' };
}

function parseAmount(raw: string): number {
  // A trailing separator followed by one or two digits is the decimal part
  const decimal = /[.,](\d{1,2})$/.exec(raw);
  const integerPart = decimal ? raw.slice(0, decimal.index) : raw;
  const whole = Number(integerPart.replace(/[.,]/g, ''));
  return decimal ? whole + Number(`0.${decimal[1]}`) : whole;
}
