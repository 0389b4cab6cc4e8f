import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CURRENCY_SYMBOL, DEFAULT_DB_FILE, DEFAULT_HISTORY_LIMIT, EXPENSE_CATEGORIES } from './constants';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  DB_PATH: z.string().default(DEFAULT_DB_FILE),
  DB_BUSY_TIMEOUT_MS: z.string().default('5000').transform(Number).pipe(z.number().int().nonnegative()),
  EXPENSE_CATEGORIES: z
    .string()
    .optional()
    .transform((val) => (val ? parseCategoryList(val) : EXPENSE_CATEGORIES.map((c) => c.name)))
    .pipe(z.array(z.string()).min(1, 'At least one expense category is required')),
  CURRENCY_SYMBOL: z.string().default(DEFAULT_CURRENCY_SYMBOL),
  HISTORY_LIMIT: z.string().default(String(DEFAULT_HISTORY_LIMIT)).transform(Number).pipe(z.number().int().positive()),
  HEALTH_PORT: z.string().default('5000').transform(Number).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Split a comma-separated category list, keeping order and dropping blanks and repeats
 */
function parseCategoryList(raw: string): string[] {
  const labels: string[] = [];
  for (const part of raw.split(',')) {
    const label = part.trim();
    if (label && !labels.some((l) => l.toLowerCase() === label.toLowerCase())) {
      labels.push(label);
    }
  }
  return labels;
}

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
