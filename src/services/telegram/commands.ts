import { AmountSchema, DescriptionSchema, IsoDateSchema, TransactionIdSchema, createCategorySchema, isCalendarDate, toIsoDate, validateInput } from '../validation/schemas';
import type { IsoDate } from '../../types/transaction';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface AddCommand {
  amount: number;
  category: string;
  description: string;
  date: IsoDate;
}

export const ADD_USAGE = 'Usage: /add <amount> <category> <description> [YYYY-MM-DD]\nExample: /add 25000 Food Lunch';
export const DELETE_USAGE = 'Usage: /delete <id>';
export const SUMMARY_USAGE = 'Usage: /summary, /summary today or /summary YYYY-MM-DD';

/**
 * Split the text after a command into words, e.g. " 5  Food x" -> ["5", "Food", "x"]
 */
export function splitArgs(match: string): string[] {
  const trimmed = match.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function parseAddCommand(args: string[], categories: readonly string[], today: Date = new Date()): ParseResult<AddCommand> {
  if (args.length < 3) {
    return { ok: false, error: ADD_USAGE };
  }

  const [rawAmount, rawCategory, ...rest] = args;

  const amount = validateInput(AmountSchema, rawAmount);
  if (!amount.valid) return { ok: false, error: amount.error };

  const category = validateInput(createCategorySchema(categories), rawCategory);
  if (!category.valid) return { ok: false, error: category.error };

  let date = toIsoDate(today);
  const last = rest[rest.length - 1];
  if (rest.length > 1 && last !== undefined && /^\d{4}-\d{2}-\d{2}$/.test(last)) {
    if (!isCalendarDate(last)) {
      return { ok: false, error: 'Invalid date format (YYYY-MM-DD)' };
    }
    date = last;
    rest.pop();
  }

  const description = validateInput(DescriptionSchema, rest.join(' '));
  if (!description.valid) return { ok: false, error: description.error };

  return {
    ok: true,
    value: {
      amount: amount.data,
      category: category.data,
      description: description.data,
      date,
    },
  };
}

export function parseDeleteCommand(args: string[]): ParseResult<number> {
  if (args.length !== 1) {
    return { ok: false, error: DELETE_USAGE };
  }

  const id = validateInput(TransactionIdSchema, args[0]);
  return id.valid ? { ok: true, value: id.data } : { ok: false, error: id.error };
}

/**
 * No argument -> all time (undefined); "today" -> today's date; otherwise a YYYY-MM-DD date
 */
export function parseSummaryCommand(args: string[], today: Date = new Date()): ParseResult<IsoDate | undefined> {
  if (args.length === 0) {
    return { ok: true, value: undefined };
  }
  if (args.length > 1) {
    return { ok: false, error: SUMMARY_USAGE };
  }

  const [arg] = args;
  if (arg.toLowerCase() === 'today') {
    return { ok: true, value: toIsoDate(today) };
  }

  const date = validateInput(IsoDateSchema, arg);
  return date.valid ? { ok: true, value: date.data } : { ok: false, error: date.error };
}
