import { EXPENSE_CATEGORIES } from '../../config/constants';
import { AmountSchema, DescriptionSchema, validateInput } from '../validation/schemas';

export interface ParsedExpense {
  amount: number;
  description: string;
  category: string;
}

/**
 * Parse "<amount> <description>", e.g. "25000 lunch" or "12.50 bus ticket".
 * The category is guessed from the description.
 */
export function parseQuickEntry(text: string, categories: readonly string[]): ParsedExpense | null {
  const match = /^\s*(\S+)\s+(.+?)\s*$/.exec(text);
  if (!match) return null;

  const amount = validateInput(AmountSchema, match[1]);
  if (!amount.valid) return null;

  const description = validateInput(DescriptionSchema, match[2]);
  if (!description.valid) return null;

  return {
    amount: amount.data,
    description: description.data,
    category: guessCategory(description.data, categories),
  };
}

/**
 * First configured category whose keywords appear in the description.
 * Falls back to the last configured category.
 */
export function guessCategory(description: string, categories: readonly string[]): string {
  const words = description.toLowerCase().split(/[^\p{L}\p{N}]+/u);

  for (const label of categories) {
    const known = EXPENSE_CATEGORIES.find((c) => c.name.toLowerCase() === label.toLowerCase());
    const keywords = [label.toLowerCase(), ...(known?.keywords ?? [])];
    if (keywords.some((keyword) => words.includes(keyword))) {
      return label;
    }
  }

  return categories[categories.length - 1] ?? 'Other';
}
