import type { ExpenseLedger } from '../ledger';
import { parseQuickEntry } from '../expense/quick-entry';
import { formatAmount, formatDisplayDate, formatHistory, messages } from '../feedback/messages';
import { buildSummary, generateSummaryText } from '../summary';
import { toIsoDate } from '../validation/schemas';
import { parseAddCommand, parseDeleteCommand, parseSummaryCommand, splitArgs } from './commands';
import type { NewTransaction } from '../../types/transaction';

export interface BotSettings {
  categories: readonly string[];
  currencySymbol: string;
  historyLimit: number;
}

/**
 * Reply texts for each bot action. Kept free of the Telegram API so they
 * can be driven directly with a ledger.
 */
export function replyToAdd(ledger: ExpenseLedger, match: string, settings: BotSettings, today: Date = new Date()): string {
  const parsed = parseAddCommand(splitArgs(match), settings.categories, today);
  if (!parsed.ok) return parsed.error;

  return saveTransaction(ledger, parsed.value, settings);
}

/**
 * Plain text message; null when it does not look like an expense
 */
export function replyToQuickEntry(ledger: ExpenseLedger, text: string, settings: BotSettings, today: Date = new Date()): string | null {
  const parsed = parseQuickEntry(text, settings.categories);
  if (!parsed) return null;

  return saveTransaction(ledger, { ...parsed, date: toIsoDate(today) }, settings);
}

export function replyToHistory(ledger: ExpenseLedger, settings: BotSettings): string {
  const transactions = ledger.list();
  if (transactions === null) return messages.error.historyFailed;

  return formatHistory(transactions, settings.historyLimit, settings.currencySymbol);
}

export function replyToDelete(ledger: ExpenseLedger, match: string): string {
  const parsed = parseDeleteCommand(splitArgs(match));
  if (!parsed.ok) return parsed.error;

  const id = parsed.value;
  switch (ledger.deleteWithOutcome(id)) {
    case 'deleted':
      return messages.success.transactionDeleted(id);
    case 'not_found':
      return messages.error.notFound(id);
    case 'error':
      return messages.error.deleteFailed(id);
  }
}

export function replyToSummary(ledger: ExpenseLedger, match: string, settings: BotSettings, today: Date = new Date()): string {
  const parsed = parseSummaryCommand(splitArgs(match), today);
  if (!parsed.ok) return parsed.error;

  return generateSummaryText(buildSummary(ledger, parsed.value), settings.currencySymbol);
}

export function replyToCategories(settings: BotSettings): string {
  return `Categories:\n${settings.categories.map((c) => `- ${c}`).join('\n')}`;
}

function saveTransaction(ledger: ExpenseLedger, tx: NewTransaction & { date: string }, settings: BotSettings): string {
  if (!ledger.add(tx)) {
    return messages.error.saveFailed;
  }

  return messages.success.transactionAdded(
    tx.description,
    formatAmount(tx.amount, settings.currencySymbol),
    tx.category,
    formatDisplayDate(tx.date)
  );
}
