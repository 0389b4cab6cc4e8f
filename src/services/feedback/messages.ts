import { DEFAULT_CURRENCY_SYMBOL } from '../../config/constants';
import type { Transaction } from '../../types/transaction';

/**
 * User-facing texts
 */

export const messages = {
  success: {
    transactionAdded: (description: string, amount: string, category: string, date: string) =>
      `Saved: ${description}\nAmount: ${amount}\nCategory: ${category}\nDate: ${date}`,
    transactionDeleted: (id: number) => `Transaction ${id} deleted.`,
  },

  error: {
    saveFailed: 'Failed to save the transaction.',
    historyFailed: 'Failed to load the transaction history.',
    deleteFailed: (id: number) => `Failed to delete transaction ${id}.`,
    notFound: (id: number) => `No transaction with ID ${id}.`,
    exportFailed: 'Unable to export data. Try again later.',
  },

  info: {
    noTransactions: 'No transactions recorded yet.',
    noDataForPeriod: 'No expenses for this period.',
    helpAdd: 'Add an expense:\n/add <amount> <category> <description> [YYYY-MM-DD]\nExample: /add 25000 Food Lunch',
    helpQuickEntry: 'Quick entry: type amount and description\nExample: "25000 lunch"',
    helpDelete: 'Delete an expense:\n/delete <id>  (IDs are shown in /history)',
    helpSummary: 'Summary:\n/summary - all time\n/summary today\n/summary 2024-01-10',
  },
};

export function helpText(): string {
  return [
    messages.info.helpAdd,
    messages.info.helpQuickEntry,
    '/history - latest transactions',
    messages.info.helpDelete,
    messages.info.helpSummary,
    '/categories - list categories',
    '/export - download CSV',
  ].join('\n\n');
}

/**
 * Whole units with "." as thousands separator, e.g. "Rp 25.000"
 */
export function formatAmount(amount: number, symbol: string = DEFAULT_CURRENCY_SYMBOL): string {
  const formatted = new Intl.NumberFormat('en-US', {
    maximumFractionDigits: 0,
  })
    .format(amount)
    .replace(/,/g, '.');

  return `${symbol} ${formatted}`;
}

/**
 * "2024-01-10" -> "10-01-2024"
 */
export function formatDisplayDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  if (!year || !month || !day) return isoDate;
  return `${day}-${month}-${year}`;
}

export function formatHistory(transactions: Transaction[], limit: number, symbol?: string): string {
  if (transactions.length === 0) {
    return messages.info.noTransactions;
  }

  const shown = transactions.slice(0, limit);
  const lines = shown.map(
    (tx) => `#${tx.id} | ${formatDisplayDate(tx.date)} | ${tx.description} | ${tx.category} | ${formatAmount(tx.amount, symbol)}`
  );

  let text = `Latest transactions (ID | Date | Description | Category | Amount):\n\n${lines.join('\n')}`;
  if (transactions.length > shown.length) {
    text += `\n\n... and ${transactions.length - shown.length} more. Use /export for the full history.`;
  }
  return text;
}
