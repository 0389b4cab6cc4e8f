import type { ExpenseLedger } from '../ledger';
import { formatAmount, formatDisplayDate, messages } from '../feedback/messages';
import type { CategoryTotal, ExpenseSummary, IsoDate } from '../../types/transaction';

/**
 * Total spend plus per-category totals, biggest category first
 */
export function buildSummary(ledger: ExpenseLedger, date?: IsoDate): ExpenseSummary {
  const byCategory = ledger.sumByCategory(date);

  const categories: CategoryTotal[] = Object.entries(byCategory)
    .map(([category, total]) => ({ category, total }))
    .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category));

  return {
    date,
    total: ledger.totalSum(date),
    categories,
  };
}

export function generateSummaryText(summary: ExpenseSummary, symbol?: string): string {
  const period = summary.date ? formatDisplayDate(summary.date) : 'All time';
  let text = `Total spending (${period}): ${formatAmount(summary.total, symbol)}`;

  if (summary.categories.length === 0) {
    return `${text}\n\n${messages.info.noDataForPeriod}`;
  }

  text += '\n\nBy category:\n';
  for (const { category, total } of summary.categories) {
    const share = summary.total > 0 ? Math.round((total / summary.total) * 100) : 0;
    text += `- ${category}: ${formatAmount(total, symbol)} (${share}%)\n`;
  }

  return text.trimEnd();
}
