import type { ExpenseLedger } from '../ledger';

const HEADERS = ['ID', 'Date', 'Description', 'Category', 'Amount'];

/**
 * Full history as CSV, newest first, followed by a total line.
 * Returns null when the history cannot be read.
 */
export function exportToCSV(ledger: ExpenseLedger): string | null {
  const rows = ledger.list();
  if (rows === null) return null;

  const csvLines: string[] = [HEADERS.join(',')];
  let total = 0;

  for (const row of rows) {
    total += row.amount;
    const values = [
      String(row.id),
      row.date,
      escapeCsvField(row.description),
      escapeCsvField(row.category),
      String(row.amount),
    ];
    csvLines.push(values.join(','));
  }

  if (rows.length > 0) {
    csvLines.push('');
    csvLines.push(`Total,${total}`);
  }

  return csvLines.join('\n');
}

export function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
