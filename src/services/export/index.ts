import type { ExpenseLedger } from '../ledger';
import { toIsoDate } from '../validation/schemas';
import { describeError } from '../../utils/errors';
import type { ExportRequest, ExportResult } from '../../types/export';
import { exportToCSV } from './csv';

export function handleExport(ledger: ExpenseLedger, request: ExportRequest, now: Date = new Date()): ExportResult {
  try {
    const csvContent = exportToCSV(ledger);
    if (csvContent === null) {
      return {
        success: false,
        format: 'csv',
        message: 'Export failed: transaction history could not be read',
      };
    }

    const fileName = `expenses_${toIsoDate(now)}.csv`;
    return {
      success: true,
      format: 'csv',
      fileName,
      message: `CSV export ready: ${fileName}`,
      data: csvContent,
    };
  } catch (error) {
    console.error('[Export] Error:', describeError(error));
    return {
      success: false,
      format: request.format,
      message: `Export failed: ${describeError(error)}`,
    };
  }
}

export { escapeCsvField, exportToCSV } from './csv';
