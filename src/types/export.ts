export type ExportFormat = 'csv';

export interface ExportRequest {
  format: ExportFormat;
}

export interface ExportResult {
  success: boolean;
  format: string;
  fileName?: string;
  message: string;
  data?: string;
}
