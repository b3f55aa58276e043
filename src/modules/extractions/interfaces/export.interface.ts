import type { ExtractionResult } from './extraction-result.interface';

export type ExportFormat = 'txt' | 'json' | 'csv' | 'xlsx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['txt', 'json', 'csv', 'xlsx'];

export interface Exporter {
  format: ExportFormat;
  extension: string;
  contentType: string;
  render(result: ExtractionResult): Buffer | Promise<Buffer>;
}

export interface ExportArtifact {
  format: ExportFormat;
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface ExportFailure {
  format: ExportFormat;
  message: string;
}

export interface ExportOutcome {
  artifacts: ExportArtifact[];
  failures: ExportFailure[];
}
