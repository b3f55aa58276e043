import type { ExportFailure, ExportFormat } from './export.interface';
import type { ExtractionResult } from './extraction-result.interface';

export interface ArtifactPayload {
  format: ExportFormat;
  filename: string;
  contentType: string;
  /** base64 */
  data: string;
}

export interface ExtractionReply {
  result: ExtractionResult;
  artifacts: ArtifactPayload[];
  failures: ExportFailure[];
}
