import { Injectable, Logger } from '@nestjs/common';

import { ExportError } from '../../../common/errors';
import type {
  ExportArtifact,
  ExportFormat,
  ExportOutcome,
  Exporter,
  ExtractionResult,
} from '../interfaces';
import { csvExporter } from './csv.exporter';
import { jsonExporter } from './json.exporter';
import { txtExporter } from './txt.exporter';
import { xlsxExporter } from './xlsx.exporter';

const EXPORTERS: Record<ExportFormat, Exporter> = {
  txt: txtExporter,
  json: jsonExporter,
  csv: csvExporter,
  xlsx: xlsxExporter,
};

/**
 * `2026-10-19T08:30:15.000Z` -> `20261019_083015`
 */
export function fileStamp(extractedAt: string): string {
  const iso = new Date(extractedAt).toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  async export(result: ExtractionResult, format: ExportFormat): Promise<ExportArtifact> {
    const exporter = EXPORTERS[format];

    try {
      const content = await exporter.render(result);
      return {
        format,
        filename: `invoice_${fileStamp(result.extractedAt)}.${exporter.extension}`,
        contentType: exporter.contentType,
        content,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportError(format, message, { cause: error });
    }
  }

  /**
   * Renders each requested format on its own; one failing format does not
   * stop the others.
   */
  async exportAll(result: ExtractionResult, formats: readonly ExportFormat[]): Promise<ExportOutcome> {
    const outcome: ExportOutcome = { artifacts: [], failures: [] };

    for (const format of new Set(formats)) {
      try {
        outcome.artifacts.push(await this.export(result, format));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`❌ ${message}`);
        outcome.failures.push({ format, message });
      }
    }

    this.logger.log(
      `💾 Exported ${outcome.artifacts.length}/${outcome.artifacts.length + outcome.failures.length} formats`,
    );
    return outcome;
  }
}
