import type { Exporter, ExtractionResult } from '../interfaces';

/**
 * Absent fields are already `null` on the result, so they are written as
 * `null` rather than omitted.
 */
export const toJson = (result: ExtractionResult): string => JSON.stringify(result, null, 2);

export const jsonExporter: Exporter = {
  format: 'json',
  extension: 'json',
  contentType: 'application/json',
  render: (result) => Buffer.from(toJson(result), 'utf-8'),
};
