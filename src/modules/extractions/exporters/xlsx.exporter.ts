import { Workbook, type Worksheet } from 'exceljs';
import JSZip from 'jszip';

import type { Exporter, ExtractionResult } from '../interfaces';
import { LINE_ITEM_COLUMNS, toLineItemRows, toSummaryPairs } from './tabular';

const boldHeader = (sheet: Worksheet) => {
  sheet.getRow(1).font = { bold: true };
};

function buildWorkbook(result: ExtractionResult): Workbook {
  const workbook = new Workbook();
  const extractedAt = new Date(result.extractedAt);
  workbook.creator = 'invoice-extractor';
  workbook.created = extractedAt;
  workbook.modified = extractedAt;

  if (result.kind === 'answer') {
    const sheet = workbook.addWorksheet('Answer');
    sheet.columns = [
      { header: 'Mode', key: 'mode', width: 12 },
      { header: 'Answer', key: 'answer', width: 80 },
    ];
    sheet.addRow([result.mode, result.rawAnswer]);
    boldHeader(sheet);
    return workbook;
  }

  const summary = workbook.addWorksheet('Summary');
  summary.columns = [
    { header: 'Field', key: 'field', width: 20 },
    { header: 'Value', key: 'value', width: 48 },
  ];
  summary.addRows(toSummaryPairs(result.invoice));
  boldHeader(summary);

  const items = workbook.addWorksheet('Line Items');
  items.columns = LINE_ITEM_COLUMNS.map((column) => ({
    header: column,
    key: column,
    width: column === 'item_description' ? 40 : 16,
  }));
  items.addRows(toLineItemRows(result.invoice));
  boldHeader(items);

  return workbook;
}

/** exceljs stamps zip entries with the current time. */
async function pinEntryDates(content: ArrayBuffer, date: Date): Promise<Buffer> {
  const source = await JSZip.loadAsync(content);
  const pinned = new JSZip();

  for (const entry of Object.values(source.files)) {
    if (entry.dir) continue;
    pinned.file(entry.name, await entry.async('nodebuffer'), { date, createFolders: false });
  }

  return pinned.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export const xlsxExporter: Exporter = {
  format: 'xlsx',
  extension: 'xlsx',
  contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  render: async (result) =>
    pinEntryDates(await buildWorkbook(result).xlsx.writeBuffer(), new Date(result.extractedAt)),
};
