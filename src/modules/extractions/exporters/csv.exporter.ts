import { formatAmount, formatMoney } from '../../../common/utils';
import type { Exporter, ExtractionResult } from '../interfaces';
import { LINE_ITEM_COLUMNS, MONEY_COLUMNS, toLineItemRows, type Cell } from './tabular';

const escapeCell = (cell: Cell, money = false): string => {
  if (cell === null) return '';
  const text = typeof cell !== 'number' ? cell : money ? formatMoney(cell) : formatAmount(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const toLine = (cells: readonly Cell[]) => cells.map((cell) => escapeCell(cell)).join(',');

const toItemLine = (cells: readonly Cell[]) =>
  cells.map((cell, index) => escapeCell(cell, MONEY_COLUMNS.has(LINE_ITEM_COLUMNS[index]))).join(',');

export function toCsv(result: ExtractionResult): string {
  const lines =
    result.kind === 'structured'
      ? [toLine(LINE_ITEM_COLUMNS), ...toLineItemRows(result.invoice).map(toItemLine)]
      : [toLine(['mode', 'answer']), toLine([result.mode, result.rawAnswer])];

  return `${lines.join('\n')}\n`;
}

export const csvExporter: Exporter = {
  format: 'csv',
  extension: 'csv',
  contentType: 'text/csv',
  render: (result) => Buffer.from(toCsv(result), 'utf-8'),
};
