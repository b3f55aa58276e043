import { formatAmount } from '../../../common/utils';
import type { Exporter, ExtractionResult, InvoiceFields, Party } from '../interfaces';

const BANNER = '='.repeat(60);
const RULE = '-'.repeat(60);

const cell = (value: string | number | null) =>
  typeof value === 'number' ? formatAmount(value) : (value ?? '');
const show = (value: string | number | null) => (value === null ? 'N/A' : cell(value));

const section = (title: string) => ['', RULE, title, RULE];

const partyLines = (party: Party) => [
  `Name: ${show(party.name)}`,
  `Address: ${show(party.address)}`,
  `Contact: ${show(party.contact)}`,
  `Tax ID: ${show(party.taxId)}`,
];

const tableRow = (columns: [string, string, string, string, string]) => {
  const [index, description, quantity, unitPrice, total] = columns;
  return [
    index.padEnd(4),
    description.padEnd(28),
    quantity.padStart(8),
    unitPrice.padStart(12),
    total.padStart(12),
  ]
    .join(' ')
    .trimEnd();
};

function lineItemLines(invoice: InvoiceFields): string[] {
  if (invoice.lineItems.length === 0) {
    return ['No items found'];
  }

  return [
    tableRow(['#', 'Description', 'Qty', 'Unit Price', 'Total']),
    ...invoice.lineItems.map((item, index) =>
      tableRow([
        String(index + 1),
        item.description,
        cell(item.quantity),
        cell(item.unitPrice),
        cell(item.total),
      ]),
    ),
  ];
}

function invoiceReport(invoice: InvoiceFields, extractedAt: string): string[] {
  return [
    BANNER,
    'INVOICE DETAILS',
    BANNER,
    '',
    `Invoice Number: ${show(invoice.invoiceNumber)}`,
    `Invoice Date: ${show(invoice.invoiceDate)}`,
    `Due Date: ${show(invoice.dueDate)}`,
    `Currency: ${show(invoice.currency)}`,
    `Extracted At: ${extractedAt}`,
    ...section('VENDOR INFORMATION'),
    ...partyLines(invoice.vendor),
    ...section('CUSTOMER INFORMATION'),
    ...partyLines(invoice.customer),
    ...section('LINE ITEMS'),
    ...lineItemLines(invoice),
    ...section('TOTALS'),
    `Subtotal: ${show(invoice.subtotal)}`,
    `Tax Rate: ${show(invoice.taxRate)}`,
    `Tax Amount: ${show(invoice.tax)}`,
    `Total Amount: ${show(invoice.grandTotal)}`,
    `Payment Terms: ${show(invoice.paymentTerms)}`,
    '',
    BANNER,
  ];
}

export function toTxt(result: ExtractionResult): string {
  const lines =
    result.kind === 'structured'
      ? invoiceReport(result.invoice, result.extractedAt)
      : [BANNER, 'ANSWER', BANNER, '', result.rawAnswer];

  return `${lines.join('\n')}\n`;
}

export const txtExporter: Exporter = {
  format: 'txt',
  extension: 'txt',
  contentType: 'text/plain',
  render: (result) => Buffer.from(toTxt(result), 'utf-8'),
};
