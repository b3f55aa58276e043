import type { InvoiceFields } from '../interfaces';

export type Cell = string | number | null;

export const LINE_ITEM_COLUMNS = [
  'invoice_number',
  'currency',
  'invoice_date',
  'due_date',
  'vendor_name',
  'customer_name',
  'item_description',
  'quantity',
  'unit_price',
  'item_total',
  'subtotal',
  'tax_amount',
  'total_amount',
] as const;

export type LineItemColumn = (typeof LINE_ITEM_COLUMNS)[number];

export const MONEY_COLUMNS: ReadonlySet<LineItemColumn> = new Set<LineItemColumn>([
  'unit_price',
  'item_total',
  'subtotal',
  'tax_amount',
  'total_amount',
]);

/**
 * One row per line item with the invoice-level fields repeated on each.
 * An invoice without items still yields one row, with blank item cells.
 */
export function toLineItemRows(invoice: InvoiceFields): Cell[][] {
  const header: Cell[] = [
    invoice.invoiceNumber,
    invoice.currency,
    invoice.invoiceDate,
    invoice.dueDate,
    invoice.vendor.name,
    invoice.customer.name,
  ];
  const totals: Cell[] = [invoice.subtotal, invoice.tax, invoice.grandTotal];

  if (invoice.lineItems.length === 0) {
    return [[...header, null, null, null, null, ...totals]];
  }

  return invoice.lineItems.map((item) => [
    ...header,
    item.description,
    item.quantity,
    item.unitPrice,
    item.total,
    ...totals,
  ]);
}

export function toSummaryPairs(invoice: InvoiceFields): Array<[string, Cell]> {
  return [
    ['Invoice Number', invoice.invoiceNumber],
    ['Invoice Date', invoice.invoiceDate],
    ['Due Date', invoice.dueDate],
    ['Currency', invoice.currency],
    ['Vendor Name', invoice.vendor.name],
    ['Vendor Address', invoice.vendor.address],
    ['Vendor Contact', invoice.vendor.contact],
    ['Vendor Tax ID', invoice.vendor.taxId],
    ['Customer Name', invoice.customer.name],
    ['Customer Address', invoice.customer.address],
    ['Customer Contact', invoice.customer.contact],
    ['Customer Tax ID', invoice.customer.taxId],
    ['Subtotal', invoice.subtotal],
    ['Tax Rate', invoice.taxRate],
    ['Tax Amount', invoice.tax],
    ['Total Amount', invoice.grandTotal],
    ['Payment Terms', invoice.paymentTerms],
  ];
}
