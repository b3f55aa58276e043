import { Logger } from '@nestjs/common';

import { isRecord, normalizeTaxId, normalizeText, parseAmount } from '../../common/utils';
import type {
  AnswerExtraction,
  ExtractionMode,
  ExtractionResult,
  InvoiceFields,
  LineItem,
  Party,
  StructuredExtraction,
} from './interfaces';

type Section = 'HEADER' | 'VENDOR' | 'CUSTOMER' | 'ITEMS' | 'TOTALS';

const SECTION_HEADINGS: Record<string, Section> = {
  'INVOICE DETAILS': 'HEADER',
  'VENDOR INFORMATION': 'VENDOR',
  'CUSTOMER INFORMATION': 'CUSTOMER',
  'LINE ITEMS': 'ITEMS',
  TOTALS: 'TOTALS',
};

type Draft<T> = { -readonly [K in keyof T]: T[K] };

interface InvoiceDraft extends Draft<Omit<InvoiceFields, 'vendor' | 'customer' | 'lineItems'>> {
  vendor: Draft<Party>;
  customer: Draft<Party>;
  lineItems: LineItem[];
}

const logger = new Logger('ResponseParser');

const emptyParty = (): Draft<Party> => ({ name: null, address: null, contact: null, taxId: null });

const emptyInvoice = (): InvoiceDraft => ({
  invoiceNumber: null,
  invoiceDate: null,
  dueDate: null,
  currency: null,
  vendor: emptyParty(),
  customer: emptyParty(),
  lineItems: [],
  subtotal: null,
  taxRate: null,
  tax: null,
  grandTotal: null,
  paymentTerms: null,
});

const pick = (record: Record<string, unknown>, ...keys: string[]): unknown => {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) {
      return record[key];
    }
  }
  return null;
};

/**
 * Removes a surrounding markdown code fence (```json ... ```).
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```(?:[\w-]+(?=\s))?\s*([\s\S]*?)\s*```$/);
  return match ? match[1].trim() : trimmed;
}

function normalizeLineItem(value: unknown): LineItem | null {
  if (!isRecord(value)) {
    return null;
  }

  const item: LineItem = {
    description: normalizeText(pick(value, 'description', 'item_description', 'name')) ?? '',
    quantity: parseAmount(pick(value, 'quantity', 'qty')),
    unitPrice: parseAmount(pick(value, 'unitPrice', 'unit_price', 'price')),
    total: parseAmount(pick(value, 'total', 'amount', 'lineTotal', 'line_total')),
  };

  const isEmpty =
    item.description === '' &&
    item.quantity === null &&
    item.unitPrice === null &&
    item.total === null;

  return isEmpty ? null : item;
}

function normalizeParty(raw: Record<string, unknown>, prefix: 'vendor' | 'customer'): Party {
  const nested = raw[prefix];
  const party: Record<string, unknown> = isRecord(nested) ? nested : {};

  return {
    name: normalizeText(pick(party, 'name') ?? pick(raw, `${prefix}_name`, `${prefix}Name`)),
    address: normalizeText(
      pick(party, 'address') ?? pick(raw, `${prefix}_address`, `${prefix}Address`),
    ),
    contact: normalizeText(
      pick(party, 'contact', 'phone', 'email') ?? pick(raw, `${prefix}_contact`),
    ),
    taxId: normalizeTaxId(
      normalizeText(pick(party, 'taxId', 'tax_id') ?? pick(raw, `${prefix}_tax_id`, `${prefix}TaxId`)),
    ),
  };
}

function normalizeInvoice(raw: Record<string, unknown>): InvoiceFields {
  const items = pick(raw, 'lineItems', 'line_items', 'items');

  return {
    invoiceNumber: normalizeText(pick(raw, 'invoiceNumber', 'invoice_number')),
    invoiceDate: normalizeText(pick(raw, 'invoiceDate', 'invoice_date')),
    dueDate: normalizeText(pick(raw, 'dueDate', 'due_date')),
    currency: normalizeText(pick(raw, 'currency'))?.toUpperCase() ?? null,
    vendor: normalizeParty(raw, 'vendor'),
    customer: normalizeParty(raw, 'customer'),
    lineItems: Array.isArray(items)
      ? items.map(normalizeLineItem).filter((item): item is LineItem => item !== null)
      : [],
    subtotal: parseAmount(pick(raw, 'subtotal')),
    taxRate: normalizeText(pick(raw, 'taxRate', 'tax_rate')),
    tax: parseAmount(pick(raw, 'tax', 'taxAmount', 'tax_amount')),
    grandTotal: parseAmount(pick(raw, 'grandTotal', 'grand_total', 'totalAmount', 'total_amount')),
    paymentTerms: normalizeText(pick(raw, 'paymentTerms', 'payment_terms')),
  };
}

/**
 * Reads the sectioned `Key: value` report layout
 * (INVOICE DETAILS / VENDOR INFORMATION / ... / TOTALS).
 * A line item is closed by its `Total:` line.
 */
function parseLabelledText(text: string): InvoiceFields {
  const invoice = emptyInvoice();
  let section: Section | null = null;
  let item: Record<string, string | null> = {};

  const flushItem = () => {
    const normalized = normalizeLineItem(item);
    if (normalized) {
      invoice.lineItems.push(normalized);
    }
    item = {};
  };

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    const heading = SECTION_HEADINGS[trimmed.toUpperCase()];
    if (heading) {
      if (section === 'ITEMS') flushItem();
      section = heading;
      continue;
    }

    const separator = trimmed.indexOf(':');
    if (separator === -1 || section === null) {
      continue;
    }

    const key = trimmed.slice(0, separator).trim().toLowerCase();
    const value = normalizeText(trimmed.slice(separator + 1));

    switch (section) {
      case 'HEADER':
        if (key === 'invoice number') invoice.invoiceNumber = value;
        else if (key === 'invoice date') invoice.invoiceDate = value;
        else if (key === 'due date') invoice.dueDate = value;
        else if (key === 'currency') invoice.currency = value?.toUpperCase() ?? null;
        break;
      case 'VENDOR':
      case 'CUSTOMER': {
        const party = section === 'VENDOR' ? invoice.vendor : invoice.customer;
        if (key === 'name') party.name = value;
        else if (key === 'address') party.address = value;
        else if (key === 'contact' || key === 'phone' || key === 'email') party.contact = value;
        else if (key === 'tax id') party.taxId = normalizeTaxId(value);
        break;
      }
      case 'ITEMS':
        if (key === 'description') item.description = value;
        else if (key === 'quantity') item.quantity = value;
        else if (key === 'unit price') item.unit_price = value;
        else if (key === 'total') {
          item.total = value;
          flushItem();
        }
        break;
      case 'TOTALS':
        if (key === 'subtotal') invoice.subtotal = parseAmount(value);
        else if (key === 'tax rate') invoice.taxRate = value;
        else if (key === 'tax amount' || key === 'tax') invoice.tax = parseAmount(value);
        else if (key === 'total amount' || key === 'grand total') {
          invoice.grandTotal = parseAmount(value);
        } else if (key === 'payment terms') invoice.paymentTerms = value;
        break;
    }
  }

  if (section === 'ITEMS') flushItem();

  return invoice;
}

function hasInvoiceContent(invoice: InvoiceFields): boolean {
  const scalars = [
    invoice.invoiceNumber,
    invoice.invoiceDate,
    invoice.dueDate,
    invoice.currency,
    invoice.subtotal,
    invoice.taxRate,
    invoice.tax,
    invoice.grandTotal,
    invoice.paymentTerms,
    ...Object.values(invoice.vendor),
    ...Object.values(invoice.customer),
  ];

  return invoice.lineItems.length > 0 || scalars.some((value) => value !== null);
}

function readStructured(raw: string): InvoiceFields | null {
  const cleaned = stripCodeFence(raw);

  try {
    const parsed: unknown = JSON.parse(cleaned);
    if (isRecord(parsed)) {
      const invoice = normalizeInvoice(parsed);
      return hasInvoiceContent(invoice) ? invoice : null;
    }
  } catch (error) {
    logger.debug(`Response is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const invoice = parseLabelledText(cleaned);
  return hasInvoiceContent(invoice) ? invoice : null;
}

function freezeInvoice(invoice: InvoiceFields): void {
  invoice.lineItems.forEach((item) => Object.freeze(item));
  Object.freeze(invoice.lineItems);
  Object.freeze(invoice.vendor);
  Object.freeze(invoice.customer);
  Object.freeze(invoice);
}

export function parseResponse(
  raw: string,
  mode: ExtractionMode,
  extractedAt: Date = new Date(),
): ExtractionResult {
  const timestamp = extractedAt.toISOString();

  if (mode === 'auto') {
    const invoice = readStructured(raw);
    if (invoice) {
      freezeInvoice(invoice);
      const structured: StructuredExtraction = {
        kind: 'structured',
        mode,
        extractedAt: timestamp,
        invoice,
      };
      Object.freeze(structured);
      return structured;
    }

    logger.warn('⚠️ Auto-mode response could not be read as invoice fields, keeping raw text');
  }

  const answer: AnswerExtraction = {
    kind: 'answer',
    mode,
    extractedAt: timestamp,
    rawAnswer: raw,
    unstructured: mode === 'auto',
  };
  Object.freeze(answer);
  return answer;
}
