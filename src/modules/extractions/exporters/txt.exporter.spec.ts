import { answerResult, blankParty, buildInvoice, structuredResult } from '../testing/extraction.fixture';
import { toTxt } from './txt.exporter';

const BANNER = '='.repeat(60);

describe('toTxt', () => {
  it('renders the invoice report', () => {
    const text = toTxt(structuredResult());

    expect(text).toContain('INV-1001');
    expect(text).toContain('Widget');
    expect(text).toContain('20.9');

    const lines = text.split('\n');
    expect(lines.slice(0, 10)).toEqual([
      BANNER,
      'INVOICE DETAILS',
      BANNER,
      '',
      'Invoice Number: INV-1001',
      'Invoice Date: N/A',
      'Due Date: N/A',
      'Currency: USD',
      'Extracted At: 2026-10-19T08:30:15.000Z',
      '',
    ]);
    expect(lines).toContain('Total Amount: 20.9');
    expect(lines).toContain('Tax Amount: 1.9');
    expect(lines).toContain('Payment Terms: N/A');
  });

  it('aligns line items in a fixed-width table', () => {
    const text = toTxt(structuredResult());

    expect(text).toMatch(/^#\s+Description\s+Qty\s+Unit Price\s+Total$/m);
    expect(text).toMatch(/^1\s+Widget\s+2\s+9\.5\s+19$/m);
  });

  it('prints party details', () => {
    const invoice = buildInvoice({
      vendor: blankParty({ name: 'Acme Supplies', taxId: 'DE123456789' }),
      customer: blankParty({ address: '1 Main St' }),
    });

    const lines = toTxt(structuredResult(invoice)).split('\n');
    const vendorAt = lines.indexOf('VENDOR INFORMATION');
    const customerAt = lines.indexOf('CUSTOMER INFORMATION');

    expect(lines.slice(vendorAt + 2, vendorAt + 6)).toEqual([
      'Name: Acme Supplies',
      'Address: N/A',
      'Contact: N/A',
      'Tax ID: DE123456789',
    ]);
    expect(lines.slice(customerAt + 2, customerAt + 4)).toEqual(['Name: N/A', 'Address: 1 Main St']);
  });

  it('notes an empty item list', () => {
    const lines = toTxt(structuredResult(buildInvoice({ lineItems: [] }))).split('\n');

    expect(lines[lines.indexOf('LINE ITEMS') + 2]).toBe('No items found');
  });

  it('prints answers verbatim under one heading', () => {
    expect(toTxt(answerResult('Line one\nLine two'))).toBe(
      `${BANNER}\nANSWER\n${BANNER}\n\nLine one\nLine two\n`,
    );
  });

  it('is deterministic', () => {
    const result = structuredResult();

    expect(toTxt(result)).toBe(toTxt(result));
  });
});
