import { parseResponse } from '../response.parser';
import { answerResult, buildInvoice, structuredResult } from '../testing/extraction.fixture';
import { jsonExporter, toJson } from './json.exporter';

describe('toJson', () => {
  it('round-trips a structured result', () => {
    const result = structuredResult(buildInvoice({ paymentTerms: 'Net 30' }));

    expect(JSON.parse(toJson(result))).toEqual(result);
  });

  it('round-trips a parsed, frozen result', () => {
    const result = parseResponse(
      '{"invoiceNumber":"INV-7","lineItems":[{"description":"Pen","total":"1.50"}]}',
      'auto',
      new Date('2026-10-19T08:30:15.000Z'),
    );

    expect(JSON.parse(toJson(result))).toEqual(result);
  });

  it('round-trips an answer', () => {
    const result = answerResult('The vendor is Acme.');

    expect(JSON.parse(toJson(result))).toEqual(result);
  });

  it('writes absent fields as null', () => {
    const json = toJson(structuredResult());

    expect(json).toContain('"dueDate": null');
    expect(json).toContain('"taxId": null');
  });

  it('encodes as UTF-8', () => {
    const result = structuredResult(buildInvoice({ invoiceNumber: 'ФАКТ-1' }));

    expect(jsonExporter.render(result)).toEqual(Buffer.from(toJson(result), 'utf-8'));
  });
});
