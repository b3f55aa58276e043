import { ExportError } from '../../../common/errors';
import type { ExtractionResult } from '../interfaces';
import { answerResult, structuredResult } from '../testing/extraction.fixture';
import { ExportService, fileStamp } from './export.service';

const malformed = (): ExtractionResult =>
  JSON.parse(
    '{"kind":"structured","mode":"auto","extractedAt":"2026-10-19T08:30:15.000Z","invoice":{"invoiceNumber":"INV-9","lineItems":null}}',
  );

describe('fileStamp', () => {
  it('formats the extraction time in UTC', () => {
    expect(fileStamp('2026-10-19T08:30:15.000Z')).toBe('20261019_083015');
  });
});

describe('ExportService', () => {
  let service: ExportService;

  beforeEach(() => {
    service = new ExportService();
  });

  it('renders every requested format in order', async () => {
    const { artifacts, failures } = await service.exportAll(structuredResult(), [
      'txt',
      'json',
      'csv',
      'xlsx',
    ]);

    expect(failures).toEqual([]);
    expect(
      artifacts.map(({ format, filename, contentType }) => ({ format, filename, contentType })),
    ).toEqual([
      { format: 'txt', filename: 'invoice_20261019_083015.txt', contentType: 'text/plain' },
      { format: 'json', filename: 'invoice_20261019_083015.json', contentType: 'application/json' },
      { format: 'csv', filename: 'invoice_20261019_083015.csv', contentType: 'text/csv' },
      {
        format: 'xlsx',
        filename: 'invoice_20261019_083015.xlsx',
        contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      },
    ]);
    expect(artifacts.every((artifact) => artifact.content.length > 0)).toBe(true);
  });

  it('renders a repeated format once', async () => {
    const { artifacts } = await service.exportAll(answerResult('ok'), ['csv', 'csv']);

    expect(artifacts).toHaveLength(1);
    expect(artifacts[0].content.toString('utf-8')).toBe('mode,answer\nquestion,ok\n');
  });

  it('does not mutate the result', async () => {
    const result = structuredResult();
    const before = JSON.stringify(result);

    await service.exportAll(result, ['txt', 'json', 'csv', 'xlsx']);

    expect(JSON.stringify(result)).toBe(before);
  });

  it('wraps converter failures in ExportError', async () => {
    await expect(service.export(malformed(), 'txt')).rejects.toBeInstanceOf(ExportError);
  });

  it('keeps the other formats when one fails', async () => {
    const { artifacts, failures } = await service.exportAll(malformed(), ['json', 'csv']);

    expect(artifacts.map((artifact) => artifact.format)).toEqual(['json']);
    expect(failures).toHaveLength(1);
    expect(failures[0].format).toBe('csv');
    expect(failures[0].message).toMatch(/^csv export failed: /);
  });
});
