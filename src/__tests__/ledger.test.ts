import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { buildDateRange, todayIso } from '../dates';
import { DownloadLedger, LogRow, formatCsvLine, parseCsv } from '../ledger';
import { emptySummary, tally } from '../summary';

const HEADER = 'signature_id,document_id,email_used,original_filename,saved_path,created_at,status,error\r\n';

describe('formatCsvLine', () => {
  it('should quote only cells that need it', () => {
    expect(formatCsvLine(['a', 'b,c', 'say "hi"', 'line\nbreak', ''])).toBe(
      'a,"b,c","say ""hi""","line\nbreak",\r\n'
    );
  });
});

describe('parseCsv', () => {
  it('should read back quoted cells, doubled quotes and both line endings', () => {
    expect(parseCsv('a,"b,c","say ""hi"""\r\n"line\nbreak",\nlast')).toEqual([
      ['a', 'b,c', 'say "hi"'],
      ['line\nbreak', ''],
      ['last'],
    ]);
  });

  it('should return no rows for empty text', () => {
    expect(parseCsv('')).toEqual([]);
  });
});

describe('DownloadLedger', () => {
  let dir: string;
  let ledgerPath: string;

  const row: LogRow = {
    signatureId: 'sig-1',
    documentId: 'doc-1',
    emailUsed: 'a@x.com',
    originalFilename: 'contract.pdf',
    savedPath: 'out/2024/a@x.com_contract.pdf',
    createdAt: '2024-03-01T10:00:00+0000',
    status: 'downloaded',
    error: '',
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'signaturit-ledger-'));
    ledgerPath = path.join(dir, 'download_log.csv');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should write the header once when creating the file', async () => {
    const ledger = await DownloadLedger.open(ledgerPath);
    await ledger.append(row);

    expect(ledger.created).toBe(true);
    expect(await fs.readFile(ledgerPath, 'utf8')).toBe(
      '\ufeff' +
        HEADER +
        'sig-1,doc-1,a@x.com,contract.pdf,out/2024/a@x.com_contract.pdf,2024-03-01T10:00:00+0000,downloaded,\r\n'
    );
  });

  it('should append to an existing ledger without a second header', async () => {
    await fs.writeFile(ledgerPath, HEADER);

    const ledger = await DownloadLedger.open(ledgerPath);
    await ledger.append({ ...row, status: 'error', error: 'Download failed (500): boom, again' });

    expect(ledger.created).toBe(false);
    expect(await fs.readFile(ledgerPath, 'utf8')).toBe(
      HEADER +
        'sig-1,doc-1,a@x.com,contract.pdf,out/2024/a@x.com_contract.pdf,2024-03-01T10:00:00+0000,error,"Download failed (500): boom, again"\r\n'
    );
  });

  it('should remember where earlier runs saved each document', async () => {
    const first = await DownloadLedger.open(ledgerPath);
    await first.append({ ...row, savedPath: 'out/2024/a, b.pdf' });
    await first.append({ ...row, documentId: 'doc-2', status: 'error', error: 'boom' });
    await first.append({ ...row, documentId: 'doc-3', status: 'skipped_exists' });

    const reopened = await DownloadLedger.open(ledgerPath);

    expect(reopened.savedPathFor('sig-1', 'doc-1')).toBe('out/2024/a, b.pdf');
    expect(reopened.savedPathFor('sig-1', 'doc-2')).toBeUndefined();
    expect(reopened.savedPathFor('sig-1', 'doc-3')).toBeUndefined();
    expect(reopened.savedPathFor('sig-2', 'doc-1')).toBeUndefined();
  });

  it('should track downloads appended during the run', async () => {
    const ledger = await DownloadLedger.open(ledgerPath);
    expect(ledger.savedPathFor('sig-1', 'doc-1')).toBeUndefined();

    await ledger.append(row);

    expect(ledger.savedPathFor('sig-1', 'doc-1')).toBe('out/2024/a@x.com_contract.pdf');
  });
});

describe('tally', () => {
  it('should fold statuses into a new summary', () => {
    const start = emptySummary();
    const result = (['downloaded', 'skipped_exists', 'downloaded', 'error'] as const).reduce(tally, start);

    expect(result).toEqual({ downloaded: 2, skipped: 1, failed: 1 });
    expect(start).toEqual({ downloaded: 0, skipped: 0, failed: 0 });
  });
});

describe('buildDateRange', () => {
  it('should cover the whole of a past year', () => {
    expect(buildDateRange(2024, new Date(2026, 9, 19))).toEqual({ since: '2024-01-01', until: '2024-12-31' });
  });

  it('should stop at today for the current year', () => {
    expect(buildDateRange(2026, new Date(2026, 0, 5))).toEqual({ since: '2026-01-01', until: '2026-01-05' });
  });

  it('should format local dates with zero padding', () => {
    expect(todayIso(new Date(2026, 9, 9))).toBe('2026-10-09');
  });
});
