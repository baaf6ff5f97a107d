import fs from 'fs-extra';
import { LEDGER_HEADER } from './constants';

export type LogStatus = 'downloaded' | 'skipped_exists' | 'error';

export interface LogRow {
  signatureId: string;
  documentId: string;
  emailUsed: string;
  originalFilename: string;
  savedPath: string;
  createdAt: string;
  status: LogStatus;
  error: string;
}

const BOM = '\ufeff';
const EOL = '\r\n';

function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvLine(cells: readonly string[]): string {
  return cells.map(csvEscape).join(',') + EOL;
}

/** Parses CSV text written by `formatCsvLine`: quoted cells, doubled quotes, CRLF or LF rows. */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (quoted) {
      if (char !== '"') {
        cell += char;
      } else if (content[i + 1] === '"') {
        cell += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(cell);
      cell = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
    } else {
      cell += char;
    }
  }
  if (cell !== '' || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

function documentKey(signatureId: string, documentId: string): string {
  return JSON.stringify([signatureId, documentId]);
}

export function rowCells(row: LogRow): string[] {
  return [
    row.signatureId,
    row.documentId,
    row.emailUsed,
    row.originalFilename,
    row.savedPath,
    row.createdAt,
    row.status,
    row.error,
  ];
}

/**
 * Append-only CSV ledger. Each row is flushed to disk as soon as it is
 * recorded, so an interrupted run leaves a ledger matching the files written.
 *
 * Rows already in the file are read on open, so a later run can find where
 * each document was saved before.
 */
export class DownloadLedger {
  readonly path: string;
  readonly created: boolean;
  private readonly saved: Map<string, string>;

  private constructor(path: string, created: boolean, saved: Map<string, string>) {
    this.path = path;
    this.created = created;
    this.saved = saved;
  }

  static async open(path: string): Promise<DownloadLedger> {
    const saved = new Map<string, string>();
    const exists = await fs.pathExists(path);
    if (!exists) {
      await fs.writeFile(path, BOM + formatCsvLine(LEDGER_HEADER), 'utf8');
      return new DownloadLedger(path, true, saved);
    }

    const content = await fs.readFile(path, 'utf8');
    const [, ...rows] = parseCsv(content.startsWith(BOM) ? content.slice(BOM.length) : content);
    for (const [signatureId, documentId, , , savedPath, , status] of rows) {
      if (status === 'downloaded' && signatureId && documentId && savedPath) {
        saved.set(documentKey(signatureId, documentId), savedPath);
      }
    }
    return new DownloadLedger(path, false, saved);
  }

  /** Path of the latest `downloaded` row for this document, in this run or an earlier one. */
  savedPathFor(signatureId: string, documentId: string): string | undefined {
    return this.saved.get(documentKey(signatureId, documentId));
  }

  async append(row: LogRow): Promise<void> {
    await fs.appendFile(this.path, formatCsvLine(rowCells(row)), 'utf8');
    if (row.status === 'downloaded') {
      this.saved.set(documentKey(row.signatureId, row.documentId), row.savedPath);
    }
  }
}
