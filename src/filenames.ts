import fs from 'fs-extra';
import path from 'path';
import { DEFAULT_FILENAME } from './constants';

const FORBIDDEN_CHARACTERS = /[\\/:*?"<>|]/g;

export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(FORBIDDEN_CHARACTERS, '_').replace(/\s+/g, ' ').trim();
  return cleaned || DEFAULT_FILENAME;
}

/**
 * `<email1>+<email2>_<original>` when signers are known, otherwise the
 * original name. Always sanitized and given an extension.
 */
export function nameFor(emails: readonly string[], originalName: string): string {
  const base = emails.length > 0 ? `${emails.join('+')}_${originalName}` : originalName;
  const safe = sanitizeFilename(base);
  return path.extname(safe) ? safe : `${safe}.pdf`;
}

// report.pdf, report_2.pdf, report_3.pdf, ...
function candidateAt(directory: string, name: string, counter: number): string {
  if (counter === 1) return path.join(directory, name);
  const ext = path.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  return path.join(directory, `${stem}_${counter}${ext}`);
}

/**
 * Hands out file paths for one run. Paths handed out are remembered, so two
 * documents sharing a name in the same run never share a path even before
 * either file is written. Reserved paths are never handed out.
 */
export class UniquePathAllocator {
  private readonly claimed: Set<string>;

  constructor(reserved: readonly string[] = []) {
    this.claimed = new Set(reserved);
  }

  /** First candidate that is neither on disk nor already handed out. */
  async uniquePathIn(directory: string, name: string): Promise<string> {
    for (let counter = 1; ; counter++) {
      const candidate = candidateAt(directory, name, counter);
      if (this.claimed.has(candidate)) continue;
      if (await fs.pathExists(candidate)) continue;
      return this.claim(candidate);
    }
  }

  private claim(candidate: string): string {
    this.claimed.add(candidate);
    return candidate;
  }
}
