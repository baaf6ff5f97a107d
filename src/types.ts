import { RetryNotice } from './client';
import { JsonObject } from './json';
import { LogRow } from './ledger';
import { RunSummary } from './summary';

export interface DocumentRef {
  /** Empty when the provider listed the document without one. */
  id: string;
  originalName: string;
}

export interface SignatureRecord {
  id: string;
  createdAt: string;
  documents: DocumentRef[];
  /** The record exactly as the list endpoint returned it. */
  summary: JsonObject;
}

export interface DownloadedFile {
  path: string;
  document: DocumentRef;
  emailUsed: string;
}

export interface RunReport {
  year: number;
  since: string;
  until: string;
  outputDir: string;
  ledgerPath: string;
  totalSignatures: number;
  totalDocuments: number;
  summary: RunSummary;
}

export interface SignaturitEvents {
  runStarted: (data: {
    year: number;
    since: string;
    until: string;
    baseUrl: string;
    maskedToken: string;
    outputDir: string;
  }) => void;
  pageFetched: (data: { offset: number; count: number; total: number }) => void;
  signaturesListed: (data: { year: number; total: number }) => void;
  retrying: (data: RetryNotice) => void;
  detailFailed: (data: { signatureId: string; error: string }) => void;
  noEmailFound: (data: { signatureId: string; samplePath?: string }) => void;
  documentDownloaded: (data: { row: LogRow; file: DownloadedFile }) => void;
  documentSkipped: (data: { row: LogRow }) => void;
  documentFailed: (data: { row: LogRow }) => void;
  runCompleted: (report: RunReport) => void;
}
