import { AxiosAdapter } from 'axios';
import fs from 'fs-extra';
import path from 'path';
import { EventEmitter } from 'events';
import { ApiClient, bodyText, isOk } from './client';
import { SignaturitConfig, SignaturitConfigOptions, assertValidYear, maskToken } from './config';
import { LEDGER_FILE, NO_EMAIL_DIR } from './constants';
import { buildDateRange } from './dates';
import { extractEmails } from './emails';
import { DetailFetchError, DownloadError, ListingError, errorMessage } from './errors';
import { UniquePathAllocator, nameFor, sanitizeFilename } from './filenames';
import { JsonObject, isJsonObject, toJsonValue } from './json';
import { DownloadLedger, LogRow, LogStatus } from './ledger';
import { parseSignatureRecord } from './records';
import { emptySummary, tally } from './summary';
import { DocumentRef, RunReport, SignatureRecord, SignaturitEvents } from './types';

export * from './client';
export * from './config';
export * from './constants';
export * from './dates';
export * from './emails';
export * from './errors';
export * from './filenames';
export * from './json';
export * from './ledger';
export * from './records';
export * from './summary';
export * from './types';

export interface ServiceDependencies {
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface RunContext {
  outputDir: string;
  paths: UniquePathAllocator;
  ledger: DownloadLedger;
}

export interface SignaturitService {
  on<K extends keyof SignaturitEvents>(event: K, listener: SignaturitEvents[K]): this;
  emit<K extends keyof SignaturitEvents>(event: K, ...args: Parameters<SignaturitEvents[K]>): boolean;
}

export class SignaturitService extends EventEmitter {
  private config: SignaturitConfig;
  private client: ApiClient;
  private now: () => Date;

  constructor(config: SignaturitConfigOptions = {}, deps: ServiceDependencies = {}) {
    super();
    this.now = deps.now ?? (() => new Date());
    this.config = new SignaturitConfig(config, this.now());
    this.client = new ApiClient({
      baseUrl: this.config.getBaseUrl(),
      token: this.config.token,
      maxAttempts: this.config.maxAttempts,
      retryDelay: this.config.retryDelay,
      timeout: this.config.timeout,
      adapter: deps.adapter,
      sleep: deps.sleep,
      onRetry: notice => this.emit('retrying', notice),
    });
  }

  async listCompleted(year: number = this.config.year): Promise<SignatureRecord[]> {
    assertValidYear(year);
    const { since, until } = buildDateRange(year, this.now());
    const limit = this.config.pageLimit;
    const collected: SignatureRecord[] = [];

    for (let offset = 0; ; offset += limit) {
      const result = await this.client.get('/signatures.json', {
        status: 'completed',
        since,
        until,
        limit,
        offset,
      });
      const { status, data } = result.response;
      if (!isOk(result)) throw new ListingError(status, bodyText(data));

      const page = toJsonValue(data);
      if (!Array.isArray(page)) {
        throw new ListingError(status, '', 'Unexpected listing payload, expected a JSON array');
      }
      if (page.length === 0) break;

      for (const [index, item] of page.entries()) {
        const record = parseSignatureRecord(item);
        if (!record) {
          throw new ListingError(status, '', `Malformed signature record at position ${offset + index}`);
        }
        collected.push(record);
      }
      this.emit('pageFetched', { offset, count: page.length, total: collected.length });

      if (page.length < limit) break;
    }

    return collected;
  }

  async getSignatureDetail(signatureId: string): Promise<JsonObject> {
    const result = await this.client.get(`/signatures/${encodeURIComponent(signatureId)}.json`);
    const { status, data } = result.response;
    if (!isOk(result)) throw new DetailFetchError(signatureId, status, bodyText(data));

    const detail = toJsonValue(data);
    if (!isJsonObject(detail)) throw new DetailFetchError(signatureId, status, 'expected a JSON object');
    return detail;
  }

  async downloadSignedDocument(signatureId: string, documentId: string): Promise<Buffer> {
    const result = await this.client.get(
      `/signatures/${encodeURIComponent(signatureId)}/documents/${encodeURIComponent(documentId)}/download/signed`,
      undefined,
      'arraybuffer'
    );
    const { status, data } = result.response;
    if (!isOk(result)) throw new DownloadError(status, bodyText(data));

    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data);
    throw new DownloadError(status, 'response body was not binary');
  }

  async run(year: number = this.config.year): Promise<RunReport> {
    assertValidYear(year);
    const { since, until } = buildDateRange(year, this.now());
    const outputDir = path.join(this.config.outputRoot, String(year));
    await fs.ensureDir(outputDir);
    const ledger = await DownloadLedger.open(path.join(outputDir, LEDGER_FILE));

    this.emit('runStarted', {
      year,
      since,
      until,
      baseUrl: this.config.getBaseUrl(),
      maskedToken: maskToken(this.config.token),
      outputDir,
    });

    const signatures = await this.listCompleted(year);
    this.emit('signaturesListed', { year, total: signatures.length });

    const paths = new UniquePathAllocator([ledger.path, path.join(outputDir, NO_EMAIL_DIR)]);
    const context: RunContext = { outputDir, paths, ledger };
    let summary = emptySummary();
    let totalDocuments = 0;

    for (const signature of signatures) {
      const statuses = await this.processSignature(signature, context);
      summary = statuses.reduce(tally, summary);
      totalDocuments += statuses.length;
    }

    const report: RunReport = {
      year,
      since,
      until,
      outputDir,
      ledgerPath: ledger.path,
      totalSignatures: signatures.length,
      totalDocuments,
      summary,
    };
    this.emit('runCompleted', report);
    return report;
  }

  private async processSignature(signature: SignatureRecord, context: RunContext): Promise<LogStatus[]> {
    const detail = await this.tryFetchDetail(signature.id);
    const emails = extractEmails(signature.summary, detail);

    if (emails.length === 0) {
      await this.recordMissingEmail(signature.id, detail, context.outputDir);
    }

    const statuses: LogStatus[] = [];
    for (const document of signature.documents) {
      const row = await this.processDocument(signature, document, emails, context);
      await context.ledger.append(row);
      statuses.push(row.status);
    }
    return statuses;
  }

  private async tryFetchDetail(signatureId: string): Promise<JsonObject | undefined> {
    try {
      return await this.getSignatureDetail(signatureId);
    } catch (error) {
      this.emit('detailFailed', { signatureId, error: errorMessage(error) });
      return undefined;
    }
  }

  private async recordMissingEmail(
    signatureId: string,
    detail: JsonObject | undefined,
    outputDir: string
  ): Promise<void> {
    const samplePath = path.join(outputDir, NO_EMAIL_DIR, `${sanitizeFilename(signatureId)}.json`);
    if (detail && !(await fs.pathExists(samplePath))) {
      await fs.outputJson(samplePath, detail, { spaces: 2 });
      this.emit('noEmailFound', { signatureId, samplePath });
      return;
    }
    this.emit('noEmailFound', { signatureId });
  }

  private async processDocument(
    signature: SignatureRecord,
    document: DocumentRef,
    emails: string[],
    context: RunContext
  ): Promise<LogRow> {
    const emailUsed = emails.join('+');
    const base = {
      signatureId: signature.id,
      documentId: document.id,
      emailUsed,
      originalFilename: document.originalName,
      savedPath: '',
      createdAt: signature.createdAt,
      error: '',
    };

    if (!document.id) {
      const row: LogRow = { ...base, status: 'error', error: 'Document has no id' };
      this.emit('documentFailed', { row });
      return row;
    }

    if (this.config.onExisting === 'skip') {
      const previous = context.ledger.savedPathFor(signature.id, document.id);
      if (previous && (await fs.pathExists(previous))) {
        const row: LogRow = { ...base, savedPath: previous, status: 'skipped_exists' };
        this.emit('documentSkipped', { row });
        return row;
      }
    }

    const savedPath = await context.paths.uniquePathIn(context.outputDir, nameFor(emails, document.originalName));
    try {
      const bytes = await this.downloadSignedDocument(signature.id, document.id);
      await fs.writeFile(savedPath, bytes);
      const row: LogRow = { ...base, savedPath, status: 'downloaded' };
      this.emit('documentDownloaded', { row, file: { path: savedPath, document, emailUsed } });
      return row;
    } catch (error) {
      const row: LogRow = { ...base, savedPath, status: 'error', error: errorMessage(error) };
      this.emit('documentFailed', { row });
      return row;
    }
  }
}
