import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { HTTP_STATUS, RETRYABLE_STATUSES } from './constants';
import { NetworkError } from './errors';

export type ResponseKind = 'json' | 'arraybuffer';
export type QueryParams = Record<string, string | number>;

export interface RetryNotice {
  attempt: number;
  delay: number;
  status: number;
  path: string;
}

/**
 * Outcome of a GET. `exhausted` carries the last retryable failure once the
 * attempt budget is spent; callers decide whether that is fatal.
 */
export type GetResult =
  | { kind: 'response'; response: AxiosResponse<unknown>; attempts: number }
  | { kind: 'exhausted'; response: AxiosResponse<unknown>; attempts: number };

export interface ApiClientOptions {
  baseUrl: string;
  token: string;
  maxAttempts: number;
  retryDelay: number;
  timeout: number;
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (notice: RetryNotice) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function isOk(result: GetResult): boolean {
  return result.kind === 'response' && result.response.status === HTTP_STATUS.OK;
}

export function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return JSON.stringify(data);
}

export class ApiClient {
  private http: AxiosInstance;
  private maxAttempts: number;
  private retryDelay: number;
  private sleep: (ms: number) => Promise<void>;
  private onRetry?: (notice: RetryNotice) => void;

  constructor(options: ApiClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      headers: { authorization: `Bearer ${options.token}` },
      // every status comes back as a response; only transport failures throw
      validateStatus: () => true,
      adapter: options.adapter,
    });
    this.maxAttempts = options.maxAttempts;
    this.retryDelay = options.retryDelay;
    this.sleep = options.sleep ?? sleep;
    this.onRetry = options.onRetry;
  }

  async get(path: string, params?: QueryParams, responseType: ResponseKind = 'json'): Promise<GetResult> {
    let delay = this.retryDelay;
    for (let attempt = 1; ; attempt++) {
      const response = await this.send(path, params, responseType);

      if (!RETRYABLE_STATUSES.has(response.status)) {
        return { kind: 'response', response, attempts: attempt };
      }
      if (attempt >= this.maxAttempts) {
        return { kind: 'exhausted', response, attempts: attempt };
      }

      this.onRetry?.({ attempt, delay, status: response.status, path });
      await this.sleep(delay);
      delay *= 2;
    }
  }

  private async send(path: string, params: QueryParams | undefined, responseType: ResponseKind) {
    try {
      return await this.http.get<unknown>(path, { params, responseType });
    } catch (error) {
      if (isAxiosError(error)) {
        throw new NetworkError(`Request to ${path} failed: ${error.message}`);
      }
      throw error;
    }
  }
}
