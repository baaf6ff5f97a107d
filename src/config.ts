import { API_ENDPOINTS, DEFAULT_CONFIG, MAX_PAGE_LIMIT, TOKEN_ENV_VAR, TOKEN_PLACEHOLDER } from './constants';
import { ConfigurationError } from './errors';

export type Environment = keyof typeof API_ENDPOINTS;
export type ExistingFilePolicy = 'skip' | 'rename';

export interface SignaturitConfigOptions {
  token?: string;
  environment?: Environment;
  outputRoot?: string;
  year?: number;
  pageLimit?: number;
  maxAttempts?: number;
  retryDelay?: number;
  timeout?: number;
  onExisting?: ExistingFilePolicy;
}

const ENVIRONMENTS: readonly Environment[] = ['production', 'sandbox'];
const POLICIES: readonly ExistingFilePolicy[] = ['skip', 'rename'];

function toEnvironment(value: string): Environment {
  const match = ENVIRONMENTS.find(env => env === value);
  if (!match) throw new ConfigurationError('Environment must be either "production" or "sandbox"');
  return match;
}

export function parseExistingPolicy(value: string): ExistingFilePolicy {
  const match = POLICIES.find(policy => policy === value);
  if (!match) throw new ConfigurationError('onExisting must be either "skip" or "rename"');
  return match;
}

export function assertValidYear(year: number): void {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new ConfigurationError(`Year must be a four-digit integer, got ${year}`);
  }
}

export function isUsableToken(token: string): boolean {
  return token.length > 0 && !token.includes(TOKEN_PLACEHOLDER);
}

export function maskToken(token: string): string {
  if (!token) return '<empty>';
  if (token.length <= 12) return token;
  return `${token.slice(0, 6)}...${token.slice(-4)}`;
}

export class SignaturitConfig {
  token: string;
  environment: Environment;
  outputRoot: string;
  year: number;
  pageLimit: number;
  maxAttempts: number;
  retryDelay: number;
  timeout: number;
  onExisting: ExistingFilePolicy;

  constructor(config: SignaturitConfigOptions = {}, now: Date = new Date()) {
    this.token = (config.token || process.env[TOKEN_ENV_VAR] || '').replace('Bearer ', '').trim();
    this.environment = toEnvironment(
      config.environment || process.env.SIGNATURIT_ENVIRONMENT || DEFAULT_CONFIG.environment
    );
    this.outputRoot = config.outputRoot || process.env.SIGNATURIT_OUTPUT_ROOT || DEFAULT_CONFIG.outputRoot;
    this.year = config.year ?? now.getFullYear();
    this.pageLimit = config.pageLimit ?? DEFAULT_CONFIG.pageLimit;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_CONFIG.maxAttempts;
    this.retryDelay = config.retryDelay ?? DEFAULT_CONFIG.retryDelay;
    this.timeout = config.timeout ?? DEFAULT_CONFIG.timeout;
    this.onExisting = parseExistingPolicy(config.onExisting || DEFAULT_CONFIG.onExisting);

    this.validate();
  }

  validate(): void {
    if (!isUsableToken(this.token)) {
      throw new ConfigurationError(
        `No API token set. Either set ${TOKEN_ENV_VAR} or pass a token (replace ${TOKEN_PLACEHOLDER}).`
      );
    }
    assertValidYear(this.year);
    if (!Number.isInteger(this.pageLimit) || this.pageLimit < 1 || this.pageLimit > MAX_PAGE_LIMIT) {
      throw new ConfigurationError(`pageLimit must be between 1 and ${MAX_PAGE_LIMIT}`);
    }
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new ConfigurationError('maxAttempts must be at least 1');
    }
    if (this.retryDelay < 0) throw new ConfigurationError('retryDelay must be non-negative');
    if (this.timeout < 1) throw new ConfigurationError('timeout must be at least 1ms');
  }

  getBaseUrl(): string {
    return API_ENDPOINTS[this.environment];
  }
}
