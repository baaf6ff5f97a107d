export const DEFAULT_CONFIG = {
  environment: 'production' as const,
  outputRoot: './signaturit_downloads',
  pageLimit: 100,
  maxAttempts: 5,
  retryDelay: 1500,
  timeout: 60000,
  onExisting: 'skip' as const,
};

export const API_ENDPOINTS = {
  production: 'https://api.signaturit.com/v3',
  sandbox: 'https://api.sandbox.signaturit.com/v3',
};

export const TOKEN_ENV_VAR = 'SIGNATURIT_API_TOKEN';
export const TOKEN_PLACEHOLDER = 'PASTE_YOUR_TOKEN_HERE';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const HTTP_STATUS = {
  OK: 200,
  UNAUTHORIZED: 401,
} as const;

export const MAX_PAGE_LIMIT = 100;

export const LEDGER_FILE = 'download_log.csv';
export const NO_EMAIL_DIR = '_no_email_samples';
export const DEFAULT_FILENAME = 'document.pdf';

export const LEDGER_HEADER = [
  'signature_id',
  'document_id',
  'email_used',
  'original_filename',
  'saved_path',
  'created_at',
  'status',
  'error',
] as const;
