export class SignaturitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignaturitError';
  }
}

export class ConfigurationError extends SignaturitError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NetworkError extends SignaturitError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/** Raised for any HTTP response the caller cannot work with. */
export class ApiResponseError extends SignaturitError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'ApiResponseError';
    this.status = status;
    this.body = body;
  }
}

export class ListingError extends ApiResponseError {
  constructor(status: number, body: string, reason = 'Failed to list signatures') {
    super(`${reason}: ${status} ${body}`.trim(), status, body);
    this.name = 'ListingError';
  }
}

export class DetailFetchError extends ApiResponseError {
  constructor(signatureId: string, status: number, body: string) {
    super(`Failed to fetch signature detail ${signatureId}: ${status} ${body}`.trim(), status, body);
    this.name = 'DetailFetchError';
  }
}

export class DownloadError extends ApiResponseError {
  constructor(status: number, body: string) {
    super(`Download failed (${status}): ${body}`.trim(), status, body);
    this.name = 'DownloadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
