/**
 * Error taxonomy
 *
 * ConfigurationError: missing API key, invalid settings. Fatal at startup.
 * FileLoadError: a prompt, template or recipients file is missing or unparsable.
 * ApiError: everything the chat client can raise. `kind` tells them apart:
 *  - transport: no HTTP status (refused, DNS, timeout, closed client)
 *  - protocol: non-2xx status
 *  - decode: 2xx body that does not have the expected shape
 *  - invalid_request: rejected before anything was sent
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class FileLoadError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileLoadError';
    this.path = path;
  }
}

export type ApiErrorKind = 'transport' | 'protocol' | 'decode' | 'invalid_request';

export interface ApiErrorOptions {
  statusCode?: number;
  response?: unknown;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly statusCode?: number;
  readonly response?: unknown;

  constructor(kind: ApiErrorKind, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.response = options.response;
  }
}

/**
 * Transport failures, rate limiting and server errors are worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof ApiError)) {
    return false;
  }
  if (error.kind === 'transport') {
    return true;
  }
  if (error.kind === 'protocol' && error.statusCode !== undefined) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
