export type ErrorCode = 'AUTH' | 'NOT_FOUND' | 'TRANSPORT' | 'DATA' | 'CONFIG' | 'SOURCE';

export class IsrcLookupError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = 'IsrcLookupError';
  }
}

/** Client-credentials exchange failed; nothing can be looked up without a token. */
export class AuthError extends IsrcLookupError {
  constructor(message: string) {
    super(message, 'AUTH');
    this.name = 'AuthError';
  }
}

export class NotFoundError extends IsrcLookupError {
  constructor() {
    super('Track not found', 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** Connection failure, timeout or non-2xx status from the catalog. */
export class TransportError extends IsrcLookupError {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message, 'TRANSPORT');
    this.name = 'TransportError';
  }
}

export class TimeoutError extends TransportError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** A 2xx response whose body does not have the expected shape. */
export class DataError extends IsrcLookupError {
  constructor(message: string) {
    super(message, 'DATA');
    this.name = 'DataError';
  }
}

export class ConfigError extends IsrcLookupError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** The identifier input could not be read. */
export class SourceError extends IsrcLookupError {
  constructor(message: string) {
    super(message, 'SOURCE');
    this.name = 'SourceError';
  }
}

const REASON_LABELS: Partial<Record<ErrorCode, string>> = {
  AUTH: 'Auth Error',
  TRANSPORT: 'API Error',
  DATA: 'Data Error',
};

/**
 * Message of anything thrown, checked by shape: errors from Node's own modules may belong
 * to another realm, where `instanceof Error` is false.
 */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/** The `code` of a system error such as `ENOENT`, if it has one. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Text stored in a result record's `errorReason`.
 *
 * Not-found keeps its bare message; the other lookup errors are prefixed with their label
 * (`API Error: ...`). Anything that is not an `IsrcLookupError` is reported as an API error.
 */
export function reasonFor(err: unknown): string {
  if (err instanceof IsrcLookupError) {
    const label = REASON_LABELS[err.code];
    return label ? `${label}: ${err.message}` : err.message;
  }
  return `API Error: ${errorMessage(err)}`;
}
