import type { LoadResult } from './types';

export type EtlErrorCode =
  | 'ConfigurationError'
  | 'SourceUnavailable'
  | 'MalformedSource'
  | 'SinkUnavailable';

export class EtlError extends Error {
  public readonly code: EtlErrorCode;

  constructor(code: EtlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends EtlError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigurationError', `Invalid ETL configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

export class SourceUnavailableError extends EtlError {
  constructor(source: string, cause?: unknown) {
    super('SourceUnavailable', `Input source cannot be opened: ${source}`, { cause });
  }
}

export class MalformedSourceError extends EtlError {
  constructor(message: string, cause?: unknown) {
    super('MalformedSource', message, { cause });
  }
}

/**
 * Raised by the loader once the sink stays unreachable after every retry.
 * `partial` holds what the interrupted load call committed before giving up.
 */
export class SinkUnavailableError extends EtlError {
  public readonly partial: LoadResult;

  constructor(message: string, partial: LoadResult, cause?: unknown) {
    super('SinkUnavailable', message, { cause });
    this.partial = partial;
  }
}

// Node socket errors plus SQLSTATE classes 08 (connection), 53 (resources),
// 57P (operator intervention) and the two retryable transaction rollbacks.
const TRANSIENT_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

const TRANSIENT_SQLSTATES = new Set(['40001', '40P01']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientSinkError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined) {
    if (TRANSIENT_NODE_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
    if (/^(08|53)[0-9A-Z]{3}$/.test(code) || code.startsWith('57P')) return true;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return (
    message.includes('connection terminated') ||
    message.includes('connection timeout') ||
    message.includes('timeout exceeded when trying to connect') ||
    message.includes('socket hang up')
  );
}

export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof EtlError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: errorCode(error) ?? error.name, message: error.message };
  }
  return { code: 'Unknown', message: String(error) };
}
