import type { ErrorEntry } from './types.js';

/**
 * Raised by providers and the HTTP helpers when a source cannot be read.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class MissingCredentialsError extends Error {
  constructor(what: string) {
    super(`${what} is not configured`);
    this.name = 'MissingCredentialsError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Per-request error accumulator. Every response carries its entries so the UI
 * can show partial success.
 */
export class ErrorLog {
  private readonly entries: ErrorEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  push(where: string, error: unknown): void {
    const stacktrace = error instanceof Error ? error.stack ?? '' : '';
    this.entries.push({
      timestamp: this.now().toISOString(),
      where,
      message: describeError(error),
      stacktrace,
    });
    console.error(`   [errors] ❌ ${where}: ${describeError(error)}`);
  }

  get size(): number {
    return this.entries.length;
  }

  toJSON(): ErrorEntry[] {
    return [...this.entries];
  }
}

/**
 * Best-effort remediation hint for a failed provider run.
 */
export function classifyError(error: unknown): string {
  if (error instanceof MissingCredentialsError) return 'missing credentials';
  if (error instanceof FetchError && error.status !== undefined) {
    if (error.status === 401 || error.status === 403 || error.status === 429) return 'blocked';
    if (error.status === 404 || error.status === 410) return 'not found';
    if (error.status >= 500) return 'network';
  }

  const name = error instanceof Error ? error.name : '';
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();

  if (
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('timed out')
  ) {
    return 'timeout';
  }
  const unparsable = message.includes('parse') || message.includes('unexpected token');
  if (error instanceof SyntaxError || unparsable) {
    return 'parse error';
  }
  if (message.includes('captcha') || message.includes('forbidden') || message.includes('blocked')) {
    return 'blocked';
  }
  if (
    error instanceof FetchError ||
    message.includes('enotfound') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('fetch failed')
  ) {
    return 'network';
  }
  return '';
}
