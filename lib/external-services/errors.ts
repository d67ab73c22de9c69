/**
 * Resolution pipeline error taxonomy
 *
 * Stages catch these and report "no candidate"; only LookupAbortedError
 * leaves the orchestrator, when the caller has gone away. An auth
 * rejection triggers a credential refresh; a bot page abandons one
 * search engine.
 */

export type ResolverErrorCode =
  | 'NETWORK_FAILURE'
  | 'AUTH_REJECTED'
  | 'RATE_LIMIT_TIMEOUT'
  | 'CORRUPT_STATE'
  | 'BOT_PROTECTION_DETECTED'
  | 'LOOKUP_ABORTED';

export class ResolverError extends Error {
  readonly code: ResolverErrorCode;

  constructor(code: ResolverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResolverError';
    this.code = code;
  }
}

/**
 * Connection failure or timeout that survived the retry budget
 */
export class NetworkFailureError extends ResolverError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'network failure';
    // Query strings can carry API keys
    const bareUrl = url.split('?')[0];
    super('NETWORK_FAILURE', `Request to ${bareUrl} failed: ${reason}`, { cause });
    this.name = 'NetworkFailureError';
    this.url = bareUrl;
  }
}

export class AuthRejectedError extends ResolverError {
  readonly status: number;

  constructor(status: number) {
    super('AUTH_REJECTED', `Upstream rejected credentials (HTTP ${status})`);
    this.name = 'AuthRejectedError';
    this.status = status;
  }
}

export class RateLimitTimeoutError extends ResolverError {
  readonly host: string;
  readonly waitedMs: number;

  constructor(host: string, waitedMs: number) {
    super('RATE_LIMIT_TIMEOUT', `No request token for ${host} within ${waitedMs}ms`);
    this.name = 'RateLimitTimeoutError';
    this.host = host;
    this.waitedMs = waitedMs;
  }
}

/**
 * Malformed cache or credential file
 */
export class CorruptStateError extends ResolverError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('CORRUPT_STATE', `Corrupt state file: ${path}`, { cause });
    this.name = 'CorruptStateError';
    this.path = path;
  }
}

export class BotProtectionDetectedError extends ResolverError {
  readonly engine: string;
  readonly signature: string;

  constructor(engine: string, signature: string) {
    super('BOT_PROTECTION_DETECTED', `${engine} served a bot challenge (${signature})`);
    this.name = 'BotProtectionDetectedError';
    this.engine = engine;
    this.signature = signature;
  }
}

export class LookupAbortedError extends ResolverError {
  readonly stage: string;

  constructor(stage: string) {
    super('LOOKUP_ABORTED', `Lookup abandoned before ${stage}`);
    this.name = 'LookupAbortedError';
    this.stage = stage;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
