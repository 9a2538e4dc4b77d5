/**
 * errors.ts — Typed failure taxonomy shared by every layer.
 *
 * Each class carries a stable `tag` so an outward facade can map failures
 * onto its own responses without `instanceof` chains:
 *
 *   AuthError          session could not be established / refreshed
 *   CloudflareError    block page detected
 *   DiscoveryError     site shape changed, identifiers unresolved
 *     ModelNotFoundError
 *   UploadError        tagged with the failing phase
 *   TransientError     network / 5xx, caller may retry with backoff
 *     LockTimeoutError   browser slot not acquired in time
 *     TokenTimeoutError  challenge token not produced in time
 *   HttpError          anything else non-2xx
 *     RateLimitError
 *   StreamError        wire stream ended in an error event (buffered mode)
 *   UnsupportedInputError
 */

export type ErrorTag =
  | 'auth'
  | 'cloudflare'
  | 'discovery'
  | 'model-not-found'
  | 'upload'
  | 'transient'
  | 'lock-timeout'
  | 'token-timeout'
  | 'http'
  | 'rate-limit'
  | 'stream'
  | 'unsupported-input';

export abstract class ArenaError extends Error {
  abstract readonly tag: ErrorTag;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends ArenaError {
  readonly tag: ErrorTag = 'auth';
}

export class CloudflareError extends ArenaError {
  readonly tag: ErrorTag = 'cloudflare';
}

export class DiscoveryError extends ArenaError {
  readonly tag: ErrorTag = 'discovery';
}

export class ModelNotFoundError extends DiscoveryError {
  override readonly tag: ErrorTag = 'model-not-found';

  constructor(readonly model: string) {
    super(`Unknown model: "${model}"`);
  }
}

// ─── Upload ─────────────────────────────────────────────────

export type UploadPhase = 'slot' | 'transfer' | 'sign';

export class UploadError extends ArenaError {
  readonly tag: ErrorTag = 'upload';

  constructor(
    readonly phase: UploadPhase,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Upload failed during ${phase}: ${message}`, options);
  }
}

// ─── Transient ──────────────────────────────────────────────

export class TransientError extends ArenaError {
  readonly tag: ErrorTag = 'transient';
}

export class LockTimeoutError extends TransientError {
  override readonly tag: ErrorTag = 'lock-timeout';

  constructor(readonly operation: string, readonly waitedMs: number) {
    super(`Browser worker busy: "${operation}" waited ${waitedMs}ms without acquiring the slot`);
  }
}

export class TokenTimeoutError extends TransientError {
  override readonly tag: ErrorTag = 'token-timeout';

  constructor(readonly purpose: string, readonly timeoutMs: number) {
    super(`Challenge token for "${purpose}" not produced within ${timeoutMs}ms`);
  }
}

// ─── HTTP ───────────────────────────────────────────────────

export class HttpError extends ArenaError {
  readonly tag: ErrorTag = 'http';

  constructor(
    readonly status: number,
    readonly body: string,
    message?: string,
  ) {
    super(message ?? `HTTP ${status}: ${summarizeBody(body)}`);
  }
}

export class RateLimitError extends HttpError {
  override readonly tag: ErrorTag = 'rate-limit';
}

// ─── Stream / input ─────────────────────────────────────────

export class StreamError extends ArenaError {
  readonly tag: ErrorTag = 'stream';

  constructor(
    message: string,
    /** Text delivered before the stream failed. */
    readonly partialText: string,
    /** Resume key observed before the failure, if any. */
    readonly evaluationSessionId: string | null,
  ) {
    super(message);
  }
}

export class UnsupportedInputError extends ArenaError {
  readonly tag: ErrorTag = 'unsupported-input';
}

/** Narrow an unknown thrown value to its message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function summarizeBody(body: string): string {
  const compact = body.replace(/\s+/g, ' ').trim();
  return compact.length > 300 ? `${compact.slice(0, 300)}…` : compact || '(empty body)';
}
