export type SourceErrorKind = 'not_installed' | 'auth' | 'transient' | 'parse';

export type TransientReason = 'timeout' | 'signal' | 'exit' | 'network' | 'http' | 'not_found';

/**
 * Base of every failure an adapter (or the runners beneath it) can report.
 *
 * `userMessage` is what a section shows; `details` carries stderr or the
 * underlying cause and only ever reaches the log.
 */
export abstract class SourceError extends Error {
  abstract readonly kind: SourceErrorKind;
  readonly source: string;
  readonly userMessage: string;
  readonly details?: string;

  constructor(opts: { source: string; userMessage: string; details?: string; message?: string }) {
    super(opts.message ?? opts.userMessage);
    this.source = opts.source;
    this.userMessage = opts.userMessage;
    this.details = opts.details;
  }
}

export class NotInstalledError extends SourceError {
  override name = 'NotInstalledError';
  readonly kind = 'not_installed';

  constructor(bin: string, hint?: string) {
    super({
      source: bin,
      userMessage: `${bin} is not installed${hint ? ` (${hint})` : ''}`,
      message: `Required binary not found on PATH: ${bin}`,
    });
  }
}

export class AuthError extends SourceError {
  override name = 'AuthError';
  readonly kind = 'auth';

  constructor(source: string, opts: { hint?: string; details?: string } = {}) {
    super({
      source,
      userMessage: `${source} is not authenticated${opts.hint ? ` (run: ${opts.hint})` : ''}`,
      details: opts.details,
    });
  }
}

export class TransientError extends SourceError {
  override name = 'TransientError';
  readonly kind = 'transient';
  readonly reason: TransientReason;

  constructor(source: string, reason: TransientReason, opts: { userMessage?: string; details?: string } = {}) {
    super({
      source,
      userMessage: opts.userMessage ?? defaultTransientMessage(source, reason),
      details: opts.details,
    });
    this.reason = reason;
  }
}

export class ParseError extends SourceError {
  override name = 'ParseError';
  readonly kind = 'parse';

  constructor(source: string, details?: string) {
    super({ source, userMessage: `${source} returned output that could not be read`, details });
  }
}

export class ConfigError extends Error {
  override name = 'ConfigError';
}

function defaultTransientMessage(source: string, reason: TransientReason): string {
  switch (reason) {
    case 'timeout':
      return `${source} timed out`;
    case 'signal':
      return `${source} was terminated`;
    case 'network':
      return `${source} is unreachable`;
    case 'not_found':
      return `${source} resource not found`;
    case 'http':
    case 'exit':
      return `${source} failed`;
  }
}

const AUTH_FAILURE_PATTERNS: readonly RegExp[] = [
  /not authenticated/i,
  /not logged in/i,
  /unauthori[sz]ed/i,
  /authentication (?:failed|required)/i,
  /invalid (?:api )?token/i,
  /token (?:is )?(?:invalid|expired)/i,
  /\b401\b/,
  /auth login/i,
  /please log ?in/i,
];

/**
 * Exit codes are ambiguous across CLIs (gh, glab and acli all exit 1 for
 * auth and non-auth failures), so authentication failures are recognised
 * by the text the tools print.
 */
export function isAuthFailureText(text: string): boolean {
  return AUTH_FAILURE_PATTERNS.some((re) => re.test(text));
}

export function toSourceError(err: unknown, source: string): SourceError {
  if (err instanceof SourceError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientError(source, 'exit', { details: message });
}
