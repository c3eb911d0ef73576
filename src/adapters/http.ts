import { AuthError, ParseError, TransientError } from '../errors.js';
import { defaultLimiter, type Limiter } from '../limiter.js';
import { silentLogger, type Logger } from '../logger.js';

import { DEFAULT_TIMEOUT_MS } from './cli.js';

export type HttpRunnerOptions = {
  /** Source name used in errors and logs, e.g. `todoist`. */
  source: string;
  baseUrl: string;
  token: string;
  /** Defaults to the process-wide pool shared with the CLI runners. */
  limiter?: Limiter;
  timeoutMs?: number;
  authHint?: string;
  headers?: Record<string, string>;
  logger?: Logger;
};

/**
 * Bearer-token JSON client for API-backed sources.
 * Uses Node 20 native fetch.
 */
export class HttpRunner {
  private readonly source: string;
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly limiter: Limiter;
  private readonly timeoutMs: number;
  private readonly authHint?: string;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(opts: HttpRunnerOptions) {
    this.source = opts.source;
    this.baseUrl = opts.baseUrl.endsWith('/') ? opts.baseUrl : `${opts.baseUrl}/`;
    this.token = opts.token;
    this.limiter = opts.limiter ?? defaultLimiter();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.authHint = opts.authHint;
    this.headers = opts.headers ?? {};
    this.logger = (opts.logger ?? silentLogger).child({ source: opts.source });
  }

  buildUrl(path: string, params?: Record<string, string | undefined>): URL {
    const url = new URL(path.replace(/^\//, ''), this.baseUrl);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
    return url;
  }

  async getJson(path: string, params?: Record<string, string | undefined>): Promise<unknown> {
    const url = this.buildUrl(path, params);

    // The permit covers the whole exchange, body included.
    return this.limiter.run(async () => {
      const startedAt = Date.now();
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: `Bearer ${this.token}`,
            ...this.headers,
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err: unknown) {
        throw this.networkError(err);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (err: unknown) {
        throw this.networkError(err);
      }

      this.logger.debug({ path: url.pathname, status: response.status, durationMs: Date.now() - startedAt }, 'request finished');

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(this.source, { hint: this.authHint, details: `HTTP ${response.status}: ${text.slice(0, 500)}` });
      }
      if (response.status === 404) {
        throw new TransientError(this.source, 'not_found', { details: `HTTP 404 from GET ${url.pathname}` });
      }
      if (!response.ok) {
        throw new TransientError(this.source, 'http', {
          userMessage: `${this.source} request failed (HTTP ${response.status})`,
          details: `HTTP ${response.status} ${response.statusText} from GET ${url.pathname}: ${text.slice(0, 500)}`,
        });
      }

      if (text.trim().length === 0) return null;
      try {
        return JSON.parse(text);
      } catch (err: unknown) {
        throw new ParseError(this.source, err instanceof Error ? err.message : String(err));
      }
    });
  }

  private networkError(err: unknown): TransientError {
    const name = err instanceof Error ? err.name : '';
    const message = err instanceof Error ? err.message : String(err);
    if (name === 'TimeoutError' || name === 'AbortError') {
      return new TransientError(this.source, 'timeout', {
        userMessage: `${this.source} timed out after ${Math.round(this.timeoutMs / 1000)}s`,
        details: message,
      });
    }
    return new TransientError(this.source, 'network', { details: message });
  }
}
