import type { Capability, FetchFilters, SourceAdapter } from '../adapter.js';
import { toSourceError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { SourceItem } from '../models.js';

import { CliRunner, type CliRunnerOptions } from './cli.js';

export type CliAdapterOptions = Omit<CliRunnerOptions, 'authHint' | 'installHint' | 'logger'> & {
  /** Binary override (defaults to the platform CLI name). */
  bin?: string;
  logger?: Logger;
  /** Pre-built runner; replaces `bin` and the runner options. */
  cli?: CliRunner;
};

/**
 * Shared behaviour of adapters backed by a platform CLI: availability is a
 * PATH lookup, auth is one `… auth status` call.
 */
export abstract class CliSourceAdapter implements SourceAdapter {
  abstract readonly name: string;
  abstract readonly capabilities: ReadonlySet<Capability>;

  protected readonly cli: CliRunner;
  protected readonly logger: Logger;

  protected constructor(
    defaults: { bin: string; authHint: string; installHint: string; component: string },
    opts: CliAdapterOptions = {},
  ) {
    this.logger = (opts.logger ?? silentLogger).child({ adapter: defaults.component });
    this.cli =
      opts.cli ??
      new CliRunner(opts.bin ?? defaults.bin, {
        limiter: opts.limiter,
        timeoutMs: opts.timeoutMs,
        killGraceMs: opts.killGraceMs,
        lookup: opts.lookup,
        authHint: defaults.authHint,
        installHint: defaults.installHint,
        logger: this.logger,
      });
  }

  /** Arguments of the lightweight auth probe. */
  protected abstract authStatusArgs(): readonly string[];

  abstract fetch(filters: FetchFilters): Promise<SourceItem[]>;

  async isAvailable(): Promise<boolean> {
    return this.cli.isInstalled();
  }

  async checkAuth(): Promise<boolean> {
    try {
      await this.cli.run(this.authStatusArgs());
      this.logger.debug('authenticated');
      return true;
    } catch (err: unknown) {
      const error = toSourceError(err, this.cli.bin);
      this.logger.warn({ kind: error.kind, details: error.details }, 'auth check failed');
      return false;
    }
  }
}
