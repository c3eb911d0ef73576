import type { SourceAdapter } from './adapter.js';
import { silentLogger, type Logger } from './logger.js';

export type DetectionResult = {
  installed: boolean;
  authenticated: boolean;
  checkedAt: Date;
};

export type DetectionRegistryOptions = {
  logger?: Logger;
  now?: () => Date;
};

function copyResults(results: ReadonlyMap<string, DetectionResult>): Map<string, DetectionResult> {
  return new Map(
    [...results].map(([name, r]) => [name, { installed: r.installed, authenticated: r.authenticated, checkedAt: new Date(r.checkedAt) }]),
  );
}

/**
 * Answers "which adapters can I use right now" without re-probing on every
 * query. There is no TTL: results stay cached until an adapter is
 * registered or `clear()` is called.
 */
export class DetectionRegistry {
  private readonly registered = new Map<string, SourceAdapter>();
  private cache: Map<string, DetectionResult> | null = null;
  private inFlight: Promise<Map<string, DetectionResult>> | null = null;
  /** Bumped on every invalidation so a detection started earlier does not repopulate the cache. */
  private epoch = 0;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: DetectionRegistryOptions = {}) {
    this.logger = (opts.logger ?? silentLogger).child({ component: 'detection' });
    this.now = opts.now ?? (() => new Date());
  }

  register(adapter: SourceAdapter): void {
    this.registered.set(adapter.name, adapter);
    this.clear();
  }

  /** Explicit recheck: the next query probes again. */
  clear(): void {
    this.epoch += 1;
    this.cache = null;
    this.inFlight = null;
  }

  names(): string[] {
    return [...this.registered.keys()];
  }

  adapters(names?: Iterable<string>): SourceAdapter[] {
    if (!names) return [...this.registered.values()];
    const out: SourceAdapter[] = [];
    for (const name of names) {
      const adapter = this.registered.get(name);
      if (adapter) out.push(adapter);
    }
    return out;
  }

  /** Cached results without probing; `null` before the first detection. */
  cached(): Map<string, DetectionResult> | null {
    return this.cache ? copyResults(this.cache) : null;
  }

  async detectAll(): Promise<Map<string, DetectionResult>> {
    if (!this.inFlight) {
      const epoch = this.epoch;
      this.inFlight = this.probeAll().then((results) => {
        // clear() in the meantime already dropped this detection
        if (epoch === this.epoch) {
          this.cache = results;
          this.inFlight = null;
        }
        return results;
      });
    }

    return copyResults(await this.inFlight);
  }

  async getAvailable(): Promise<Set<string>> {
    const results = this.cache ?? (await this.detectAll());
    const names = new Set<string>();
    for (const [name, r] of results) {
      if (r.installed && r.authenticated) names.add(name);
    }
    return names;
  }

  private async probeAll(): Promise<Map<string, DetectionResult>> {
    const adapters = [...this.registered.values()];
    const probed = await Promise.all(adapters.map(async (adapter) => [adapter.name, await this.probe(adapter)] as const));
    const results = new Map(probed);
    this.logger.info(
      { results: Object.fromEntries([...results].map(([n, r]) => [n, { installed: r.installed, authenticated: r.authenticated }])) },
      'detection finished',
    );
    return results;
  }

  private async probe(adapter: SourceAdapter): Promise<DetectionResult> {
    let installed = false;
    let authenticated = false;
    try {
      installed = await adapter.isAvailable();
      if (installed) authenticated = await adapter.checkAuth();
    } catch (err: unknown) {
      this.logger.warn({ adapter: adapter.name, err }, 'detection probe failed');
    }
    return { installed, authenticated, checkedAt: this.now() };
  }
}
