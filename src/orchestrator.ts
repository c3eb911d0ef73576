import type { SourceAdapter } from './adapter.js';
import type { SnapshotPort } from './core/ports.js';
import type { DetectionRegistry } from './detection.js';
import { toSourceError, type SourceError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { sortSourceItems, type SourceItem } from './models.js';
import {
  SectionStateMachine,
  type SectionListener,
  type SectionState,
  type TerminalSectionState,
} from './section_state.js';
import { DEFAULT_SECTIONS, type SectionDefinition } from './sections.js';

export type AdapterOutcome =
  | { adapter: string; ok: true; items: SourceItem[] }
  | { adapter: string; ok: false; error: SourceError };

export type RefreshOutcome =
  | { kind: 'settled'; sectionId: string; generation: number; state: TerminalSectionState }
  | { kind: 'discarded'; sectionId: string; generation: number; currentGeneration: number };

export type RefreshOptions = {
  /** Drop cached detection results before resolving adapters. */
  recheck?: boolean;
};

/**
 * Fold one generation's adapter outcomes into a terminal state.
 *
 * - any items            -> data (open first, then by display key)
 * - no items, >=1 success -> empty
 * - every adapter failed -> error
 */
export function mergeOutcomes(outcomes: readonly AdapterOutcome[]): TerminalSectionState {
  const items: SourceItem[] = [];
  const errors: SourceError[] = [];
  let succeeded = 0;

  for (const outcome of outcomes) {
    if (outcome.ok) {
      succeeded += 1;
      items.push(...outcome.items);
    } else {
      errors.push(outcome.error);
    }
  }

  if (items.length > 0) return { kind: 'data', items: sortSourceItems(items) };
  if (succeeded > 0) return { kind: 'empty' };

  const messages = [...new Set(errors.map((e) => e.userMessage))];
  const details = errors.map((e) => `${e.source}: ${e.details ?? e.message}`);
  return { kind: 'error', message: messages.join('; ') || 'No sources responded', details };
}

type SectionEntry = {
  definition: SectionDefinition;
  machine: SectionStateMachine;
  /** Tail of this section's snapshot writes; they run one at a time in settle order. */
  saving: Promise<void>;
  savedGeneration: number;
};

export type FetchOrchestratorOptions = {
  registry: DetectionRegistry;
  sections?: readonly SectionDefinition[];
  snapshots?: SnapshotPort;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Per-section coordinator: each refresh starts a new generation, fans out
 * to every eligible adapter, joins, merges, and settles the section only if
 * no newer refresh started in the meantime. In-flight calls of a superseded
 * generation are left to finish (or time out); their results are dropped.
 */
export class FetchOrchestrator {
  private readonly registry: DetectionRegistry;
  private readonly entries = new Map<string, SectionEntry>();
  private readonly snapshots?: SnapshotPort;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: FetchOrchestratorOptions) {
    this.registry = opts.registry;
    this.snapshots = opts.snapshots;
    this.logger = (opts.logger ?? silentLogger).child({ component: 'orchestrator' });
    this.now = opts.now ?? (() => new Date());

    for (const definition of opts.sections ?? DEFAULT_SECTIONS) {
      if (this.entries.has(definition.id)) {
        throw new Error(`Duplicate section id: ${definition.id}`);
      }
      this.entries.set(definition.id, {
        definition,
        machine: new SectionStateMachine(definition.id),
        saving: Promise.resolve(),
        savedGeneration: 0,
      });
    }
  }

  sections(): SectionDefinition[] {
    return [...this.entries.values()].map((e) => e.definition);
  }

  currentState(sectionId: string): SectionState {
    return this.entry(sectionId).machine.state;
  }

  currentGeneration(sectionId: string): number {
    return this.entry(sectionId).machine.generation;
  }

  /** Listen to every section's transitions. */
  subscribe(listener: SectionListener): () => void {
    const unsubscribers = [...this.entries.values()].map((e) => e.machine.subscribe(listener));
    return () => {
      for (const off of unsubscribers) off();
    };
  }

  async refreshAll(opts: RefreshOptions = {}): Promise<RefreshOutcome[]> {
    if (opts.recheck) this.registry.clear();
    return Promise.all([...this.entries.keys()].map((id) => this.triggerRefresh(id)));
  }

  /**
   * Start a new generation for `sectionId`. Resolves once that generation
   * settled or was superseded; never rejects for adapter failures.
   */
  async triggerRefresh(sectionId: string, opts: RefreshOptions = {}): Promise<RefreshOutcome> {
    const entry = this.entry(sectionId);
    const { definition, machine } = entry;
    const generation = machine.generation + 1;
    machine.begin(generation);
    if (opts.recheck) this.registry.clear();

    const log = this.logger.child({ section: sectionId, generation });
    log.debug('refresh started');

    let state: TerminalSectionState;
    try {
      state = await this.fetchSection(definition, generation, log);
    } catch (err: unknown) {
      log.error({ err }, 'refresh failed unexpectedly');
      state = { kind: 'error', message: `Could not load ${definition.title}` };
    }

    if (!machine.settle(generation, state)) {
      log.debug({ currentGeneration: machine.generation }, 'discarding stale result');
      return { kind: 'discarded', sectionId, generation, currentGeneration: machine.generation };
    }

    log.info({ state: state.kind, count: state.kind === 'data' ? state.items.length : 0 }, 'section settled');
    await this.saveSnapshot(entry, generation, state, log);
    return { kind: 'settled', sectionId, generation, state };
  }

  private entry(sectionId: string): SectionEntry {
    const entry = this.entries.get(sectionId);
    if (!entry) throw new Error(`Unknown section: ${sectionId}`);
    return entry;
  }

  private async fetchSection(definition: SectionDefinition, generation: number, log: Logger): Promise<TerminalSectionState> {
    const available = await this.registry.getAvailable();
    const eligible = this.registry
      .adapters(available)
      .filter((adapter) => adapter.capabilities.has(definition.capability));

    if (eligible.length === 0) {
      return {
        kind: 'error',
        message: `No sources available for ${definition.title}`,
        details: this.unavailableReasons(definition),
      };
    }

    log.debug({ adapters: eligible.map((a) => a.name) }, 'fetching');
    const outcomes = await Promise.all(eligible.map((adapter) => this.runAdapter(adapter, definition, generation, log)));
    return mergeOutcomes(outcomes);
  }

  private async runAdapter(
    adapter: SourceAdapter,
    definition: SectionDefinition,
    generation: number,
    log: Logger,
  ): Promise<AdapterOutcome> {
    const startedAt = Date.now();
    try {
      const items = await adapter.fetch(definition.filters);
      log.debug({ adapter: adapter.name, count: items.length, durationMs: Date.now() - startedAt }, 'adapter fetched');
      return { adapter: adapter.name, ok: true, items };
    } catch (err: unknown) {
      const error = toSourceError(err, adapter.name);
      log.warn(
        { adapter: adapter.name, kind: error.kind, details: error.details, generation, durationMs: Date.now() - startedAt },
        'adapter fetch failed',
      );
      return { adapter: adapter.name, ok: false, error };
    }
  }

  private unavailableReasons(definition: SectionDefinition): string[] {
    const results = this.registry.cached();
    return this.registry
      .adapters()
      .filter((adapter) => adapter.capabilities.has(definition.capability))
      .map((adapter) => {
        const r = results?.get(adapter.name);
        if (!r || !r.installed) return `${adapter.name}: not installed`;
        return `${adapter.name}: not authenticated`;
      });
  }

  private saveSnapshot(entry: SectionEntry, generation: number, state: TerminalSectionState, log: Logger): Promise<void> {
    const snapshots = this.snapshots;
    if (!snapshots || state.kind === 'error') return Promise.resolve();

    const sectionId = entry.definition.id;
    const savedAt = this.now();
    entry.saving = entry.saving.then(async () => {
      // A newer generation already wrote its items.
      if (generation <= entry.savedGeneration) {
        log.debug({ savedGeneration: entry.savedGeneration }, 'skipping stale snapshot');
        return;
      }
      try {
        await snapshots.save(sectionId, state.kind === 'data' ? state.items : [], savedAt);
        entry.savedGeneration = generation;
      } catch (err: unknown) {
        log.warn({ err }, 'could not save snapshot');
      }
    });
    return entry.saving;
  }
}
