import type { SourceItem } from './models.js';

export type SectionState =
  | { kind: 'loading' }
  | { kind: 'empty' }
  | { kind: 'error'; message: string; details?: string[] }
  | { kind: 'data'; items: readonly SourceItem[] };

export type TerminalSectionState = Exclude<SectionState, { kind: 'loading' }>;

export type SectionSnapshot = {
  sectionId: string;
  generation: number;
  state: SectionState;
};

export type SectionListener = (snapshot: SectionSnapshot) => void;

/**
 * UI-facing state of one section. Only the orchestrator drives it; every
 * transition is tagged with the generation that caused it.
 *
 * loading --settle(g)--> data | empty | error   (terminal until the next begin)
 */
export class SectionStateMachine {
  readonly sectionId: string;
  private generationValue = 0;
  private stateValue: SectionState = { kind: 'loading' };
  private readonly listeners = new Set<SectionListener>();

  constructor(sectionId: string) {
    this.sectionId = sectionId;
  }

  get generation(): number {
    return this.generationValue;
  }

  get state(): SectionState {
    return this.stateValue;
  }

  snapshot(): SectionSnapshot {
    return { sectionId: this.sectionId, generation: this.generationValue, state: this.stateValue };
  }

  /** Enter `loading` for a newer generation. */
  begin(generation: number): boolean {
    if (generation <= this.generationValue) return false;
    this.generationValue = generation;
    this.transition({ kind: 'loading' });
    return true;
  }

  /** Apply a terminal state; ignored unless `generation` is current and still loading. */
  settle(generation: number, state: TerminalSectionState): boolean {
    if (generation !== this.generationValue) return false;
    if (this.stateValue.kind !== 'loading') return false;
    this.transition(state);
    return true;
  }

  subscribe(listener: SectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(state: SectionState): void {
    this.stateValue = state;
    const snap = this.snapshot();
    for (const listener of this.listeners) listener(snap);
  }
}
