import type { SourceItem } from './models.js';

export type Capability = 'code_review' | 'work_item';

/** Which code reviews a section wants: assigned to / review-requested from me, or opened by me. */
export type ReviewScope = 'assigned' | 'authored';

export type FetchFilters = {
  scope?: ReviewScope;
};

/**
 * Port interface for a platform adapter.
 *
 * CLI-backed adapters rely on the platform CLI's own auth store (gh, glab,
 * acli); only API-backed adapters are handed a token.
 */
export interface SourceAdapter {
  /** Stable adapter name (`gitlab`, `github`, `jira`, `todoist`). */
  readonly name: string;
  readonly capabilities: ReadonlySet<Capability>;

  /** Local-only check: binary on PATH, or a token configured. */
  isAvailable(): Promise<boolean>;

  /** One lightweight external call. Resolves false on failure, never rejects. */
  checkAuth(): Promise<boolean>;

  /**
   * Retrieve and normalize items. Invalid records are skipped; a failing call
   * rejects with a `SourceError`.
   */
  fetch(filters: FetchFilters): Promise<SourceItem[]>;
}
