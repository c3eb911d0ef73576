import { z } from 'zod';

import type { Capability, FetchFilters, SourceAdapter } from '../adapter.js';
import { ParseError, toSourceError } from '../errors.js';
import type { Limiter } from '../limiter.js';
import { silentLogger, type Logger } from '../logger.js';
import { SOURCE_ICONS, type Priority, type SourceItem } from '../models.js';

import { HttpRunner } from './http.js';
import { buildItems, parseDate, unwrapList, type RecordConversion } from './shared.js';

export const TODOIST_API_BASE = 'https://api.todoist.com/api/v1/';

export const COMPLETED_WINDOWS = ['24h', '48h', '72h', '7days'] as const;
export type CompletedWindow = (typeof COMPLETED_WINDOWS)[number];

const HOUR_MS = 60 * 60 * 1000;

export const COMPLETED_WINDOW_MS: Readonly<Record<CompletedWindow, number>> = {
  '24h': 24 * HOUR_MS,
  '48h': 48 * HOUR_MS,
  '72h': 72 * HOUR_MS,
  '7days': 7 * 24 * HOUR_MS,
};

const PAGE_LIMIT = '200';
const MAX_PAGES = 50;

const IdSchema = z.union([z.string().min(1), z.number()]).transform((v) => String(v));

const TodoistProjectSchema = z.object({
  id: IdSchema,
  name: z.string(),
});

const TodoistTaskSchema = z.object({
  id: IdSchema,
  content: z.string().min(1),
  priority: z.number().int().min(1).max(4).default(1),
  project_id: IdSchema.optional(),
  projectId: IdSchema.optional(),
  url: z.string().optional(),
  due: z
    .object({
      date: z.string().optional(),
      datetime: z.string().nullish(),
    })
    .nullish(),
  added_at: z.string().nullish(),
  created_at: z.string().nullish(),
  checked: z.boolean().optional(),
  is_completed: z.boolean().optional(),
  completed_at: z.string().nullish(),
});

type TodoistTask = z.infer<typeof TodoistTaskSchema>;

/**
 * The API inverts the app's labels: API 4 is the app's p1 (urgent),
 * API 1 is p4 (normal).
 */
const TODOIST_PRIORITY_MAP: Readonly<Record<number, Priority>> = {
  1: 'low',
  2: 'medium',
  3: 'high',
  4: 'highest',
};

export function mapTodoistPriority(priority: number): Priority {
  return TODOIST_PRIORITY_MAP[priority] ?? 'medium';
}

export function taskUrl(id: string): string {
  return `https://app.todoist.com/app/task/${encodeURIComponent(id)}`;
}

export type TodoistAdapterOptions = {
  token: string | undefined;
  /** Only tasks from these projects (matched by name, case-insensitive). */
  projects?: readonly string[];
  showCompleted?: boolean;
  /** Window for completed tasks; `7days` when `showCompleted` is set without one. */
  showCompletedForLast?: CompletedWindow;
  limiter?: Limiter;
  timeoutMs?: number;
  baseUrl?: string;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Todoist tasks via the REST API (bearer token).
 */
export class TodoistAdapter implements SourceAdapter {
  readonly name = 'todoist';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['work_item']);

  private readonly token: string;
  private readonly http: HttpRunner;
  private readonly projects: readonly string[];
  private readonly showCompleted: boolean;
  private readonly completedWindow: CompletedWindow;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: TodoistAdapterOptions) {
    this.token = (opts.token ?? '').trim();
    this.logger = (opts.logger ?? silentLogger).child({ adapter: 'todoist' });
    this.http = new HttpRunner({
      source: 'todoist',
      baseUrl: opts.baseUrl ?? TODOIST_API_BASE,
      token: this.token,
      limiter: opts.limiter,
      timeoutMs: opts.timeoutMs,
      authHint: 'set todoist.token or TODOIST_API_TOKEN',
      logger: this.logger,
    });
    this.projects = (opts.projects ?? []).map((p) => p.trim()).filter(Boolean);
    this.showCompleted = opts.showCompleted ?? false;
    this.completedWindow = opts.showCompletedForLast ?? '7days';
    this.now = opts.now ?? (() => new Date());
  }

  async isAvailable(): Promise<boolean> {
    return this.token.length > 0;
  }

  async checkAuth(): Promise<boolean> {
    if (!this.token) return false;
    try {
      await this.http.getJson('projects', { limit: '1' });
      return true;
    } catch (err: unknown) {
      const error = toSourceError(err, 'todoist');
      this.logger.warn({ kind: error.kind, details: error.details }, 'auth check failed');
      return false;
    }
  }

  async fetch(_filters: FetchFilters): Promise<SourceItem[]> {
    this.logger.info(
      { projects: this.projects, showCompleted: this.showCompleted, window: this.completedWindow },
      'fetching tasks',
    );

    const projectNames = await this.loadProjectNames();
    const allowed = this.allowedProjectIds(projectNames);

    const [active, completed] = await Promise.all([
      this.paginate('tasks', {}),
      this.showCompleted ? this.paginate('tasks/completed/by_completion_date', this.completedRange()) : Promise.resolve([]),
    ]);

    const items = buildItems([...active, ...completed], {
      schema: TodoistTaskSchema,
      toItem: (task) => this.toItem(task, projectNames, allowed),
      logger: this.logger,
    });

    this.logger.info({ count: items.length }, 'fetched tasks');
    return items;
  }

  private completedRange(): Record<string, string> {
    const until = this.now();
    const since = new Date(until.getTime() - COMPLETED_WINDOW_MS[this.completedWindow]);
    return { since: since.toISOString(), until: until.toISOString() };
  }

  private async loadProjectNames(): Promise<ReadonlyMap<string, string>> {
    const records = await this.paginate('projects', {});
    const names = new Map<string, string>();
    for (const raw of records) {
      const parsed = TodoistProjectSchema.safeParse(raw);
      if (parsed.success) names.set(parsed.data.id, parsed.data.name);
    }
    return names;
  }

  private allowedProjectIds(projectNames: ReadonlyMap<string, string>): ReadonlySet<string> | null {
    if (this.projects.length === 0) return null;

    const wanted = new Set(this.projects.map((p) => p.toLowerCase()));
    const ids = new Set<string>();
    for (const [id, name] of projectNames) {
      if (wanted.has(name.toLowerCase())) ids.add(id);
    }

    const found = new Set([...projectNames.values()].map((n) => n.toLowerCase()));
    const missing = this.projects.filter((p) => !found.has(p.toLowerCase()));
    if (missing.length > 0) {
      this.logger.warn({ missing }, 'configured projects not found');
    }
    return ids;
  }

  private toItem(
    task: TodoistTask,
    projectNames: ReadonlyMap<string, string>,
    allowed: ReadonlySet<string> | null,
  ): RecordConversion {
    const projectId = task.project_id ?? task.projectId;
    if (allowed && (!projectId || !allowed.has(projectId))) {
      return { skip: `task ${task.id} is outside the configured projects` };
    }

    const completed = task.checked === true || task.is_completed === true || Boolean(task.completed_at);
    return {
      variant: 'work_item',
      sourceKind: 'todoist_task',
      displayKey: `TD-${task.id}`,
      title: task.content,
      status: completed ? 'done' : 'open',
      priority: mapTodoistPriority(task.priority),
      secondaryContext: (projectId && projectNames.get(projectId)) || '',
      url: task.url || taskUrl(task.id),
      createdAt: parseDate(task.added_at ?? task.created_at),
      icon: SOURCE_ICONS.todoist_task,
      dueDate: task.due?.date ?? task.due?.datetime ?? undefined,
      completedAt: parseDate(task.completed_at),
    };
  }

  /** Follows `next_cursor` until the API stops returning one. */
  private async paginate(path: string, params: Record<string, string>): Promise<unknown[]> {
    const records: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const raw = await this.http.getJson(path, { ...params, limit: PAGE_LIMIT, cursor });
      const list = unwrapList(raw);
      if (!list) throw new ParseError('todoist', `expected a list from ${path}`);
      records.push(...list);

      const next: unknown = raw !== null && typeof raw === 'object' ? Reflect.get(raw, 'next_cursor') : undefined;
      if (typeof next !== 'string' || next.length === 0) return records;
      cursor = next;
    }

    this.logger.warn({ path, pages: MAX_PAGES }, 'stopped paginating');
    return records;
  }
}
