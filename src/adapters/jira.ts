import { z } from 'zod';

import type { Capability, FetchFilters } from '../adapter.js';
import { ParseError } from '../errors.js';
import { SOURCE_ICONS, type ItemStatus, type Priority, type SourceItem } from '../models.js';

import { CliSourceAdapter, type CliAdapterOptions } from './base.js';
import { buildItems, parseDate, unwrapList, type RecordConversion } from './shared.js';

export const DEFAULT_JQL = 'assignee = currentUser() AND statusCategory != Done';

const NamedSchema = z.object({ name: z.string().optional() }).passthrough().nullish();

/** One entry of `acli jira workitem search --json`. */
const JiraIssueSchema = z.object({
  key: z.string().regex(/^[A-Z][A-Z0-9_]*-\d+$/),
  self: z.string().optional(),
  fields: z.object({
    summary: z.string().min(1),
    status: NamedSchema,
    priority: NamedSchema,
    assignee: z
      .object({
        displayName: z.string().optional(),
        display_name: z.string().optional(),
      })
      .nullish(),
    created: z.string().nullish(),
    duedate: z.string().nullish(),
  }),
});

type JiraIssue = z.infer<typeof JiraIssueSchema>;

const JIRA_DONE_STATUSES = new Set(['done', 'resolved']);

export function mapJiraStatus(name: string | undefined): ItemStatus {
  const lower = (name ?? '').trim().toLowerCase();
  if (JIRA_DONE_STATUSES.has(lower)) return 'done';
  if (lower === 'closed') return 'closed';
  return 'open';
}

const JIRA_PRIORITY_MAP: Readonly<Record<string, Priority>> = {
  blocker: 'highest',
  critical: 'highest',
  highest: 'highest',
  high: 'high',
  major: 'high',
  medium: 'medium',
  low: 'low',
  minor: 'low',
  lowest: 'lowest',
  trivial: 'lowest',
};

export function mapJiraPriority(name: string | undefined): Priority {
  return JIRA_PRIORITY_MAP[(name ?? '').trim().toLowerCase()] ?? 'medium';
}

/** `https://acme.atlassian.net/rest/api/3/issue/10001` -> `https://acme.atlassian.net/browse/KEY-1` */
export function browseUrl(self: string | undefined, key: string, siteUrl?: string): string | undefined {
  const base = siteUrl ?? self;
  if (!base) return undefined;
  try {
    const origin = new URL(base).origin;
    return `${origin}/browse/${key}`;
  } catch {
    return undefined;
  }
}

export type JiraAdapterOptions = CliAdapterOptions & {
  jql?: string;
  /** Site URL used for browse links when records carry no `self`. */
  siteUrl?: string;
};

/**
 * Jira work items via the Atlassian CLI (`acli`).
 */
export class JiraAdapter extends CliSourceAdapter {
  readonly name = 'jira';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['work_item']);
  private readonly jql: string;
  private readonly siteUrl?: string;

  constructor(opts: JiraAdapterOptions = {}) {
    super(
      {
        bin: 'acli',
        authHint: 'acli jira auth login',
        installHint: 'https://developer.atlassian.com/cloud/acli',
        component: 'jira',
      },
      opts,
    );
    this.jql = opts.jql ?? DEFAULT_JQL;
    this.siteUrl = opts.siteUrl;
  }

  protected authStatusArgs(): readonly string[] {
    return ['jira', 'auth', 'status'];
  }

  async fetch(_filters: FetchFilters): Promise<SourceItem[]> {
    this.logger.info({ jql: this.jql }, 'fetching work items');

    const raw = await this.cli.runJson(['jira', 'workitem', 'search', '--jql', this.jql, '--json']);
    const list = unwrapList(raw);
    if (!list) throw new ParseError(this.cli.bin, 'expected a JSON array of work items');

    const items = buildItems(list, {
      schema: JiraIssueSchema,
      toItem: (issue) => this.toItem(issue),
      logger: this.logger,
    });

    this.logger.info({ count: items.length }, 'fetched work items');
    return items;
  }

  private toItem(issue: JiraIssue): RecordConversion {
    const url = browseUrl(issue.self, issue.key, this.siteUrl);
    if (!url) return { skip: `${issue.key} has no resolvable url` };

    const { fields } = issue;
    return {
      variant: 'work_item',
      sourceKind: 'jira_issue',
      displayKey: issue.key,
      title: fields.summary,
      status: mapJiraStatus(fields.status?.name),
      priority: mapJiraPriority(fields.priority?.name),
      secondaryContext: fields.assignee?.displayName ?? fields.assignee?.display_name ?? 'Unassigned',
      url,
      createdAt: parseDate(fields.created),
      icon: SOURCE_ICONS.jira_issue,
      dueDate: fields.duedate ?? undefined,
    };
  }
}
