import { z } from 'zod';

import type { Capability, FetchFilters, ReviewScope } from '../adapter.js';
import { ParseError } from '../errors.js';
import { SOURCE_ICONS, type ItemStatus, type SourceItem } from '../models.js';

import { CliSourceAdapter, type CliAdapterOptions } from './base.js';
import { buildItems, parseDate, unwrapList, type RecordConversion } from './shared.js';

const GlabUserSchema = z
  .object({
    username: z.string().optional(),
    name: z.string().optional(),
  })
  .nullish();

/** One entry of `glab mr list --output json`. */
const GlabMergeRequestSchema = z.object({
  iid: z.number().int().positive(),
  title: z.string().min(1),
  state: z.string().default('opened'),
  draft: z.boolean().optional(),
  work_in_progress: z.boolean().optional(),
  author: GlabUserSchema,
  web_url: z.string().optional(),
  webUrl: z.string().optional(),
  source_branch: z.string().optional(),
  sourceBranch: z.string().optional(),
  created_at: z.string().nullish(),
  createdAt: z.string().nullish(),
  references: z.object({ full: z.string().optional() }).nullish(),
});

type GlabMergeRequest = z.infer<typeof GlabMergeRequestSchema>;

export function mapGitLabState(state: string, draft: boolean): ItemStatus {
  switch (state.toLowerCase()) {
    case 'opened':
    case 'open':
      return draft ? 'draft' : 'open';
    case 'merged':
      return 'merged';
    case 'closed':
    case 'locked':
      return 'closed';
    default:
      return 'open';
  }
}

function displayKeyFor(mr: GlabMergeRequest): string {
  const full = mr.references?.full;
  // `group/project!42` keeps keys unique across the projects of a group.
  if (full && /![0-9]+$/.test(full)) return full;
  return `!${mr.iid}`;
}

function toItem(mr: GlabMergeRequest): RecordConversion {
  const url = mr.web_url ?? mr.webUrl;
  if (!url) return { skip: `merge request !${mr.iid} has no web_url` };

  const draft = mr.draft ?? mr.work_in_progress ?? false;
  return {
    variant: 'code_review',
    sourceKind: 'gitlab_mr',
    displayKey: displayKeyFor(mr),
    title: mr.title,
    status: mapGitLabState(mr.state, draft),
    secondaryContext: mr.author?.username ?? mr.author?.name ?? '',
    url,
    createdAt: parseDate(mr.created_at ?? mr.createdAt),
    icon: SOURCE_ICONS.gitlab_mr,
    draft,
    sourceBranch: mr.source_branch ?? mr.sourceBranch,
  };
}

export type GitLabAdapterOptions = CliAdapterOptions & {
  /** Group to list merge requests from; without it glab uses the current repository. */
  group?: string;
};

/**
 * GitLab merge requests via `glab`.
 *
 * `assigned` merges MRs assigned to me with MRs where I am a reviewer;
 * `authored` lists the MRs I opened.
 */
export class GitLabAdapter extends CliSourceAdapter {
  readonly name = 'gitlab';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['code_review']);
  private readonly group?: string;

  constructor(opts: GitLabAdapterOptions = {}) {
    super(
      {
        bin: 'glab',
        authHint: 'glab auth login',
        installHint: 'https://gitlab.com/gitlab-org/cli',
        component: 'gitlab',
      },
      opts,
    );
    this.group = opts.group;
  }

  protected authStatusArgs(): readonly string[] {
    return ['auth', 'status'];
  }

  async fetch(filters: FetchFilters): Promise<SourceItem[]> {
    const scope: ReviewScope = filters.scope ?? 'assigned';
    this.logger.info({ group: this.group, scope }, 'fetching merge requests');

    const filterSets: string[][] =
      scope === 'authored' ? [['--author=@me']] : [['--assignee=@me'], ['--reviewer=@me']];

    const batches = await Promise.all(filterSets.map((extra) => this.listMergeRequests(extra)));
    const items = buildItems(batches.flat(), {
      schema: GlabMergeRequestSchema,
      toItem,
      logger: this.logger,
    });

    this.logger.info({ count: items.length, scope }, 'fetched merge requests');
    return items;
  }

  private async listMergeRequests(extra: readonly string[]): Promise<unknown[]> {
    const args = [
      'mr',
      'list',
      ...(this.group ? ['--group', this.group] : []),
      ...extra,
      '--per-page',
      '100',
      '--output',
      'json',
    ];
    const raw = await this.cli.runJson(args);
    const list = unwrapList(raw);
    if (!list) throw new ParseError(this.cli.bin, 'expected a JSON array of merge requests');
    return list;
  }
}
