import { z } from 'zod';

import type { Capability, FetchFilters, ReviewScope } from '../adapter.js';
import { ParseError } from '../errors.js';
import { SOURCE_ICONS, type ItemStatus, type SourceItem } from '../models.js';

import { CliSourceAdapter, type CliAdapterOptions } from './base.js';
import { buildItems, parseDate, unwrapList, type RecordConversion } from './shared.js';

export const GH_PR_FIELDS = ['number', 'title', 'state', 'author', 'url', 'createdAt', 'isDraft', 'repository'] as const;

/** One entry of `gh search prs --json …`. */
const GhPullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  state: z.string().default('open'),
  isDraft: z.boolean().optional(),
  draft: z.boolean().optional(),
  author: z.object({ login: z.string().optional() }).nullish(),
  url: z.string().optional(),
  html_url: z.string().optional(),
  createdAt: z.string().nullish(),
  created_at: z.string().nullish(),
  headRefName: z.string().optional(),
  repository: z
    .object({
      nameWithOwner: z.string().optional(),
      name: z.string().optional(),
    })
    .nullish(),
});

type GhPullRequest = z.infer<typeof GhPullRequestSchema>;

export function mapGitHubState(state: string, draft: boolean): ItemStatus {
  switch (state.toLowerCase()) {
    case 'open':
      return draft ? 'draft' : 'open';
    case 'merged':
      return 'merged';
    case 'closed':
      return 'closed';
    default:
      return 'open';
  }
}

function toItem(pr: GhPullRequest): RecordConversion {
  const url = pr.url ?? pr.html_url;
  if (!url) return { skip: `pull request #${pr.number} has no url` };

  const repository = pr.repository?.nameWithOwner;
  const draft = pr.isDraft ?? pr.draft ?? false;
  return {
    variant: 'code_review',
    sourceKind: 'github_pr',
    displayKey: repository ? `${repository}#${pr.number}` : `#${pr.number}`,
    title: pr.title,
    status: mapGitHubState(pr.state, draft),
    secondaryContext: pr.author?.login ?? '',
    url,
    createdAt: parseDate(pr.createdAt ?? pr.created_at),
    icon: SOURCE_ICONS.github_pr,
    draft,
    sourceBranch: pr.headRefName,
    repository,
  };
}

export type GitHubAdapterOptions = CliAdapterOptions & {
  /** Upper bound per search (gh defaults to 30). */
  limit?: number;
};

/**
 * GitHub pull requests via `gh search prs`, across every repository the
 * authenticated user can see.
 */
export class GitHubAdapter extends CliSourceAdapter {
  readonly name = 'github';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['code_review']);
  private readonly limit: number;

  constructor(opts: GitHubAdapterOptions = {}) {
    super(
      {
        bin: 'gh',
        authHint: 'gh auth login',
        installHint: 'https://cli.github.com',
        component: 'github',
      },
      opts,
    );
    this.limit = opts.limit ?? 100;
  }

  protected authStatusArgs(): readonly string[] {
    return ['auth', 'status'];
  }

  async fetch(filters: FetchFilters): Promise<SourceItem[]> {
    const scope: ReviewScope = filters.scope ?? 'assigned';
    this.logger.info({ scope }, 'fetching pull requests');

    const filterSets: string[][] =
      scope === 'authored' ? [['--author=@me']] : [['--assignee=@me'], ['--review-requested=@me']];

    const batches = await Promise.all(filterSets.map((extra) => this.searchPullRequests(extra)));
    const items = buildItems(batches.flat(), {
      schema: GhPullRequestSchema,
      toItem,
      logger: this.logger,
    });

    this.logger.info({ count: items.length, scope }, 'fetched pull requests');
    return items;
  }

  private async searchPullRequests(extra: readonly string[]): Promise<unknown[]> {
    const raw = await this.cli.runJson([
      'search',
      'prs',
      ...extra,
      '--state',
      'open',
      '--limit',
      String(this.limit),
      '--json',
      GH_PR_FIELDS.join(','),
    ]);
    const list = unwrapList(raw);
    if (!list) throw new ParseError(this.cli.bin, 'expected a JSON array of pull requests');
    return list;
  }
}
