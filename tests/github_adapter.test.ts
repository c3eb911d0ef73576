import { beforeEach, describe, expect, it, vi } from 'vitest';

type ExecOutput = { stdout: string; stderr: string; exitCode: number };

const execaMock = vi.hoisted(() =>
  vi.fn<(bin: string, args: string[], opts: Record<string, unknown>) => Promise<ExecOutput>>(),
);

vi.mock('execa', () => {
  return {
    execa: execaMock,
  };
});

import { GH_PR_FIELDS, GitHubAdapter, mapGitHubState } from '../src/adapters/github.js';
import { AuthError } from '../src/errors.js';
import { Limiter } from '../src/limiter.js';

function ok(stdout: unknown): ExecOutput {
  return { stdout: JSON.stringify(stdout), stderr: '', exitCode: 0 };
}

function pr(number: number, extra: Record<string, unknown> = {}) {
  return {
    number,
    title: `PR ${number}`,
    state: 'open',
    isDraft: false,
    author: { login: 'bob' },
    url: `https://github.example.test/o/r/pull/${number}`,
    createdAt: '2026-02-26T08:30:00Z',
    repository: { nameWithOwner: 'o/r', name: 'r' },
    ...extra,
  };
}

function createAdapter(limit?: number) {
  return new GitHubAdapter({ limit, limiter: new Limiter(3), lookup: async () => '/usr/bin/gh' });
}

describe('GitHubAdapter', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('maps pull request states', () => {
    expect(mapGitHubState('OPEN', false)).toBe('open');
    expect(mapGitHubState('open', true)).toBe('draft');
    expect(mapGitHubState('MERGED', false)).toBe('merged');
    expect(mapGitHubState('closed', false)).toBe('closed');
  });

  it('searches assigned and review-requested pull requests', async () => {
    execaMock.mockImplementation(async (_bin, args) => {
      if (args.includes('--assignee=@me')) return ok([pr(1)]);
      if (args.includes('--review-requested=@me')) return ok([pr(2, { isDraft: true }), pr(1)]);
      return ok([]);
    });

    const items = await createAdapter(50).fetch({ scope: 'assigned' });

    expect(items.map((i) => i.displayKey)).toEqual(['o/r#1', 'o/r#2']);
    expect(items[1]).toMatchObject({ status: 'draft', draft: true, repository: 'o/r', secondaryContext: 'bob' });
    expect(items[0]?.createdAt).toEqual(new Date('2026-02-26T08:30:00Z'));

    expect(execaMock).toHaveBeenCalledWith(
      'gh',
      ['search', 'prs', '--assignee=@me', '--state', 'open', '--limit', '50', '--json', GH_PR_FIELDS.join(',')],
      expect.objectContaining({ stdout: 'pipe' }),
    );
  });

  it('searches authored pull requests', async () => {
    execaMock.mockResolvedValueOnce(ok([pr(5, { repository: null })]));

    const items = await createAdapter().fetch({ scope: 'authored' });

    expect(items.map((i) => i.displayKey)).toEqual(['#5']);
    expect(execaMock.mock.calls[0]?.[1]).toEqual([
      'search',
      'prs',
      '--author=@me',
      '--state',
      'open',
      '--limit',
      '100',
      '--json',
      'number,title,state,author,url,createdAt,isDraft,repository',
    ]);
  });

  it('propagates auth failures from fetch', async () => {
    execaMock.mockRejectedValueOnce(
      Object.assign(new Error('Command failed'), { exitCode: 4, stderr: 'To get started with GitHub CLI, please run:  gh auth login' }),
    );

    await expect(createAdapter().fetch({ scope: 'authored' })).rejects.toBeInstanceOf(AuthError);
  });

  it('reports availability from the PATH lookup', async () => {
    const missing = new GitHubAdapter({ lookup: async () => null });
    await expect(missing.isAvailable()).resolves.toBe(false);
    await expect(createAdapter().isAvailable()).resolves.toBe(true);
  });
});
