import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { SourceAdapter } from '../src/adapter.js';

const registered = vi.hoisted(() => {
  const adapters: SourceAdapter[] = [];
  return { adapters };
});

vi.mock('../src/adapters/index.js', () => {
  return {
    createAdapters: vi.fn(() => [...registered.adapters]),
  };
});

import { parseArgs, runCli, type CliIo } from '../src/cli.js';
import { silentLogger } from '../src/logger.js';

import { FakeAdapter, workItem } from './helpers/fake_adapter.js';
import { createMemoryFs, type MemoryFs } from './helpers/memory_fs.js';

type IoCapture = { out: string[]; err: string[] };

function createIo(): { io: CliIo; cap: IoCapture } {
  const cap: IoCapture = { out: [], err: [] };
  return {
    cap,
    io: {
      stdout: { write: (chunk: string) => cap.out.push(chunk) },
      stderr: { write: (chunk: string) => cap.err.push(chunk) },
    },
  };
}

const CONFIG_PATH = '/cfg/inboxdeck.json';

function run(argv: string[], fs: MemoryFs) {
  const { io, cap } = createIo();
  const done = runCli(argv, io, { fs, env: { HOME: '/home/tester' }, cwd: '/work', logger: silentLogger });
  return done.then((code) => ({ code, out: cap.out.join(''), err: cap.err.join('') }));
}

function configuredFs(extra: Record<string, string> = {}): MemoryFs {
  return createMemoryFs({ [CONFIG_PATH]: JSON.stringify({ version: 1, snapshots: { dir: '/snap' } }), ...extra });
}

describe('cli', () => {
  beforeEach(() => {
    registered.adapters.length = 0;
  });

  it('parses commands and repeated flags', () => {
    expect(parseArgs([])).toEqual({ cmd: 'show', flags: {} });
    expect(parseArgs(['--json'])).toEqual({ cmd: 'show', flags: { json: true } });
    expect(parseArgs(['show', '--section', 'a', '--section', 'b', '--offline'])).toEqual({
      cmd: 'show',
      flags: { section: ['a', 'b'], offline: true },
    });
  });

  it('shows every section and saves snapshots', async () => {
    registered.adapters.push(
      new FakeAdapter({ name: 'jira', fetch: async () => [workItem('PROJ-1')] }),
      new FakeAdapter({ name: 'github', capabilities: ['code_review'] }),
    );
    const fs = configuredFs();

    const res = await run(['show', '--config', CONFIG_PATH], fs);

    expect(res.code).toBe(0);
    expect(res.out).toBe(
      [
        '== Assigned to me\nNothing here.\n',
        '== Opened by me\nNothing here.\n',
        '== Work items\n🔴  PROJ-1  Work PROJ-1  OPEN\n',
      ].join('\n') + 'What next: run `inboxdeck show` again to refresh\n',
    );
    expect(fs.has('/snap/work-items.json')).toBe(true);
    expect(fs.has('/snap/reviews-assigned.json')).toBe(true);
  });

  it('prints JSON without tips', async () => {
    registered.adapters.push(new FakeAdapter({ name: 'jira', fetch: async () => [workItem('PROJ-1')] }));

    const res = await run(['show', '--json', '--section', 'work-items', '--config', CONFIG_PATH], configuredFs());

    expect(res.code).toBe(0);
    expect(JSON.parse(res.out)).toMatchObject({
      sections: [{ id: 'work-items', title: 'Work items', state: { kind: 'data', items: [{ displayKey: 'PROJ-1' }] } }],
    });
    expect(res.out).not.toContain('What next');
  });

  it('exits 1 when every section failed', async () => {
    registered.adapters.push(new FakeAdapter({ name: 'jira', installed: false }));

    const res = await run(['show', '--section', 'work-items'], createMemoryFs());

    expect(res.code).toBe(1);
    expect(res.out).toBe('== Work items\nError: No sources available for Work items\nWhat next: run `inboxdeck show` again to refresh\n');
  });

  it('shows saved sections offline without probing', async () => {
    const jira = new FakeAdapter({ name: 'jira' });
    registered.adapters.push(jira);
    const fs = configuredFs({
      '/snap/work-items.json': JSON.stringify({
        sectionId: 'work-items',
        savedAt: '2026-06-01T07:30:00.000Z',
        items: [JSON.parse(JSON.stringify(workItem('PROJ-9')))],
      }),
    });

    const res = await run(['show', '--offline', '--section', 'work-items,reviews-assigned', '--config', CONFIG_PATH], fs);

    expect(res.code).toBe(0);
    expect(res.out).toBe(
      '== Work items (saved 2026-06-01T07:30:00.000Z)\n🔴  PROJ-9  Work PROJ-9  OPEN\n' +
        '\n' +
        '== Assigned to me\nError: No saved data yet; run `inboxdeck show` online first\n' +
        'What next: run `inboxdeck show` again to refresh\n',
    );
    expect(jira.availabilityCalls).toBe(0);
  });

  it('rejects an unknown section', async () => {
    const res = await run(['show', '--section', 'nope'], createMemoryFs());

    expect(res.code).toBe(1);
    expect(res.err).toBe('Unknown section: nope (expected one of: reviews-assigned, reviews-authored, work-items)\n');
  });

  it('lists detection results', async () => {
    registered.adapters.push(
      new FakeAdapter({ name: 'jira' }),
      new FakeAdapter({ name: 'gitlab', installed: false }),
      new FakeAdapter({ name: 'github', authenticated: false }),
    );

    const res = await run(['detect'], createMemoryFs());

    expect(res.code).toBe(0);
    expect(res.out).toBe(
      'jira     installed      authenticated\n' +
        'gitlab   not installed  -\n' +
        'github   installed      not authenticated\n' +
        'What next: authenticate any source listed as not authenticated, then run `inboxdeck show`\n',
    );
  });

  it('prints detection results as bare JSON', async () => {
    registered.adapters.push(new FakeAdapter({ name: 'jira', authenticated: false }));

    const res = await run(['detect', '--json'], createMemoryFs());

    expect(res.code).toBe(0);
    expect(JSON.parse(res.out)).toMatchObject({ jira: { installed: true, authenticated: false } });
    expect(res.out).not.toContain('What next');
  });

  it('writes a config with setup', async () => {
    registered.adapters.push(new FakeAdapter({ name: 'jira' }), new FakeAdapter({ name: 'todoist', installed: false }));
    const fs = createMemoryFs();

    const res = await run(['setup', '--config', CONFIG_PATH, '--jira-jql', 'project = OPS', '--todoist-projects', 'Work, Home'], fs);

    expect(res.code).toBe(0);
    expect(res.out).toBe(
      `Wrote ${CONFIG_PATH}\nUsable sources: jira\nUnavailable sources: todoist\nWhat next: run \`inboxdeck show\`\n`,
    );
    expect(JSON.parse(fs.get(CONFIG_PATH) ?? '{}')).toEqual({
      version: 1,
      jira: { jql: 'project = OPS' },
      todoist: { projects: ['Work', 'Home'] },
    });
  });

  it('refuses to overwrite a config without --force', async () => {
    registered.adapters.push(new FakeAdapter({ name: 'jira' }));

    const res = await run(['setup', '--config', CONFIG_PATH], configuredFs());

    expect(res.code).toBe(1);
    expect(res.err).toBe(`Refusing to overwrite existing ${CONFIG_PATH}. Re-run with --force.\n`);
  });

  it('reports unknown commands with exit code 2', async () => {
    const res = await run(['frobnicate'], createMemoryFs());

    expect(res.code).toBe(2);
    expect(res.err).toBe('Unknown command: frobnicate\n');
  });

  it('prints help and the source list', async () => {
    const help = await run(['help'], createMemoryFs());
    expect(help.code).toBe(0);
    expect(help.out).toContain('  inboxdeck show [--section <id>] [--json] [--offline] [--config <path>]\n');

    const sources = await run(['sources'], createMemoryFs());
    expect(sources.out.split('\n')[0]).toBe(
      '🦊 GitLab   cli: glab  Merge requests assigned to, reviewed by, or opened by you <https://gitlab.com/gitlab-org/cli>',
    );
  });
});
