import { describe, expect, it, vi } from 'vitest';

import type { DetectionResult } from '../src/detection.js';
import { runSetup } from '../src/setup.js';

import { createMemoryFs } from './helpers/memory_fs.js';

const CHECKED_AT = new Date('2026-04-01T10:00:00.000Z');

function results(entries: Record<string, [boolean, boolean]>): Map<string, DetectionResult> {
  return new Map(
    Object.entries(entries).map(([name, [installed, authenticated]]) => [name, { installed, authenticated, checkedAt: CHECKED_AT }]),
  );
}

describe('setup', () => {
  it('requires --force to overwrite existing config', async () => {
    const fs = createMemoryFs({ 'config/inboxdeck.json': '{"version":1}' });
    const detect = vi.fn(async () => results({ gh: [true, true] }));

    await expect(
      runSetup({ fs, configPath: 'config/inboxdeck.json', force: false, config: { version: 1 }, detect }),
    ).rejects.toThrow(/--force/i);

    expect(detect).not.toHaveBeenCalled();
    expect(fs.get('config/inboxdeck.json')).toBe('{"version":1}');
  });

  it('writes config after at least one source is usable', async () => {
    const fs = createMemoryFs();
    const detect = vi.fn(async () => results({ gitlab: [true, true], github: [true, false], jira: [false, false] }));

    const res = await runSetup({
      fs,
      configPath: 'config/inboxdeck.json',
      force: false,
      config: { version: 1, gitlab: { group: 'platform' } },
      detect,
    });

    expect(detect).toHaveBeenCalledWith({ version: 1, gitlab: { group: 'platform' } });
    expect(res).toEqual({ configPath: 'config/inboxdeck.json', usable: ['gitlab'], unusable: ['github', 'jira'] });
    expect(JSON.parse(fs.get('config/inboxdeck.json') ?? '{}')).toEqual({ version: 1, gitlab: { group: 'platform' } });
  });

  it('overwrites with --force', async () => {
    const fs = createMemoryFs({ 'config/inboxdeck.json': '{"version":1}' });

    await runSetup({
      fs,
      configPath: 'config/inboxdeck.json',
      force: true,
      config: { version: 1, jira: { jql: 'project = OPS' } },
      detect: async () => results({ jira: [true, true] }),
    });

    expect(JSON.parse(fs.get('config/inboxdeck.json') ?? '{}')).toEqual({ version: 1, jira: { jql: 'project = OPS' } });
  });

  it('does not write when no source is usable', async () => {
    const fs = createMemoryFs();

    await expect(
      runSetup({
        fs,
        configPath: 'config/inboxdeck.json',
        force: false,
        config: { version: 1 },
        detect: async () => results({ gitlab: [false, false], todoist: [false, false] }),
      }),
    ).rejects.toThrow(/^No usable source: gitlab, todoist\./);

    expect(fs.has('config/inboxdeck.json')).toBe(false);
  });
});
