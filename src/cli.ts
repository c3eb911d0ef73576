#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { pathToFileURL } from 'node:url';

import { createAdapters } from './adapters/index.js';
import {
  applyEnvOverrides,
  defaultConfigPaths,
  defaultSnapshotDir,
  loadConfig,
  parseConfig,
  type InboxdeckConfig,
  type InboxdeckConfigInput,
} from './config.js';
import type { FsLike } from './core/ports.js';
import { DetectionRegistry, type DetectionResult } from './detection.js';
import { INTEGRATIONS } from './integrations.js';
import { createLogger, type Logger } from './logger.js';
import { FetchOrchestrator } from './orchestrator.js';
import { renderSection } from './render.js';
import type { SectionState } from './section_state.js';
import { DEFAULT_SECTIONS, findSection, type SectionDefinition } from './sections.js';
import { runSetup } from './setup.js';
import { SnapshotStore } from './snapshots.js';

export type CliIo = {
  stdout: { write(chunk: string): void };
  stderr: { write(chunk: string): void };
};

export type CliDeps = {
  fs: FsLike;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Overrides the logger built from config. */
  logger?: Logger;
};

type Flags = Record<string, string | boolean | string[]>;

function whatNextTipForCommand(cmd: string): string {
  switch (cmd) {
    case 'setup':
      return 'run `inboxdeck show`';
    case 'detect':
      return 'authenticate any source listed as not authenticated, then run `inboxdeck show`';
    case 'sources':
      return 'run `inboxdeck detect`';
    case 'show':
    default:
      return 'run `inboxdeck show` again to refresh';
  }
}

function writeWhatNext(io: CliIo, cmd: string): void {
  io.stdout.write(`What next: ${whatNextTipForCommand(cmd)}\n`);
}

function writeHelp(io: CliIo): void {
  io.stdout.write(
    [
      'inboxdeck help',
      '',
      'Commands:',
      '  inboxdeck show [--section <id>] [--json] [--offline] [--config <path>]',
      '  inboxdeck detect [--json] [--config <path>]',
      '  inboxdeck sources',
      '  inboxdeck setup [--force] [--gitlab-group <group>] [--jira-jql <jql>] [--todoist-projects <a,b>] [--config <path>]',
      '',
      `Sections: ${DEFAULT_SECTIONS.map((s) => s.id).join(', ')}`,
      '',
    ].join('\n'),
  );
}

export function parseArgs(argv: string[]): { cmd: string; flags: Flags } {
  const [first, ...rest] = argv;
  const cmd = first === undefined || first.startsWith('--') ? 'show' : first;
  const tokens = first !== undefined && first.startsWith('--') ? argv : rest;
  const flags: Flags = {};

  for (let i = 0; i < tokens.length; i++) {
    const tok = tokens[i];
    if (tok === undefined || !tok.startsWith('--')) continue;

    const key = tok.slice(2);
    const next = tokens[i + 1];

    const value: string | boolean = next !== undefined && !next.startsWith('--') ? next : true;
    if (value !== true) i++;

    const prev = flags[key];
    if (prev === undefined) {
      flags[key] = value;
    } else if (typeof prev === 'string') {
      flags[key] = [prev, String(value)];
    } else if (Array.isArray(prev)) {
      prev.push(String(value));
    } else {
      flags[key] = [String(value)];
    }
  }

  return { cmd, flags };
}

function flagString(flags: Flags, key: string): string | undefined {
  const value = flags[key];
  if (typeof value === 'string') return value.trim() || undefined;
  if (Array.isArray(value)) return value[value.length - 1]?.trim() || undefined;
  return undefined;
}

function flagList(flags: Flags, key: string): string[] {
  const value = flags[key];
  const raw = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  return raw.flatMap((v) => v.split(',')).map((v) => v.trim()).filter(Boolean);
}

function selectSections(flags: Flags): SectionDefinition[] {
  const wanted = flagList(flags, 'section');
  if (wanted.length === 0) return [...DEFAULT_SECTIONS];
  return wanted.map((id) => {
    const section = findSection(DEFAULT_SECTIONS, id);
    if (!section) {
      throw new Error(`Unknown section: ${id} (expected one of: ${DEFAULT_SECTIONS.map((s) => s.id).join(', ')})`);
    }
    return section;
  });
}

function buildRegistry(config: InboxdeckConfig, logger: Logger): DetectionRegistry {
  const registry = new DetectionRegistry({ logger });
  for (const adapter of createAdapters(config, { logger })) {
    registry.register(adapter);
  }
  return registry;
}

function formatDetection(results: ReadonlyMap<string, DetectionResult>): string {
  const lines = [...results].map(([name, r]) => {
    const installed = r.installed ? 'installed' : 'not installed';
    const auth = r.installed ? (r.authenticated ? 'authenticated' : 'not authenticated') : '-';
    return `${name.padEnd(8)} ${installed.padEnd(14)} ${auth}`;
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : 'No sources enabled.\n';
}

type PrintedSection = { id: string; title: string; state: SectionState; note?: string };

function writeSections(io: CliIo, sections: readonly PrintedSection[], json: boolean): void {
  if (json) {
    io.stdout.write(`${JSON.stringify({ sections }, null, 2)}\n`);
    return;
  }
  io.stdout.write(sections.map((s) => renderSection(s.title, s.state, s.note)).join('\n'));
}

async function runShow(io: CliIo, flags: Flags, config: InboxdeckConfig, deps: CliDeps, logger: Logger): Promise<number> {
  const sections = selectSections(flags);
  const json = Boolean(flags.json);
  const snapshots = config.snapshots.enabled
    ? new SnapshotStore({ fs: deps.fs, dir: config.snapshots.dir ?? defaultSnapshotDir(deps.env), logger })
    : undefined;

  const printed: PrintedSection[] = [];

  if (flags.offline) {
    if (!snapshots) throw new Error('show --offline requires snapshots to be enabled');
    for (const section of sections) {
      const snap = await snapshots.load(section.id);
      const state: SectionState = !snap
        ? { kind: 'error', message: 'No saved data yet; run `inboxdeck show` online first' }
        : snap.items.length > 0
          ? { kind: 'data', items: snap.items }
          : { kind: 'empty' };
      printed.push({ id: section.id, title: section.title, state, note: snap ? `saved ${snap.savedAt.toISOString()}` : undefined });
    }
  } else {
    const orchestrator = new FetchOrchestrator({
      registry: buildRegistry(config, logger),
      sections,
      snapshots,
      logger,
    });
    await orchestrator.refreshAll();
    for (const section of sections) {
      printed.push({ id: section.id, title: section.title, state: orchestrator.currentState(section.id) });
    }
  }

  writeSections(io, printed, json);
  return printed.every((s) => s.state.kind === 'error') ? 1 : 0;
}

async function runSetupCommand(io: CliIo, flags: Flags, deps: CliDeps, logger: Logger): Promise<void> {
  const configPath = flagString(flags, 'config') ?? defaultConfigPaths(deps.env, deps.cwd)[0];
  if (!configPath) throw new Error('setup requires --config <path>');

  const group = flagString(flags, 'gitlab-group');
  const jql = flagString(flags, 'jira-jql');
  const projects = flagList(flags, 'todoist-projects');

  const config: InboxdeckConfigInput = {
    version: 1,
    ...(group ? { gitlab: { group } } : {}),
    ...(jql ? { jira: { jql } } : {}),
    ...(projects.length > 0 ? { todoist: { projects } } : {}),
  };

  const result = await runSetup({
    fs: deps.fs,
    configPath,
    force: Boolean(flags.force),
    config,
    detect: async (input) => {
      const resolved = applyEnvOverrides(parseConfig(input), deps.env);
      return buildRegistry(resolved, logger).detectAll();
    },
  });

  io.stdout.write(`Wrote ${result.configPath}\n`);
  io.stdout.write(`Usable sources: ${result.usable.join(', ')}\n`);
  if (result.unusable.length > 0) {
    io.stdout.write(`Unavailable sources: ${result.unusable.join(', ')}\n`);
  }
}

export async function runCli(
  rawArgv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  overrides: Partial<CliDeps> = {},
): Promise<number> {
  const deps: CliDeps = {
    fs: overrides.fs ?? fs,
    env: overrides.env ?? process.env,
    cwd: overrides.cwd ?? process.cwd(),
    logger: overrides.logger,
  };
  const { cmd, flags } = parseArgs(rawArgv);

  try {
    if (cmd === 'help' || flags.help || flags.h) {
      writeHelp(io);
      return 0;
    }

    if (cmd === 'sources') {
      for (const i of INTEGRATIONS) {
        const via = i.access === 'cli' ? `cli: ${i.cliName ?? i.id}` : 'api';
        io.stdout.write(`${i.icon} ${i.name.padEnd(8)} ${via.padEnd(10)} ${i.description} <${i.docsUrl}>\n`);
      }
      writeWhatNext(io, cmd);
      return 0;
    }

    if (cmd === 'setup') {
      const logger = deps.logger ?? createLogger({ level: 'warn' });
      await runSetupCommand(io, flags, deps, logger);
      writeWhatNext(io, cmd);
      return 0;
    }

    if (cmd !== 'show' && cmd !== 'detect') {
      io.stderr.write(`Unknown command: ${cmd}\n`);
      return 2;
    }

    const { config } = await loadConfig({ fs: deps.fs, path: flagString(flags, 'config'), env: deps.env, cwd: deps.cwd });
    const logger = deps.logger ?? createLogger({ level: config.logging.level, file: config.logging.file });

    if (cmd === 'detect') {
      const results = await buildRegistry(config, logger).detectAll();
      if (flags.json) {
        io.stdout.write(`${JSON.stringify(Object.fromEntries(results), null, 2)}\n`);
        return 0;
      }
      io.stdout.write(formatDetection(results));
      writeWhatNext(io, cmd);
      return 0;
    }

    const code = await runShow(io, flags, config, deps, logger);
    if (!flags.json) writeWhatNext(io, cmd);
    return code;
  } catch (err: unknown) {
    io.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
