import * as os from 'node:os';
import * as path from 'node:path';

import { z } from 'zod';

import { COMPLETED_WINDOWS } from './adapters/todoist.js';
import { isNotFound, type FsLike } from './core/ports.js';
import { ConfigError } from './errors.js';
import { DEFAULT_MAX_CONCURRENCY } from './limiter.js';
import { LOG_LEVELS } from './logger.js';

export type { FsLike } from './core/ports.js';

export const CONFIG_ENV_VAR = 'INBOXDECK_CONFIG';
export const DEFAULT_TODOIST_TOKEN_ENV = 'TODOIST_API_TOKEN';

const CliSourceShape = {
  enabled: z.boolean().default(true),
  /** Binary override, e.g. an absolute path. */
  bin: z.string().min(1).optional(),
};

export const InboxdeckConfigV1Schema = z.object({
  version: z.literal(1).default(1),
  execution: z
    .object({
      /** Budget per external call. */
      timeoutMs: z.number().int().positive().default(30_000),
      /** Permits shared by every external call of the process. */
      maxConcurrency: z.number().int().positive().default(DEFAULT_MAX_CONCURRENCY),
      /** SIGTERM -> SIGKILL delay after a timeout. */
      killGraceMs: z.number().int().nonnegative().default(2_000),
    })
    .default({}),
  gitlab: z
    .object({
      ...CliSourceShape,
      /** Group to list merge requests from (glab falls back to the current repository). */
      group: z.string().min(1).optional(),
    })
    .default({}),
  github: z
    .object({
      ...CliSourceShape,
      limit: z.number().int().positive().max(1000).default(100),
    })
    .default({}),
  jira: z
    .object({
      ...CliSourceShape,
      jql: z.string().min(1).optional(),
      siteUrl: z.string().url().optional(),
    })
    .default({}),
  todoist: z
    .object({
      enabled: z.boolean().default(true),
      token: z.string().min(1).optional(),
      /** Env var read when `token` is absent. */
      tokenEnv: z.string().min(1).default(DEFAULT_TODOIST_TOKEN_ENV),
      /** Project-name allow-list; empty means every project. */
      projects: z.array(z.string().min(1)).default([]),
      showCompleted: z.boolean().default(false),
      showCompletedForLast: z.enum(COMPLETED_WINDOWS).optional(),
      baseUrl: z.string().url().optional(),
    })
    .superRefine((value, ctx) => {
      if (value.showCompletedForLast && !value.showCompleted) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['showCompletedForLast'],
          message: 'showCompletedForLast requires showCompleted: true',
        });
      }
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('warn'),
      /** Log file; stderr when absent. */
      file: z.string().min(1).optional(),
    })
    .default({}),
  snapshots: z
    .object({
      enabled: z.boolean().default(true),
      dir: z.string().min(1).optional(),
    })
    .default({}),
});

export type InboxdeckConfigV1 = z.infer<typeof InboxdeckConfigV1Schema>;
export type InboxdeckConfig = InboxdeckConfigV1;
export type InboxdeckConfigInput = z.input<typeof InboxdeckConfigV1Schema>;
export const InboxdeckConfigSchema = InboxdeckConfigV1Schema;

export type LoadedConfig = {
  config: InboxdeckConfig;
  /** File the config came from; `null` when running on defaults. */
  configPath: string | null;
};

export function defaultConfigPaths(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string[] {
  const home = env.HOME ?? os.homedir();
  const xdg = env.XDG_CONFIG_HOME ?? path.join(home, '.config');
  return [path.join(xdg, 'inboxdeck', 'config.json'), path.join(cwd, 'inboxdeck.json')];
}

export function defaultSnapshotDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? os.homedir();
  const cacheHome = env.XDG_CACHE_HOME ?? path.join(home, '.cache');
  return path.join(cacheHome, 'inboxdeck', 'sections');
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues.map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

export function parseConfig(raw: unknown, source = 'config'): InboxdeckConfig {
  const result = InboxdeckConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${source}:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

export async function loadConfigFromFile(opts: { fs: FsLike; path: string }): Promise<InboxdeckConfig> {
  const text = await opts.fs.readFile(opts.path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConfigError(`Invalid JSON in ${opts.path}`);
  }
  return parseConfig(parsed, opts.path);
}

/**
 * Environment wins over the file: INBOXDECK_GITLAB_GROUP, INBOXDECK_JIRA_JQL,
 * INBOXDECK_LOG_LEVEL, and the Todoist token env var when no token is set.
 */
export function applyEnvOverrides(config: InboxdeckConfig, env: NodeJS.ProcessEnv = process.env): InboxdeckConfig {
  const next: InboxdeckConfig = {
    ...config,
    gitlab: { ...config.gitlab },
    jira: { ...config.jira },
    todoist: { ...config.todoist },
    logging: { ...config.logging },
  };

  const group = env.INBOXDECK_GITLAB_GROUP?.trim();
  if (group) next.gitlab.group = group;

  const jql = env.INBOXDECK_JIRA_JQL?.trim();
  if (jql) next.jira.jql = jql;

  const level = env.INBOXDECK_LOG_LEVEL?.trim();
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level);
    if (!parsed.success) {
      throw new ConfigError(`INBOXDECK_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    next.logging.level = parsed.data;
  }

  if (!next.todoist.token) {
    const token = env[next.todoist.tokenEnv]?.trim();
    if (token) next.todoist.token = token;
  }

  return next;
}

/**
 * Load the config from `path`, or search `$INBOXDECK_CONFIG`, then
 * `~/.config/inboxdeck/config.json`, then `./inboxdeck.json`. With no file
 * anywhere the defaults apply.
 */
export async function loadConfig(opts: {
  fs: FsLike;
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): Promise<LoadedConfig> {
  const env = opts.env ?? process.env;

  if (opts.path) {
    try {
      const config = await loadConfigFromFile({ fs: opts.fs, path: opts.path });
      return { config: applyEnvOverrides(config, env), configPath: opts.path };
    } catch (err: unknown) {
      if (isNotFound(err)) throw new ConfigError(`Config file not found: ${opts.path}`);
      throw err;
    }
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  const candidates = fromEnv ? [fromEnv] : defaultConfigPaths(env, opts.cwd);

  for (const candidate of candidates) {
    try {
      const config = await loadConfigFromFile({ fs: opts.fs, path: candidate });
      return { config: applyEnvOverrides(config, env), configPath: candidate };
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
    }
  }

  if (fromEnv) throw new ConfigError(`Config file not found: ${fromEnv} (from ${CONFIG_ENV_VAR})`);
  return { config: applyEnvOverrides(parseConfig({}), env), configPath: null };
}

export async function writeConfigToFile(opts: {
  fs: FsLike;
  path: string;
  config: InboxdeckConfigInput;
}): Promise<void> {
  const dir = path.dirname(opts.path);
  await opts.fs.mkdir(dir, { recursive: true });
  await opts.fs.writeFile(opts.path, `${JSON.stringify(opts.config, null, 2)}\n`, 'utf-8');
}
