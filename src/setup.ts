import { writeConfigToFile, type InboxdeckConfigInput } from './config.js';
import { isNotFound, type FsLike } from './core/ports.js';
import type { DetectionResult } from './detection.js';

export type SetupResult = {
  configPath: string;
  usable: string[];
  unusable: string[];
};

/**
 * Write a config file after confirming at least one source works with it.
 * `detect` probes the adapters built from `config`.
 */
export async function runSetup(opts: {
  fs: FsLike;
  configPath: string;
  force: boolean;
  config: InboxdeckConfigInput;
  detect: (config: InboxdeckConfigInput) => Promise<ReadonlyMap<string, DetectionResult>>;
}): Promise<SetupResult> {
  if (!opts.force && (await fileExists(opts.fs, opts.configPath))) {
    throw new Error(`Refusing to overwrite existing ${opts.configPath}. Re-run with --force.`);
  }

  const results = await opts.detect(opts.config);
  const usable: string[] = [];
  const unusable: string[] = [];
  for (const [name, r] of results) {
    (r.installed && r.authenticated ? usable : unusable).push(name);
  }

  if (usable.length === 0) {
    throw new Error(
      `No usable source: ${unusable.join(', ') || 'none enabled'}. Install and authenticate at least one CLI (glab, gh, acli) or set a Todoist token.`,
    );
  }

  await writeConfigToFile({ fs: opts.fs, path: opts.configPath, config: opts.config });
  return { configPath: opts.configPath, usable, unusable };
}

async function fileExists(fs: Pick<FsLike, 'readFile'>, filePath: string): Promise<boolean> {
  try {
    await fs.readFile(filePath, 'utf-8');
    return true;
  } catch (err: unknown) {
    return !isNotFound(err);
  }
}
