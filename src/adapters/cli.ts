import { constants } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { execa } from 'execa';

import { AuthError, NotInstalledError, ParseError, TransientError, isAuthFailureText } from '../errors.js';
import { defaultLimiter, type Limiter } from '../limiter.js';
import { silentLogger, type Logger } from '../logger.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_KILL_GRACE_MS = 2_000;

export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CliRunnerOptions = {
  /** Permit pool shared by every runner of the process. */
  limiter?: Limiter;
  timeoutMs?: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fired. */
  killGraceMs?: number;
  /** Shown with auth failures, e.g. `glab auth login`. */
  authHint?: string;
  /** Shown when the binary is missing. */
  installHint?: string;
  logger?: Logger;
  /** PATH lookup; replaced in tests. */
  lookup?: (bin: string) => Promise<string | null>;
};

type ExecFailure = {
  code?: string;
  timedOut: boolean;
  isTerminated: boolean;
  signal?: string;
  exitCode?: number;
  stdout: string;
  stderr: string;
  message: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function describeFailure(err: unknown): ExecFailure {
  const rec = isRecord(err) ? err : {};
  const fallback = err instanceof Error ? err.message : String(err);
  return {
    code: typeof rec.code === 'string' ? rec.code : undefined,
    timedOut: rec.timedOut === true,
    isTerminated: rec.isTerminated === true,
    signal: typeof rec.signal === 'string' ? rec.signal : undefined,
    exitCode: typeof rec.exitCode === 'number' ? rec.exitCode : undefined,
    stdout: typeof rec.stdout === 'string' ? rec.stdout : '',
    stderr: typeof rec.stderr === 'string' ? rec.stderr : '',
    message: typeof rec.shortMessage === 'string' ? rec.shortMessage : fallback,
  };
}

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, process.platform === 'win32' ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolve `bin` against PATH without spawning anything. */
export async function findOnPath(bin: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (bin.includes('/') || bin.includes(path.sep)) {
    return (await isExecutable(bin)) ? bin : null;
  }

  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
  const exts = process.platform === 'win32' ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, `${bin}${ext}`);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Runs one platform CLI with an argument list (never through a shell).
 *
 * Every call holds a limiter permit until execa has settled, which happens
 * only after the child exited and both pipes were drained.
 */
export class CliRunner {
  readonly bin: string;
  private readonly limiter: Limiter;
  private readonly timeoutMs: number;
  private readonly killGraceMs: number;
  private readonly authHint?: string;
  private readonly installHint?: string;
  private readonly logger: Logger;
  private readonly lookup: (bin: string) => Promise<string | null>;

  constructor(bin: string, opts: CliRunnerOptions = {}) {
    this.bin = bin;
    this.limiter = opts.limiter ?? defaultLimiter();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.killGraceMs = opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.authHint = opts.authHint;
    this.installHint = opts.installHint;
    this.logger = (opts.logger ?? silentLogger).child({ bin });
    this.lookup = opts.lookup ?? ((b) => findOnPath(b));
  }

  async isInstalled(): Promise<boolean> {
    return (await this.lookup(this.bin)) !== null;
  }

  async run(args: readonly string[]): Promise<ExecResult> {
    return this.limiter.run(async () => {
      const startedAt = Date.now();
      try {
        const proc = await execa(this.bin, [...args], {
          stdin: 'ignore',
          stdout: 'pipe',
          stderr: 'pipe',
          timeout: this.timeoutMs,
          killSignal: 'SIGTERM',
          forceKillAfterDelay: this.killGraceMs,
        });
        this.logger.debug({ args, durationMs: Date.now() - startedAt }, 'command finished');
        return { stdout: proc.stdout, stderr: proc.stderr, exitCode: proc.exitCode ?? 0 };
      } catch (err: unknown) {
        const failure = describeFailure(err);
        this.logger.debug(
          { args, durationMs: Date.now() - startedAt, exitCode: failure.exitCode, timedOut: failure.timedOut },
          'command failed',
        );
        throw this.classify(failure);
      }
    });
  }

  /** Run and parse stdout as JSON. Empty output yields `null`. */
  async runJson(args: readonly string[]): Promise<unknown> {
    const { stdout } = await this.run(args);
    if (stdout.trim().length === 0) return null;
    try {
      return JSON.parse(stdout);
    } catch (err: unknown) {
      throw new ParseError(this.bin, err instanceof Error ? err.message : String(err));
    }
  }

  private classify(failure: ExecFailure): Error {
    if (failure.code === 'ENOENT') {
      return new NotInstalledError(this.bin, this.installHint);
    }

    const details = failure.stderr.trim() || failure.message;

    if (failure.timedOut) {
      return new TransientError(this.bin, 'timeout', {
        userMessage: `${this.bin} timed out after ${Math.round(this.timeoutMs / 1000)}s`,
        details,
      });
    }

    if (isAuthFailureText(`${failure.stderr}\n${failure.stdout}`)) {
      return new AuthError(this.bin, { hint: this.authHint, details });
    }

    if (failure.isTerminated) {
      return new TransientError(this.bin, 'signal', { details: `${failure.signal ?? 'signal'}: ${details}` });
    }

    return new TransientError(this.bin, 'exit', {
      userMessage: `${this.bin} failed${failure.exitCode !== undefined ? ` (exit ${failure.exitCode})` : ''}`,
      details,
    });
  }
}
