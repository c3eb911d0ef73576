import { describe, expect, it } from 'vitest';

import { CliRunner } from '../src/adapters/cli.js';
import { TransientError } from '../src/errors.js';
import { Limiter } from '../src/limiter.js';

// Real child processes: the node binary running this suite stands in for a platform CLI.
function nodeRunner(opts: { timeoutMs: number; killGraceMs: number }) {
  return new CliRunner(process.execPath, { ...opts, limiter: new Limiter(1) });
}

describe('CliRunner with real processes', () => {
  it('kills a child that ignores SIGTERM once the grace period ends', async () => {
    const runner = nodeRunner({ timeoutMs: 300, killGraceMs: 300 });
    const startedAt = Date.now();

    const err = await runner
      .run(['-e', "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000);"])
      .catch((e: unknown) => e);
    const elapsed = Date.now() - startedAt;

    expect(err).toBeInstanceOf(TransientError);
    if (err instanceof TransientError) {
      expect(err.reason).toBe('timeout');
    }
    expect(elapsed).toBeGreaterThanOrEqual(300);
    expect(elapsed).toBeLessThan(2_000);
  });

  it('drains large stdout and stderr before settling', async () => {
    const runner = nodeRunner({ timeoutMs: 10_000, killGraceMs: 500 });

    const res = await runner.run([
      '-e',
      "process.stdout.write('x'.repeat(5 * 1024 * 1024)); process.stderr.write('y'.repeat(1024 * 1024));",
    ]);

    expect(res.exitCode).toBe(0);
    expect(res.stdout).toHaveLength(5 * 1024 * 1024);
    expect(res.stderr).toHaveLength(1024 * 1024);
  });

  it('releases its permit after a timeout', async () => {
    const limiter = new Limiter(1);
    const runner = new CliRunner(process.execPath, { timeoutMs: 200, killGraceMs: 200, limiter });

    await expect(runner.run(['-e', 'setInterval(() => {}, 1000);'])).rejects.toBeInstanceOf(TransientError);

    expect(limiter.active).toBe(0);
    await expect(runner.run(['-e', "process.stdout.write('ok');"])).resolves.toMatchObject({ stdout: 'ok', exitCode: 0 });
  });
});
