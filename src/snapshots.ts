import * as path from 'node:path';

import { z } from 'zod';

import { isNotFound, type FsLike, type SectionSnapshotRecord, type SnapshotPort } from './core/ports.js';
import { silentLogger, type Logger } from './logger.js';
import { parseSourceItem, type SourceItem } from './models.js';

const SnapshotFileSchema = z.object({
  sectionId: z.string(),
  savedAt: z.coerce.date(),
  items: z.array(z.unknown()),
});

function fileName(sectionId: string): string {
  return `${sectionId.replaceAll(/[^a-zA-Z0-9_-]/g, '_')}.json`;
}

/**
 * One JSON file per section under `dir`. Items are re-validated on load;
 * records that no longer validate are dropped.
 */
export class SnapshotStore implements SnapshotPort {
  private readonly fs: FsLike;
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(opts: { fs: FsLike; dir: string; logger?: Logger }) {
    this.fs = opts.fs;
    this.dir = opts.dir;
    this.logger = (opts.logger ?? silentLogger).child({ component: 'snapshots' });
  }

  pathFor(sectionId: string): string {
    return path.join(this.dir, fileName(sectionId));
  }

  async save(sectionId: string, items: readonly SourceItem[], savedAt: Date): Promise<void> {
    await this.fs.mkdir(this.dir, { recursive: true });
    const payload = { sectionId, savedAt: savedAt.toISOString(), items };
    await this.fs.writeFile(this.pathFor(sectionId), `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  }

  async load(sectionId: string): Promise<SectionSnapshotRecord | null> {
    let text: string;
    try {
      text = await this.fs.readFile(this.pathFor(sectionId), 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      json = null;
    }

    const parsed = SnapshotFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ sectionId }, 'ignoring malformed snapshot');
      return null;
    }

    const items: SourceItem[] = [];
    for (const raw of parsed.data.items) {
      const res = parseSourceItem(raw);
      if (res.ok) items.push(res.item);
      else this.logger.warn({ sectionId, reason: res.error }, 'dropping snapshot record');
    }
    return { sectionId: parsed.data.sectionId, savedAt: parsed.data.savedAt, items };
  }
}
