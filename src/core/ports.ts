import type { SourceItem } from '../models.js';

export type FsLike = {
  readFile(path: string, encoding: 'utf-8'): Promise<string>;
  writeFile(path: string, content: string, encoding: 'utf-8'): Promise<void>;
  mkdir(path: string, opts: { recursive: boolean }): Promise<unknown>;
};

export type SectionSnapshotRecord = {
  sectionId: string;
  savedAt: Date;
  items: SourceItem[];
};

/** Last settled items per section, for showing something without running any external call. */
export type SnapshotPort = {
  save(sectionId: string, items: readonly SourceItem[], savedAt: Date): Promise<void>;
  load(sectionId: string): Promise<SectionSnapshotRecord | null>;
};

export function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 'ENOENT';
}
