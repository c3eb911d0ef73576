import type { z } from 'zod';

import type { Logger } from '../logger.js';
import { parseSourceItem, type SourceItem, type SourceItemInput } from '../models.js';

const LIST_WRAPPER_KEYS = ['results', 'items', 'issues', 'data', 'values'] as const;

/**
 * Platform CLIs and APIs wrap lists differently (`[...]`, `{ results: [...] }`,
 * `{ issues: [...] }`). Returns `null` when no list can be found.
 */
export function unwrapList(raw: unknown): unknown[] | null {
  if (raw === null || raw === undefined) return [];
  if (Array.isArray(raw)) return raw;
  if (typeof raw === 'object') {
    for (const key of LIST_WRAPPER_KEYS) {
      const value: unknown = Reflect.get(raw, key);
      if (Array.isArray(value)) return value;
    }
  }
  return null;
}

export type RecordConversion = SourceItemInput | { skip: string };

/**
 * Validate and convert raw records one by one. A record that fails its
 * schema, is skipped by `toItem`, or does not form a valid item is logged
 * and dropped; the rest of the batch is kept. First occurrence of a display
 * key wins.
 */
export function buildItems<T>(
  records: readonly unknown[],
  opts: {
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    toItem: (record: T) => RecordConversion;
    logger: Logger;
  },
): SourceItem[] {
  const items: SourceItem[] = [];
  const seen = new Set<string>();

  records.forEach((raw, index) => {
    const parsed = opts.schema.safeParse(raw);
    if (!parsed.success) {
      opts.logger.warn(
        { index, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
        'skipping invalid record',
      );
      return;
    }

    const converted = opts.toItem(parsed.data);
    if ('skip' in converted) {
      opts.logger.warn({ index, reason: converted.skip }, 'skipping record');
      return;
    }

    const res = parseSourceItem(converted);
    if (!res.ok) {
      opts.logger.warn({ index, reason: res.error }, 'skipping record that does not form a valid item');
      return;
    }

    if (seen.has(res.item.displayKey)) return;
    seen.add(res.item.displayKey);
    items.push(res.item);
  });

  return items;
}

export function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const dt = new Date(value);
  return Number.isNaN(dt.getTime()) ? undefined : dt;
}
