import { z } from 'zod';

export type JsonObject = Record<string, unknown>;

export const SOURCE_KINDS = ['gitlab_mr', 'github_pr', 'jira_issue', 'todoist_task'] as const;
export const SourceKindSchema = z.enum(SOURCE_KINDS);
export type SourceKind = z.infer<typeof SourceKindSchema>;

export const ITEM_STATUSES = ['open', 'closed', 'merged', 'draft', 'done'] as const;
export const ItemStatusSchema = z.enum(ITEM_STATUSES);
export type ItemStatus = z.infer<typeof ItemStatusSchema>;

export const PRIORITIES = ['lowest', 'low', 'medium', 'high', 'highest'] as const;
export const PrioritySchema = z.enum(PRIORITIES);
export type Priority = z.infer<typeof PrioritySchema>;

export const SOURCE_ICONS: Readonly<Record<SourceKind, string>> = {
  gitlab_mr: '🦊',
  github_pr: '🐙',
  jira_issue: '🔴',
  todoist_task: '📝',
};

const OPEN_STATUSES: ReadonlySet<ItemStatus> = new Set(['open', 'draft']);

export function isOpenStatus(status: ItemStatus): boolean {
  return OPEN_STATUSES.has(status);
}

export const AbsoluteUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'url must be an absolute http(s) URL' });

const itemFields = {
  displayKey: z.string().min(1),
  title: z.string().min(1),
  status: ItemStatusSchema,
  priority: PrioritySchema.optional(),
  secondaryContext: z.string().default(''),
  url: AbsoluteUrlSchema,
  createdAt: z.coerce.date().optional(),
  icon: z.string().min(1),
};

export const CodeReviewItemSchema = z.object({
  variant: z.literal('code_review'),
  sourceKind: z.enum(['gitlab_mr', 'github_pr']),
  ...itemFields,
  draft: z.boolean().default(false),
  sourceBranch: z.string().optional(),
  repository: z.string().optional(),
});

export const WorkItemSchema = z.object({
  variant: z.literal('work_item'),
  sourceKind: z.enum(['jira_issue', 'todoist_task']),
  ...itemFields,
  dueDate: z.string().optional(),
  completedAt: z.coerce.date().optional(),
});

export const SourceItemSchema = z.discriminatedUnion('variant', [CodeReviewItemSchema, WorkItemSchema]);

export type SourceItemInput = z.input<typeof SourceItemSchema>;

type ParsedSourceItem = z.output<typeof SourceItemSchema>;

/** The normalized unit shown in one table row. Immutable once built. */
export type SourceItem = Readonly<ParsedSourceItem & { isOpen: boolean }>;
export type CodeReviewItem = Extract<SourceItem, { variant: 'code_review' }>;
export type WorkItem = Extract<SourceItem, { variant: 'work_item' }>;

export type ItemParseResult = { ok: true; item: SourceItem } | { ok: false; error: string };

export function parseSourceItem(input: unknown): ItemParseResult {
  const parsed = SourceItemSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    };
  }
  return { ok: true, item: Object.freeze({ ...parsed.data, isOpen: isOpenStatus(parsed.data.status) }) };
}

export function createSourceItem(input: SourceItemInput): SourceItem {
  const res = parseSourceItem(input);
  if (!res.ok) throw new Error(`Invalid source item: ${res.error}`);
  return res.item;
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Open items first, then by display key. No other field compares across source kinds. */
export function compareSourceItems(a: SourceItem, b: SourceItem): number {
  if (a.isOpen !== b.isOpen) return a.isOpen ? -1 : 1;
  return compareOrdinal(a.displayKey, b.displayKey);
}

export function sortSourceItems(items: readonly SourceItem[]): SourceItem[] {
  return [...items].sort(compareSourceItems);
}
