import type { SourceItem } from './models.js';
import type { SectionState } from './section_state.js';

const TITLE_WIDTH = 60;

export function truncate(text: string, width: number): string {
  const chars = [...text];
  if (chars.length <= width) return text;
  return `${chars.slice(0, Math.max(0, width - 1)).join('')}…`;
}

function pad(text: string, width: number): string {
  const len = [...text].length;
  return len >= width ? text : `${text}${' '.repeat(width - len)}`;
}

function rowCells(item: SourceItem): string[] {
  return [
    item.icon,
    item.displayKey,
    truncate(item.title, TITLE_WIDTH),
    item.status.toUpperCase(),
    item.priority ? item.priority.toUpperCase() : '',
    item.secondaryContext,
  ];
}

export function renderItems(items: readonly SourceItem[]): string[] {
  const rows = items.map(rowCells);
  const widths = rows.reduce<number[]>(
    (acc, cells) => cells.map((cell, i) => Math.max(acc[i] ?? 0, [...cell].length)),
    [],
  );
  return rows.map((cells) =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : pad(cell, widths[i] ?? 0)))
      .join('  ')
      .trimEnd(),
  );
}

/** Plain-text block for one section: heading line, then rows or a status line. */
export function renderSection(title: string, state: SectionState, note?: string): string {
  const heading = `== ${title}${note ? ` (${note})` : ''}`;
  switch (state.kind) {
    case 'loading':
      return `${heading}\nLoading…\n`;
    case 'empty':
      return `${heading}\nNothing here.\n`;
    case 'error':
      return `${heading}\nError: ${state.message}\n`;
    case 'data':
      return `${heading}\n${renderItems(state.items).join('\n')}\n`;
  }
}
