import { describe, expect, it } from 'vitest';

import { createSourceItem } from '../src/models.js';
import { renderItems, renderSection, truncate } from '../src/render.js';

function jiraItem(displayKey: string, title: string, status: 'open' | 'done', priority: 'high' | 'low', assignee: string) {
  return createSourceItem({
    variant: 'work_item',
    sourceKind: 'jira_issue',
    displayKey,
    title,
    status,
    priority,
    secondaryContext: assignee,
    url: `https://jira.example.test/browse/${displayKey}`,
    icon: '🔴',
  });
}

describe('render', () => {
  it('truncates long text with an ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abcd', 4)).toBe('abcd');
  });

  it('pads every column but the last', () => {
    const rows = renderItems([
      jiraItem('AB-12', 'Fix login', 'open', 'high', 'Carol'),
      jiraItem('AB-3', 'Docs', 'done', 'low', 'Dan'),
    ]);

    expect(rows).toEqual([
      '🔴  AB-12  Fix login  OPEN  HIGH  Carol',
      '🔴  AB-3   Docs       DONE  LOW   Dan',
    ]);
  });

  it('trims trailing space when the last columns are empty', () => {
    const item = createSourceItem({
      variant: 'code_review',
      sourceKind: 'github_pr',
      displayKey: '#1',
      title: 'Bump deps',
      status: 'open',
      url: 'https://github.example.test/o/r/pull/1',
      icon: '🐙',
    });

    expect(renderItems([item])).toEqual(['🐙  #1  Bump deps  OPEN']);
  });

  it('renders each section state', () => {
    expect(renderSection('Work items', { kind: 'loading' })).toBe('== Work items\nLoading…\n');
    expect(renderSection('Work items', { kind: 'empty' })).toBe('== Work items\nNothing here.\n');
    expect(renderSection('Work items', { kind: 'error', message: 'acli timed out', details: ['jira: slow'] })).toBe(
      '== Work items\nError: acli timed out\n',
    );
    expect(
      renderSection('Work items', { kind: 'data', items: [jiraItem('AB-1', 'One', 'open', 'low', 'Eve')] }, 'saved 2026-06-01T07:30:00.000Z'),
    ).toBe('== Work items (saved 2026-06-01T07:30:00.000Z)\n🔴  AB-1  One  OPEN  LOW  Eve\n');
  });
});
