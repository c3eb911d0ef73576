import type { Capability, FetchFilters } from './adapter.js';

export type SectionDefinition = {
  id: string;
  title: string;
  capability: Capability;
  filters: FetchFilters;
};

export const DEFAULT_SECTIONS: readonly SectionDefinition[] = [
  { id: 'reviews-assigned', title: 'Assigned to me', capability: 'code_review', filters: { scope: 'assigned' } },
  { id: 'reviews-authored', title: 'Opened by me', capability: 'code_review', filters: { scope: 'authored' } },
  { id: 'work-items', title: 'Work items', capability: 'work_item', filters: {} },
];

export function findSection(sections: readonly SectionDefinition[], id: string): SectionDefinition | undefined {
  return sections.find((s) => s.id === id);
}
