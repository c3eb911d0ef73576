import type { Capability } from './adapter.js';
import { SOURCE_ICONS } from './models.js';

export type IntegrationMeta = {
  id: 'gitlab' | 'github' | 'jira' | 'todoist';
  name: string;
  icon: string;
  description: string;
  access: 'cli' | 'api';
  cliName?: string;
  /** Install page for CLIs, API docs for API sources. */
  docsUrl: string;
  capabilities: readonly Capability[];
};

export const INTEGRATIONS: readonly IntegrationMeta[] = [
  {
    id: 'gitlab',
    name: 'GitLab',
    icon: SOURCE_ICONS.gitlab_mr,
    description: 'Merge requests assigned to, reviewed by, or opened by you',
    access: 'cli',
    cliName: 'glab',
    docsUrl: 'https://gitlab.com/gitlab-org/cli',
    capabilities: ['code_review'],
  },
  {
    id: 'github',
    name: 'GitHub',
    icon: SOURCE_ICONS.github_pr,
    description: 'Pull requests assigned to, review-requested from, or opened by you',
    access: 'cli',
    cliName: 'gh',
    docsUrl: 'https://cli.github.com',
    capabilities: ['code_review'],
  },
  {
    id: 'jira',
    name: 'Jira',
    icon: SOURCE_ICONS.jira_issue,
    description: 'Work items assigned to you',
    access: 'cli',
    cliName: 'acli',
    docsUrl: 'https://developer.atlassian.com/cloud/acli',
    capabilities: ['work_item'],
  },
  {
    id: 'todoist',
    name: 'Todoist',
    icon: SOURCE_ICONS.todoist_task,
    description: 'Tasks, optionally with recently completed ones',
    access: 'api',
    docsUrl: 'https://developer.todoist.com/api/v1',
    capabilities: ['work_item'],
  },
];

export function getIntegration(id: string): IntegrationMeta | undefined {
  return INTEGRATIONS.find((i) => i.id === id);
}
