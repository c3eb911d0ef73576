import type { SourceAdapter } from '../adapter.js';
import type { InboxdeckConfig } from '../config.js';
import { Limiter } from '../limiter.js';
import { silentLogger, type Logger } from '../logger.js';

import { GitHubAdapter } from './github.js';
import { GitLabAdapter } from './gitlab.js';
import { JiraAdapter } from './jira.js';
import { TodoistAdapter } from './todoist.js';

/**
 * Build every enabled adapter from config. All of them share one limiter,
 * so the permit count bounds external calls process-wide.
 */
export function createAdapters(
  config: InboxdeckConfig,
  opts: { limiter?: Limiter; logger?: Logger } = {},
): SourceAdapter[] {
  const limiter = opts.limiter ?? new Limiter(config.execution.maxConcurrency);
  const logger = opts.logger ?? silentLogger;
  const exec = {
    limiter,
    timeoutMs: config.execution.timeoutMs,
    killGraceMs: config.execution.killGraceMs,
    logger,
  };

  const adapters: SourceAdapter[] = [];

  if (config.gitlab.enabled) {
    adapters.push(new GitLabAdapter({ ...exec, bin: config.gitlab.bin, group: config.gitlab.group }));
  }
  if (config.github.enabled) {
    adapters.push(new GitHubAdapter({ ...exec, bin: config.github.bin, limit: config.github.limit }));
  }
  if (config.jira.enabled) {
    adapters.push(new JiraAdapter({ ...exec, bin: config.jira.bin, jql: config.jira.jql, siteUrl: config.jira.siteUrl }));
  }
  if (config.todoist.enabled) {
    adapters.push(
      new TodoistAdapter({
        limiter,
        timeoutMs: config.execution.timeoutMs,
        logger,
        token: config.todoist.token,
        projects: config.todoist.projects,
        showCompleted: config.todoist.showCompleted,
        showCompletedForLast: config.todoist.showCompletedForLast,
        baseUrl: config.todoist.baseUrl,
      }),
    );
  }

  return adapters;
}

export { CliRunner, findOnPath } from './cli.js';
export { HttpRunner } from './http.js';
export { CliSourceAdapter } from './base.js';
export { GitHubAdapter } from './github.js';
export { GitLabAdapter } from './gitlab.js';
export { JiraAdapter } from './jira.js';
export { TodoistAdapter } from './todoist.js';
