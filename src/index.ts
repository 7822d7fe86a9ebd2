/**
 * Specstance — Library entry point.
 *
 * Usage:
 *   import { ActivitiesFile, validateRegistry } from 'specstance';
 *   import { fetchSpecEntry, addEntry } from 'specstance';
 *   import type { PositionRecord } from 'specstance';
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './registry/index.js';
export * from './scrape/index.js';
export { addEntry } from './add/index.js';
export type { AddOptions } from './add/index.js';
export { createIssue, buildIssue, issuesUrl, GITHUB_API } from './github/issue.js';
export type { IssueConfig, IssueOptions, IssuePayload } from './github/issue.js';
export { resolveConfig, loadProjectConfig, projectConfigPath, maskToken, DEFAULTS } from './config/index.js';
export type { ResolvedConfig, ConfigFlags } from './config/index.js';
