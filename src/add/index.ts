/**
 * Specstance — Add a spec to the registry.
 *
 * Order matters: the registry is validated and the new entry checked for
 * duplicates before any GitHub issue is filed, so a rejected add never
 * leaves an orphan issue behind.
 */

import type { HttpFetch, Logger, MozPosition, PositionRecord } from '../types/index.js';
import { RegistryError } from '../errors/index.js';
import type { ActivitiesFile } from '../registry/activities.js';
import { fetchSpecEntry } from '../scrape/fetch.js';
import { createIssue, type IssueConfig } from '../github/issue.js';

export interface AddOptions {
  fetch?: HttpFetch;
  log?: Logger;
  position?: MozPosition;
  /** File a tracking issue (default true) */
  issue?: boolean;
}

export async function addEntry(
  registry: ActivitiesFile,
  url: string,
  config: IssueConfig,
  options: AddOptions = {},
): Promise<PositionRecord> {
  const diagnostics = registry.validate();
  if (diagnostics.some(d => d.level === 'error')) {
    throw new RegistryError(`${registry.path} has ${diagnostics.length} problem(s)`, diagnostics);
  }

  const { fetch, log, position } = options;
  const entry = await fetchSpecEntry(url, { fetch, log, position });
  registry.assertUnique(entry);

  if (options.issue !== false) {
    const number = await createIssue(entry, config, { fetch, log });
    if (number !== null) entry.mozPositionIssue = number;
  }

  registry.append(entry);
  registry.save();
  return entry;
}
