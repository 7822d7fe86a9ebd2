/**
 * Specstance GitHub — File a tracking issue for a new registry entry.
 *
 * Needs GH_USER and GH_TOKEN (a token with the `repo` scope); without
 * them the issue is skipped and the entry is added without a number.
 */

import { z } from 'zod';
import type { HttpFetch, Logger, PositionRecord } from '../types/index.js';
import { IssueError } from '../errors/index.js';

export const GITHUB_API = 'https://api.github.com';

export interface IssueConfig {
  owner: string;
  repo: string;
  user?: string;
  token?: string;
}

export interface IssueOptions {
  fetch?: HttpFetch;
  log?: Logger;
}

export interface IssuePayload {
  title: string;
  body: string;
}

const createdIssueSchema = z.object({ number: z.number().int() });

export function buildIssue(record: Pick<PositionRecord, 'title' | 'url' | 'ciuName' | 'mozBugUrl'>): IssuePayload {
  const body = [
    `* Specification Title: ${record.title}`,
    `* Specification URL: ${record.url}`,
    `* Caniuse.com URL (optional): ${record.ciuName ?? ''}`,
    `* Bugzilla URL (optional): ${record.mozBugUrl ?? ''}`,
  ].join('\n') + '\n';
  return { title: record.title, body };
}

export function issuesUrl(config: Pick<IssueConfig, 'owner' | 'repo'>): string {
  return `${GITHUB_API}/repos/${config.owner}/${config.repo}/issues`;
}

/**
 * Create the issue and return its number, or null when credentials are
 * missing. Throws IssueError when GitHub refuses.
 */
export async function createIssue(
  record: PositionRecord,
  config: IssueConfig,
  options: IssueOptions = {},
): Promise<number | null> {
  const log = options.log ?? (() => {});
  if (!config.user || !config.token) {
    log('Cannot find GH_USER or GH_TOKEN; not creating an issue.');
    return null;
  }

  const http = options.fetch ?? fetch;
  const auth = Buffer.from(`${config.user}:${config.token}`).toString('base64');
  const res = await http(issuesUrl(config), {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Accept': 'application/vnd.github+json',
      'Authorization': `Basic ${auth}`,
    },
    body: JSON.stringify(buildIssue(record)),
  });

  if (res.status !== 201) {
    throw new IssueError(res.status, await res.text());
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch {
    throw new IssueError(res.status, 'response is not JSON');
  }
  const parsed = createdIssueSchema.safeParse(body);
  if (!parsed.success) {
    throw new IssueError(res.status, 'response has no issue number');
  }
  log(`Created GitHub issue ${parsed.data.number}`);
  return parsed.data.number;
}
