/**
 * Specstance Scrape — Build a new registry entry from a spec URL.
 *
 * Fetches the page, hands it to the parser for its host, and follows the
 * parser's redirects (bounded) until one of them yields spec data.
 */

import * as cheerio from 'cheerio';
import type { HttpFetch, HttpResponse, Logger, MozPosition, PositionRecord, SpecData } from '../types/index.js';
import { FetchError } from '../errors/index.js';
import { parserForHost, parserForUrl } from './hosts.js';

export const MAX_REDIRECTS = 5;

export const DEFAULT_POSITION: MozPosition = 'under consideration';

export interface FetchSpecOptions {
  fetch?: HttpFetch;
  log?: Logger;
  maxRedirects?: number;
}

async function fetchPage(http: HttpFetch, url: string): Promise<string> {
  let res: HttpResponse;
  try {
    res = await http(url);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Can't fetch ${url}: ${reason}`);
  }
  if (res.status !== 200) {
    throw new FetchError(`Fetching ${url} resulted in ${res.status} HTTP status.`);
  }
  return res.text();
}

export async function fetchSpecData(url: string, options: FetchSpecOptions = {}): Promise<SpecData> {
  const http = options.fetch ?? fetch;
  const log = options.log ?? (() => {});
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;

  let parser = parserForUrl(url);
  let current = url;

  for (let hop = 0; hop <= maxRedirects; hop++) {
    const $ = cheerio.load(await fetchPage(http, current));
    const outcome = parser.parse($, current);
    if (outcome.kind === 'spec') return outcome.data;

    current = outcome.url;
    parser = parserForHost(new URL(current).host) ?? parser;
    log(`Trying <${current}>...`);
  }
  throw new FetchError(`Too many redirects fetching ${url}`);
}

/** A fresh record for a spec nobody has taken a position on yet */
export function newEntry(data: SpecData, position: MozPosition = DEFAULT_POSITION): PositionRecord {
  return {
    title: data.title,
    description: data.description,
    org: data.org,
    url: data.url,
    mozPosition: position,
    ciuName: null,
    group: null,
    mozBugUrl: null,
    mozPositionIssue: null,
    mozPositionDetail: null,
  };
}

export async function fetchSpecEntry(
  url: string,
  options: FetchSpecOptions & { position?: MozPosition } = {},
): Promise<PositionRecord> {
  return newEntry(await fetchSpecData(url, options), options.position);
}
