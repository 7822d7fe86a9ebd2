/**
 * Specstance Scrape — Parser contract.
 *
 * A parser either extracts spec data from a page or points at a better
 * URL to fetch instead (a newer draft, a canonical document page).
 */

import type { CheerioAPI } from 'cheerio';
import type { Org, SpecData } from '../types/index.js';

export type ParseOutcome =
  | { kind: 'spec'; data: SpecData }
  | { kind: 'redirect'; url: string };

export interface SpecParser {
  readonly org: Org;
  parse($: CheerioAPI, pageUrl: string): ParseOutcome;
}

export function redirect(url: string): ParseOutcome {
  return { kind: 'redirect', url };
}

export function found(data: SpecData): ParseOutcome {
  return { kind: 'spec', data };
}
