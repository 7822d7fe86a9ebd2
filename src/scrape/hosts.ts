import { FetchError, UnknownOrgError } from '../errors/index.js';
import type { SpecParser } from './parser.js';
import { IETFParser } from './ietf.js';
import { W3CParser, WHATWGParser } from './w3c.js';

const w3c = new W3CParser();
const whatwg = new WHATWGParser();
const ietf = new IETFParser();

/** Spec hosts and the parser that understands their pages */
export const HOST_PARSERS: ReadonlyMap<string, SpecParser> = new Map<string, SpecParser>([
  ['www.w3.org', w3c],
  ['w3c.github.io', w3c],
  ['wicg.github.io', w3c],
  ['dev.w3.org', w3c],
  ['dvcs.w3.org', w3c],
  ['drafts.csswg.org', w3c],
  ['w3ctag.github.io', w3c],
  ['datatracker.ietf.org', ietf],
  ['www.ietf.org', ietf],
  ['tools.ietf.org', ietf],
  ['http2.github.io', ietf],
  ['httpwg.github.io', ietf],
  ['httpwg.org', ietf],
]);

export function parserForHost(host: string): SpecParser | undefined {
  const h = host.toLowerCase();
  const parser = HOST_PARSERS.get(h);
  if (parser) return parser;
  if (h.endsWith('.spec.whatwg.org')) return whatwg;
  return undefined;
}

/** Pick a parser for a spec URL. Throws UnknownOrgError for unknown hosts. */
export function parserForUrl(url: string): SpecParser {
  let host: string;
  try {
    host = new URL(url).host.toLowerCase();
  } catch {
    throw new FetchError(`Not a URL: ${url}`);
  }
  const parser = parserForHost(host);
  if (!parser) throw new UnknownOrgError(host);
  return parser;
}
