/**
 * Specstance Scrape — Public API
 */

export { fetchSpecData, fetchSpecEntry, newEntry, MAX_REDIRECTS, DEFAULT_POSITION } from './fetch.js';
export type { FetchSpecOptions } from './fetch.js';
export { HOST_PARSERS, parserForHost, parserForUrl } from './hosts.js';
export { W3CParser, WHATWGParser, refreshTarget } from './w3c.js';
export { IETFParser, htmlUrl, parseDraftName } from './ietf.js';
export { cleanUrl, cleanText } from './clean.js';
export type { SpecParser, ParseOutcome } from './parser.js';
