import { FetchError } from '../errors/index.js';

/**
 * Canonicalise a URL: scheme, lower-cased host and path, minus one
 * trailing slash. Query and fragment are dropped.
 */
export function cleanUrl(url: string): string {
  let link: URL;
  try {
    link = new URL(url);
  } catch {
    throw new FetchError(`Not a URL: ${url}`);
  }
  let path = link.pathname;
  if (path.endsWith('/')) path = path.slice(0, -1);
  return `${link.protocol}//${link.host.toLowerCase()}${path}`;
}

/** Collapse whitespace runs (including newlines) into single spaces */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
