/**
 * Specstance Scrape — IETF documents.
 *
 * Drafts and RFCs show up under several hosts and formats; every one of
 * them is canonicalised to https://tools.ietf.org/html/<doc> before the
 * page's <meta> tags are read.
 */

import type { CheerioAPI } from 'cheerio';
import type { Org } from '../types/index.js';
import { FetchError } from '../errors/index.js';
import { cleanText, cleanUrl } from './clean.js';
import { found, redirect, type ParseOutcome, type SpecParser } from './parser.js';

const NOT_A_SPEC = "I don't think that's a specification.";

/** Canonical URL for a document name */
export function htmlUrl(docName: string): string {
  return `https://tools.ietf.org/html/${docName}`;
}

/**
 * Split a trailing two-digit revision off a draft name:
 * "draft-foo-bar-03" → ["draft-foo-bar", "03"]
 */
export function parseDraftName(name: string): [string, string | null] {
  const idx = name.lastIndexOf('-');
  if (idx === -1) return [name, null];
  const last = name.slice(idx + 1);
  if (/^\d{2}$/.test(last)) return [name.slice(0, idx), last];
  return [name, null];
}

export class IETFParser implements SpecParser {
  readonly org: Org = 'IETF';

  parse($: CheerioAPI, pageUrl: string): ParseOutcome {
    const url = new URL(pageUrl);
    const host = url.host.toLowerCase();
    const segments = url.pathname.split('/').filter(Boolean);

    if (host === 'tools.ietf.org') {
      if (segments[0] === 'html' && segments[1]) {
        const identifier = this.getMeta($, ['DC.Identifier']);
        if (identifier && identifier.toLowerCase().startsWith('urn:ietf:rfc')) {
          const rfcUrl = htmlUrl(`rfc${identifier.slice(identifier.lastIndexOf(':') + 1)}`);
          if (cleanUrl(pageUrl) !== cleanUrl(rfcUrl)) return redirect(rfcUrl);
        }
        const [draftName, revision] = parseDraftName(segments[segments.length - 1]);
        if (revision) return redirect(htmlUrl(draftName));
      } else if ((segments[0] === 'id' || segments[0] === 'pdf') && segments[1]) {
        return redirect(htmlUrl(stripExtension(segments[1])));
      } else {
        throw new FetchError(NOT_A_SPEC);
      }
    } else if (host === 'www.ietf.org' && segments[0] === 'id') {
      if (!segments[1]) throw new FetchError(NOT_A_SPEC);
      return redirect(htmlUrl(parseDraftName(stripExtension(segments[1]))[0]));
    } else if (host === 'datatracker.ietf.org') {
      if (segments[0] !== 'doc' || !segments[1]) throw new FetchError(NOT_A_SPEC);
      return redirect(htmlUrl(segments[1]));
    }

    const title = this.getMeta($, ['DC.Title']) ?? cleanText($('head title').first().text());
    if (!title) throw new FetchError("Can't find the specification's title.");

    return found({
      title,
      description: this.getMeta($, ['description', 'dcterms.abstract', 'DC.Description.Abstract']) ?? '',
      org: this.org,
      url: cleanUrl(pageUrl),
    });
  }

  /** First non-empty <meta name=…> content among the given names */
  private getMeta($: CheerioAPI, names: string[]): string | undefined {
    for (const name of names) {
      const content = $(`head meta[name="${name}"]`).first().attr('content');
      if (content) return cleanText(content);
    }
    return undefined;
  }
}

function stripExtension(name: string): string {
  const idx = name.lastIndexOf('.');
  return idx > 0 ? name.slice(0, idx) : name;
}
