/**
 * Specstance Scrape — W3C-style spec pages (also used for WHATWG).
 *
 * Reads the metadata <dl> at the top of the document:
 *   This version / Latest version / Editor's Draft
 * and prefers the editor's draft, then the latest version.
 */

import type { CheerioAPI } from 'cheerio';
import type { Org } from '../types/index.js';
import { FetchError } from '../errors/index.js';
import { cleanText, cleanUrl } from './clean.js';
import { found, redirect, type ParseOutcome, type SpecParser } from './parser.js';

const THIS_VERSION = /^This version/i;
const LATEST_VERSION = /^Latest version/i;
const EDITORS_DRAFT = /^Editor['’]s draft/i;

/** Pull the target out of a refresh directive like "0; url=https://…" */
export function refreshTarget(content: string): string | undefined {
  const m = content.match(/url\s*=\s*['"]?([^'"\s]+)/i);
  return m ? m[1] : undefined;
}

export class W3CParser implements SpecParser {
  readonly org: Org = 'W3C';

  parse($: CheerioAPI, pageUrl: string): ParseOutcome {
    const refresh = $('meta[http-equiv="refresh" i]').first().attr('content');
    const target = refresh ? refreshTarget(refresh) : undefined;
    if (target) return redirect(new URL(target, pageUrl).href);

    const thisUrl = this.getLink($, THIS_VERSION, pageUrl);
    const latestUrl = this.getLink($, LATEST_VERSION, pageUrl);
    const edUrl = this.getLink($, EDITORS_DRAFT, pageUrl);
    const current = thisUrl ?? cleanUrl(pageUrl);

    if (edUrl && edUrl !== current) return redirect(edUrl);
    if (latestUrl && latestUrl !== current) return redirect(latestUrl);

    const title = cleanText($('h1').first().text());
    if (!title) throw new FetchError("Can't find the specification's title.");

    const abstract = $('#abstract').first();
    let descEl = abstract.nextAll('p, div').first();
    if (descEl.length === 0) descEl = abstract.find('p').first();
    if (descEl.length === 0) throw new FetchError("Can't find the specification's description.");

    return found({
      url: current,
      org: this.org,
      title,
      description: cleanText(descEl.text()),
    });
  }

  /**
   * Find the link in the first <dl> whose <dt> matches the label.
   * Returns undefined when the page has no such entry.
   */
  private getLink($: CheerioAPI, label: RegExp, pageUrl: string): string | undefined {
    const dt = $('dl').first().find('dt')
      .filter((_, el) => label.test(cleanText($(el).text())))
      .first();
    if (dt.length === 0) return undefined;

    const a = dt.nextAll('dd').first().find('a').first();
    const href = a.attr('href') ?? a.text().trim();
    if (!href) return undefined;
    try {
      return cleanUrl(new URL(href, pageUrl).href);
    } catch {
      return undefined;
    }
  }
}

export class WHATWGParser extends W3CParser {
  override readonly org: Org = 'WHATWG';
}
