import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { addEntry } from '../src/add/index.js';
import { ActivitiesFile } from '../src/registry/activities.js';
import { DuplicateEntryError, RegistryError } from '../src/errors/index.js';
import type { HttpFetch, HttpResponse } from '../src/types/index.js';

const FIXTURE = new URL('./fixtures/activities.json', import.meta.url);
const ISSUES_URL = 'https://api.github.com/repos/mozilla/standards-positions/issues';

const config = { owner: 'mozilla', repo: 'standards-positions', user: 'test-user', token: 'test-secret' };

function specPage(title: string): string {
  return `<html><body><h1>${title}</h1><h2 id="abstract">Abstract</h2><p>Talks to foo devices.</p></body></html>`;
}

function reply(status: number, text: string, json: unknown): HttpResponse {
  return { status, text: async () => text, json: async () => json };
}

/** Serves spec pages by url and answers issue POSTs with the given number */
function stubGitHub(pages: Record<string, string>, issueNumber = 123) {
  const posts: string[] = [];
  const http = vi.fn<HttpFetch>(async (url, init) => {
    if (init?.method === 'POST') {
      posts.push(url);
      return reply(201, '', { number: issueNumber });
    }
    const page = pages[url];
    return page === undefined ? reply(404, 'not found', {}) : reply(200, page, {});
  });
  return { http, posts };
}

let dir: string;
let path: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'specstance-add-'));
  path = join(dir, 'activities.json');
  writeFileSync(path, readFileSync(FIXTURE, 'utf-8'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('addEntry', () => {
  it('files an issue and saves its number with the new entry', async () => {
    const { http, posts } = stubGitHub({ 'https://wicg.github.io/foo/': specPage('Foo API') });
    const entry = await addEntry(ActivitiesFile.load(path), 'https://wicg.github.io/foo/', config, { fetch: http });

    expect(entry.mozPositionIssue).toBe(123);
    expect(posts).toEqual([ISSUES_URL]);

    const saved = ActivitiesFile.load(path).records();
    expect(saved.map(r => r.title)).toEqual(['Web Thing API', 'Foo API']);
    expect(saved[1]).toEqual({
      title: 'Foo API',
      description: 'Talks to foo devices.',
      org: 'W3C',
      url: 'https://wicg.github.io/foo',
      mozPosition: 'under consideration',
      ciuName: null,
      group: null,
      mozBugUrl: null,
      mozPositionIssue: 123,
      mozPositionDetail: null,
    });
  });

  it('rejects a duplicate before filing any issue', async () => {
    const { http, posts } = stubGitHub({ 'https://wicg.github.io/wot/': specPage('Web Thing API') });
    await expect(addEntry(ActivitiesFile.load(path), 'https://wicg.github.io/wot/', config, { fetch: http }))
      .rejects.toBeInstanceOf(DuplicateEntryError);
    expect(posts).toEqual([]);
    expect(ActivitiesFile.load(path).entries()).toHaveLength(1);
  });

  it('skips the issue when asked', async () => {
    const { http, posts } = stubGitHub({ 'https://wicg.github.io/foo/': specPage('Foo API') });
    await addEntry(ActivitiesFile.load(path), 'https://wicg.github.io/foo/', config, { fetch: http, issue: false });
    expect(posts).toEqual([]);
    expect(ActivitiesFile.load(path).records()[1].mozPositionIssue).toBeNull();
  });

  it('adds without a number when credentials are missing', async () => {
    const { http, posts } = stubGitHub({ 'https://wicg.github.io/foo/': specPage('Foo API') });
    const log = vi.fn();
    await addEntry(
      ActivitiesFile.load(path),
      'https://wicg.github.io/foo/',
      { owner: 'mozilla', repo: 'standards-positions' },
      { fetch: http, log },
    );
    expect(posts).toEqual([]);
    expect(log).toHaveBeenCalledWith('Cannot find GH_USER or GH_TOKEN; not creating an issue.');
    expect(ActivitiesFile.load(path).records()[1].mozPositionIssue).toBeNull();
  });

  it('applies a position override', async () => {
    const { http } = stubGitHub({ 'https://wicg.github.io/foo/': specPage('Foo API') });
    await addEntry(ActivitiesFile.load(path), 'https://wicg.github.io/foo/', config, {
      fetch: http,
      position: 'supportive',
      issue: false,
    });
    expect(ActivitiesFile.load(path).records()[1].mozPosition).toBe('supportive');
  });

  it('refuses to touch an invalid registry', async () => {
    writeFileSync(path, JSON.stringify([{ title: 'Only a title' }]));
    const { http } = stubGitHub({ 'https://wicg.github.io/foo/': specPage('Foo API') });
    await expect(addEntry(ActivitiesFile.load(path), 'https://wicg.github.io/foo/', config, { fetch: http }))
      .rejects.toBeInstanceOf(RegistryError);
    expect(http).not.toHaveBeenCalled();
  });
});
