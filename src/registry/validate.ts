/**
 * Specstance — Registry validation.
 *
 * Turns zod issues into one diagnostic per offending member, worded the
 * same way regardless of which zod check tripped.
 */

import { ZodIssueCode, type ZodIssue } from 'zod';
import type { Diagnostic, PositionRecord } from '../types/index.js';
import { RegistryError } from '../errors/index.js';
import { RECORD_MEMBERS, memberSpec, positionRecordSchema, type MemberSpec } from './schema.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(issue: ZodIssue): boolean {
  return issue.code === ZodIssueCode.invalid_type
    && (issue.received === 'undefined' || issue.received === 'null');
}

function memberMessage(member: MemberSpec, issue: ZodIssue, label: string): string {
  const { name, kind } = member;
  if (member.required && isAbsent(issue)) {
    return `${label} doesn't have required member ${name}`;
  }
  switch (kind.type) {
    case 'url':
      return issue.code === ZodIssueCode.invalid_type
        ? `${label}'s ${name} isn't a URL string.`
        : `${label}'s ${name} isn't a valid URL.`;
    case 'integer':
      return `${label}'s ${name} isn't a non-negative integer.`;
    case 'enum':
      return `${label}'s ${name} isn't one of [${kind.values.join(', ')}]`;
    case 'string':
      return `${label}'s ${name} isn't a string.`;
  }
}

function collectMessages(issues: ZodIssue[], label: string): string[] {
  const byMember = new Map<string, string>();
  const unknown: string[] = [];

  for (const issue of issues) {
    if (issue.code === ZodIssueCode.unrecognized_keys) {
      unknown.push(...issue.keys);
      continue;
    }
    const name = String(issue.path[0] ?? '');
    const member = memberSpec(name);
    if (!member || byMember.has(name)) continue;
    byMember.set(name, memberMessage(member, issue, label));
  }

  const messages: string[] = [];
  for (const m of RECORD_MEMBERS) {
    const msg = byMember.get(m.name);
    if (msg) messages.push(msg);
  }
  if (unknown.length > 0) {
    messages.push(`${label} includes unrecognised members: ${unknown.join(' ')}`);
  }
  return messages;
}

/**
 * Validate a single entry. Returns an empty list when it's clean.
 */
export function validateEntry(entry: unknown, label = 'Entry'): Diagnostic[] {
  if (!isPlainObject(entry)) {
    return [{ level: 'error', message: `${label} is not an object.` }];
  }
  const result = positionRecordSchema.safeParse(entry);
  if (result.success) return [];
  return collectMessages(result.error.issues, label)
    .map(message => ({ level: 'error' as const, message }));
}

/**
 * Validate the whole registry document. Repeated titles (case-insensitive)
 * and repeated urls are warnings; everything else is an error.
 */
export function validateRegistry(data: unknown): Diagnostic[] {
  if (!Array.isArray(data)) {
    return [{ level: 'error', message: 'Top-level data structure is not a list.' }];
  }

  const diagnostics: Diagnostic[] = [];
  const titles = new Map<string, number>();
  const urls = new Map<string, number>();

  data.forEach((entry: unknown, i) => {
    const n = i + 1;
    if (!isPlainObject(entry)) {
      diagnostics.push({ level: 'error', message: `Entry ${n} is not an object.`, entry: n });
      return;
    }
    const label = typeof entry.title === 'string' && entry.title.trim() ? entry.title : `entry ${n}`;
    for (const d of validateEntry(entry, label)) {
      diagnostics.push({ ...d, entry: n });
    }

    if (typeof entry.title === 'string' && entry.title.trim()) {
      const key = entry.title.trim().toLowerCase();
      const first = titles.get(key);
      if (first !== undefined) {
        diagnostics.push({ level: 'warning', message: `${label} duplicates the title of entry ${first}`, entry: n });
      } else {
        titles.set(key, n);
      }
    }
    if (typeof entry.url === 'string') {
      const first = urls.get(entry.url);
      if (first !== undefined) {
        diagnostics.push({ level: 'warning', message: `${label} duplicates the url of entry ${first}`, entry: n });
      } else {
        urls.set(entry.url, n);
      }
    }
  });
  return diagnostics;
}

/**
 * Parse an entry into a record with every optional member present
 * (absent ones become null). Throws RegistryError when invalid.
 */
export function parseRecord(entry: unknown, label = 'Entry'): PositionRecord {
  const result = positionRecordSchema.safeParse(entry);
  if (!result.success) {
    throw new RegistryError(`${label} is not a valid position record`, validateEntry(entry, label));
  }
  const r = result.data;
  return {
    title: r.title,
    description: r.description,
    org: r.org,
    url: r.url,
    mozPosition: r.mozPosition,
    ciuName: r.ciuName ?? null,
    group: r.group ?? null,
    mozBugUrl: r.mozBugUrl ?? null,
    mozPositionIssue: r.mozPositionIssue ?? null,
    mozPositionDetail: r.mozPositionDetail ?? null,
  };
}
