/**
 * Specstance — The activities file.
 *
 * Loads, validates, extends and rewrites activities.json. Output is
 * always key-sorted with 2-space indentation so diffs stay minimal.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { Diagnostic, PositionRecord } from '../types/index.js';
import { DuplicateEntryError, RegistryError } from '../errors/index.js';
import { isPlainObject, parseRecord, validateEntry, validateRegistry } from './validate.js';

export const JSON_INDENT = 2;

/** Recursively rebuild objects with their keys in sorted order */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, JSON_INDENT);
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export class ActivitiesFile {
  readonly path: string;
  private data: unknown;

  private constructor(path: string, data: unknown) {
    this.path = path;
    this.data = data;
  }

  /** Read and JSON-parse the file. Throws RegistryError on failure. */
  static load(path: string): ActivitiesFile {
    try {
      return new ActivitiesFile(path, JSON.parse(readFileSync(path, 'utf-8')));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RegistryError(`Can't load ${path}: ${reason}`);
    }
  }

  static fromData(path: string, data: unknown): ActivitiesFile {
    return new ActivitiesFile(path, data);
  }

  validate(): Diagnostic[] {
    return validateRegistry(this.data);
  }

  /** Raw entries (a copy of the list); empty when the top level isn't a list */
  entries(): unknown[] {
    return Array.isArray(this.data) ? [...this.data] : [];
  }

  /** Typed records. Throws RegistryError if the registry has problems. */
  records(): PositionRecord[] {
    const diagnostics = this.validate();
    if (diagnostics.some(d => d.level === 'error')) {
      throw new RegistryError(`${this.path} has ${diagnostics.length} problem(s)`, diagnostics);
    }
    return this.entries().map((e, i) => parseRecord(e, `entry ${i + 1}`));
  }

  /** Throws DuplicateEntryError when the title or url is already present. */
  assertUnique(record: Pick<PositionRecord, 'title' | 'url'>): void {
    const existing = this.entries().filter(isPlainObject);
    const title = normalizeTitle(record.title);
    if (existing.some(e => typeof e.title === 'string' && normalizeTitle(e.title) === title)) {
      throw new DuplicateEntryError(this.path, record.title);
    }
    if (existing.some(e => e.url === record.url)) {
      throw new DuplicateEntryError(this.path, record.url);
    }
  }

  /** Append a record; it is validated first and the data is untouched on failure. */
  append(record: PositionRecord): void {
    const diagnostics = validateEntry(record, record.title || 'Entry');
    if (diagnostics.length > 0) {
      throw new RegistryError(`Refusing to add malformed entry to ${this.path}`, diagnostics);
    }
    if (!Array.isArray(this.data)) {
      throw new RegistryError(`${this.path}: Top-level data structure is not a list.`);
    }
    this.data.push({ ...record });
  }

  /** Look up an entry by exact url or case-insensitive title */
  find(query: string): PositionRecord | undefined {
    const q = normalizeTitle(query);
    return this.records().find(r => r.url === query || normalizeTitle(r.title) === q);
  }

  save(): void {
    try {
      writeFileSync(this.path, this.toString() + '\n');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RegistryError(`Can't write ${this.path}: ${reason}`);
    }
  }

  toString(): string {
    return formatJson(this.data);
  }
}
