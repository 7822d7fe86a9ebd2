/**
 * Specstance — Error types.
 *
 * Library code throws these; the CLI prints the message and exits 1.
 */

import type { Diagnostic } from '../types/index.js';

/** The registry (or a record bound for it) failed to load or validate */
export class RegistryError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(message: string, diagnostics: Diagnostic[] = []) {
    super(message);
    this.name = 'RegistryError';
    this.diagnostics = diagnostics;
  }
}

export class DuplicateEntryError extends Error {
  constructor(file: string, key: string) {
    super(`${file} already contains ${key}`);
    this.name = 'DuplicateEntryError';
  }
}

/** A spec page could not be fetched or does not look like a specification */
export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FetchError';
  }
}

export class UnknownOrgError extends Error {
  readonly host: string;

  constructor(host: string) {
    super(`Can't figure out what organisation ${host} belongs to!`);
    this.name = 'UnknownOrgError';
    this.host = host;
  }
}

export class IssueError extends Error {
  readonly status: number;

  constructor(status: number, detail: string) {
    super(`Failed to create issue; status ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'IssueError';
    this.status = status;
  }
}
