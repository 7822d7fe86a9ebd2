/**
 * Specstance — Core type definitions for the positions registry.
 */

// ─── Enums ───────────────────────────────────────────────────────────

export const MOZ_POSITIONS = [
  'under consideration',
  'participating',
  'supportive',
  'non-harmful',
  'defer',
  'harmful',
] as const;

export type MozPosition = typeof MOZ_POSITIONS[number];

export const ORGS = ['W3C', 'WHATWG', 'IETF', 'Ecma', 'Other'] as const;

export type Org = typeof ORGS[number];

// ─── Records ─────────────────────────────────────────────────────────

/** One entry of activities.json: a stance on a single specification. */
export interface PositionRecord {
  title: string;
  description: string;
  org: Org;
  url: string;
  mozPosition: MozPosition;
  ciuName: string | null;
  group: string | null;
  mozBugUrl: string | null;
  mozPositionIssue: number | null;
  mozPositionDetail: string | null;
}

/** What a spec page tells us about itself */
export interface SpecData {
  title: string;
  description: string;
  org: Org;
  url: string;
}

// ─── Diagnostics ─────────────────────────────────────────────────────

export interface Diagnostic {
  level: 'error' | 'warning';
  message: string;
  /** 1-based index of the entry in the registry */
  entry?: number;
}

export interface RegistrySummary {
  total: number;
  byPosition: Record<MozPosition, number>;
  byOrg: Record<Org, number>;
}

// ─── Plumbing ────────────────────────────────────────────────────────

/** Progress sink; the CLI points this at stderr */
export type Logger = (message: string) => void;

/** The subset of a fetch Response the tool reads */
export interface HttpResponse {
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export type HttpFetch = (url: string, init?: RequestInit) => Promise<HttpResponse>;
