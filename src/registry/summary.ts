import type { Org, MozPosition, PositionRecord, RegistrySummary } from '../types/index.js';

/** Count records per position and per standards body */
export function summarize(records: PositionRecord[]): RegistrySummary {
  const byPosition: Record<MozPosition, number> = {
    'under consideration': 0,
    participating: 0,
    supportive: 0,
    'non-harmful': 0,
    defer: 0,
    harmful: 0,
  };
  const byOrg: Record<Org, number> = { W3C: 0, WHATWG: 0, IETF: 0, Ecma: 0, Other: 0 };
  for (const r of records) {
    byPosition[r.mozPosition]++;
    byOrg[r.org]++;
  }
  return { total: records.length, byPosition, byOrg };
}
