/**
 * Specstance CLI — Terminal formatting.
 */

import chalk from 'chalk';
import { MOZ_POSITIONS, ORGS, type Diagnostic, type MozPosition, type RegistrySummary } from '../types/index.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  dim:     chalk.dim,
  bold:    chalk.bold,
  accent:  chalk.hex('#2dd4a7'),
  success: chalk.green,
  warn:    chalk.yellow,
  error:   chalk.red,
};

const POSITION_COLORS: Record<MozPosition, (s: string) => string> = {
  'under consideration': chalk.gray,
  participating:         chalk.blue,
  supportive:            chalk.green,
  'non-harmful':         chalk.cyan,
  defer:                 chalk.yellow,
  harmful:               chalk.red,
};

export function positionBadge(position: MozPosition): string {
  return POSITION_COLORS[position](position);
}

// ─── Output ──────────────────────────────────────────────────────────

/** Progress lines go to stderr so stdout stays machine-readable */
export function logInfo(message: string): void {
  console.error(C.dim(`* ${message}`));
}

export function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of diagnostics) {
    const prefix = d.level === 'error' ? C.error('✗') : C.warn('⚠');
    console.error(`${prefix} ${d.message}`);
  }
  if (diagnostics.length > 0) {
    const errors = diagnostics.filter(d => d.level === 'error').length;
    const warnings = diagnostics.filter(d => d.level === 'warning').length;
    console.error(`\n${errors} error(s), ${warnings} warning(s)\n`);
  }
}

/** Plain-text status table; zero rows are left out */
export function summaryLines(summary: RegistrySummary, project: string): string[] {
  const lines = [
    `Positions: ${project}`,
    '─'.repeat(40),
    `${'Entries:'.padEnd(24)}${summary.total}`,
    '─'.repeat(40),
  ];
  for (const p of MOZ_POSITIONS) {
    if (summary.byPosition[p] > 0) lines.push(`${(p + ':').padEnd(24)}${summary.byPosition[p]}`);
  }
  lines.push('─'.repeat(40));
  for (const o of ORGS) {
    if (summary.byOrg[o] > 0) lines.push(`${(o + ':').padEnd(24)}${summary.byOrg[o]}`);
  }
  return lines;
}
