/**
 * Specstance CLI — command definitions.
 *
 * Usage:
 *   specstance validate [file]        Check activities.json for malformed entries
 *   specstance format <url>           Scrape a spec and print the entry as JSON
 *   specstance add <url>              Scrape, file an issue, and append the entry
 *   specstance status [file]          Count entries per position and org
 *   specstance show <query> [file]    Print one entry by url or title
 *   specstance config                 Show the resolved configuration
 *
 * To create GitHub issues, GH_USER and GH_TOKEN must be in the environment;
 * the token needs the `repo` permission.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import gradient from 'gradient-string';
import { z } from 'zod';
import { ActivitiesFile, formatJson, summarize } from '../registry/index.js';
import { fetchSpecEntry } from '../scrape/index.js';
import { addEntry } from '../add/index.js';
import { resolveConfig, maskToken, projectConfigPath, type ConfigFlags, type ResolvedConfig } from '../config/index.js';
import { RegistryError } from '../errors/index.js';
import { MOZ_POSITIONS, type MozPosition } from '../types/index.js';
import { C, logInfo, positionBadge, printDiagnostics, summaryLines } from './format.js';

const BANNER = 'specstance — standards positions registry';

function packageVersion(): string {
  try {
    const pkg = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    return typeof pkg.version === 'string' ? pkg.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

/** Print a failure and exit 1; diagnostics attached to RegistryError are listed too */
export function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${C.error('✗')} ${message}`);
  if (err instanceof RegistryError && err.diagnostics.length > 0) {
    printDiagnostics(err.diagnostics);
  }
  process.exit(1);
}

function parsePosition(raw: string | undefined): MozPosition | undefined {
  if (raw === undefined) return undefined;
  const parsed = z.enum(MOZ_POSITIONS).safeParse(raw);
  if (!parsed.success) {
    fail(new Error(`Unknown position "${raw}". Available: ${MOZ_POSITIONS.join(', ')}`));
  }
  return parsed.data;
}

/** Load the registry and stop on any validation error */
function loadValid(flags: ConfigFlags): { registry: ActivitiesFile; config: ResolvedConfig } {
  const config = resolveConfig(process.cwd(), flags);
  const registry = ActivitiesFile.load(config.activitiesFile);
  const diagnostics = registry.validate();
  if (diagnostics.some(d => d.level === 'error')) {
    throw new RegistryError(`${basename(config.activitiesFile)} has ${diagnostics.length} problem(s)`, diagnostics);
  }
  printDiagnostics(diagnostics);
  return { registry, config };
}

/** Build a fresh program; the bin entry parses process.argv with it */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name('specstance')
    .description('Validate and add entries to a standards positions registry')
    .version(packageVersion())
    .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(BANNER) + '\n');

  // ─── validate ──────────────────────────────────────────────────────

  program
    .command('validate')
    .description('Check the registry for missing, mistyped and unknown members')
    .argument('[file]', 'Registry file (default: activities.json)')
    .action((file: string | undefined) => {
      let registry: ActivitiesFile;
      try {
        registry = ActivitiesFile.load(resolveConfig(process.cwd(), { file }).activitiesFile);
      } catch (err) {
        fail(err);
      }
      const diagnostics = registry.validate();
      printDiagnostics(diagnostics);
      if (diagnostics.some(d => d.level === 'error')) process.exit(1);
      console.error(C.success(`✓ ${basename(registry.path)}: ${registry.entries().length} entries valid.`));
    });

  // ─── format ────────────────────────────────────────────────────────

  program
    .command('format')
    .description('Scrape a specification and print its new entry as JSON')
    .argument('<url>', 'Specification URL')
    .option('--position <position>', `Initial position (${MOZ_POSITIONS.join(', ')})`)
    .action(async (url: string, opts: { position?: string }) => {
      try {
        const entry = await fetchSpecEntry(url, { log: logInfo, position: parsePosition(opts.position) });
        console.log(formatJson(entry));
      } catch (err) {
        fail(err);
      }
    });

  // ─── add ───────────────────────────────────────────────────────────

  program
    .command('add')
    .description('Scrape a specification, open a tracking issue, and append it to the registry')
    .argument('<url>', 'Specification URL')
    .option('-f, --file <file>', 'Registry file')
    .option('--owner <owner>', 'GitHub owner for the tracking issue')
    .option('--repo <repo>', 'GitHub repository for the tracking issue')
    .option('--position <position>', `Initial position (${MOZ_POSITIONS.join(', ')})`)
    .option('--no-issue', 'Do not create a GitHub issue')
    .action(async (url: string, opts: ConfigFlags & { position?: string; issue: boolean }) => {
      try {
        const position = parsePosition(opts.position);
        const config = resolveConfig(process.cwd(), opts);
        const registry = ActivitiesFile.load(config.activitiesFile);
        const entry = await addEntry(registry, url, config, { log: logInfo, position, issue: opts.issue });
        console.error(C.success(`✓ Added "${entry.title}" to ${basename(config.activitiesFile)}`));
      } catch (err) {
        fail(err);
      }
    });

  // ─── status ────────────────────────────────────────────────────────

  program
    .command('status')
    .description('Count registry entries per position and standards body')
    .argument('[file]', 'Registry file (default: activities.json)')
    .action((file: string | undefined) => {
      try {
        const { registry, config } = loadValid({ file });
        for (const line of summaryLines(summarize(registry.records()), basename(config.activitiesFile))) {
          console.log(line);
        }
      } catch (err) {
        fail(err);
      }
    });

  // ─── show ──────────────────────────────────────────────────────────

  program
    .command('show')
    .description('Print one entry, looked up by url or title')
    .argument('<query>', 'Spec url or title (case-insensitive)')
    .argument('[file]', 'Registry file (default: activities.json)')
    .option('--json', 'Output as JSON')
    .action((query: string, file: string | undefined, opts: { json?: boolean }) => {
      try {
        const { registry } = loadValid({ file });
        const entry = registry.find(query);
        if (!entry) fail(new Error(`No entry matches "${query}"`));

        if (opts.json) {
          console.log(formatJson(entry));
          return;
        }
        console.log(C.accent.bold(entry.title));
        console.log(`  ${entry.org} — ${entry.url}`);
        console.log(`  Position: ${positionBadge(entry.mozPosition)}`);
        if (entry.mozPositionIssue !== null) console.log(`  Issue:    #${entry.mozPositionIssue}`);
        if (entry.mozBugUrl) console.log(`  Bug:      ${entry.mozBugUrl}`);
        if (entry.ciuName) console.log(`  caniuse:  ${entry.ciuName}`);
        if (entry.mozPositionDetail) console.log(`\n  ${entry.mozPositionDetail}`);
        console.log(`\n  ${C.dim(entry.description)}`);
      } catch (err) {
        fail(err);
      }
    });

  // ─── config ────────────────────────────────────────────────────────

  program
    .command('config')
    .description('Show the resolved configuration')
    .action(() => {
      try {
        const root = process.cwd();
        const config = resolveConfig(root);
        console.log(`Registry:       ${config.activitiesFile}`);
        console.log(`Issues repo:    ${config.owner}/${config.repo}`);
        console.log(`GitHub user:    ${config.user ?? C.dim('(unset)')}`);
        console.log(`GitHub token:   ${config.token ? maskToken(config.token) : C.dim('(unset)')}`);
        console.log(`Project config: ${projectConfigPath(root)}`);
      } catch (err) {
        fail(err);
      }
    });

  return program;
}
