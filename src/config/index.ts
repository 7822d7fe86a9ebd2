/**
 * Specstance — Configuration resolution.
 *
 * Resolution order (highest to lowest priority), per setting:
 *   1. Explicit flags (--file, --owner, --repo)
 *   2. Env vars: SPECSTANCE_FILE, GH_OWNER, GH_REPO, GH_USER, GH_TOKEN
 *   3. Project config: <root>/.specstance/config.json
 *   4. Built-in defaults
 *
 * Credentials (GH_USER, GH_TOKEN) come from the environment only and are
 * never written to the project config.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';

// ─── Types ───────────────────────────────────────────────────────────

export interface ResolvedConfig {
  /** Absolute path of the registry file */
  activitiesFile: string;
  owner: string;
  repo: string;
  user?: string;
  token?: string;
}

export interface ConfigFlags {
  file?: string;
  owner?: string;
  repo?: string;
}

const savedConfigSchema = z.object({
  activitiesFile: z.string().min(1).optional(),
  owner: z.string().min(1).optional(),
  repo: z.string().min(1).optional(),
}).strict();

type SavedConfig = z.infer<typeof savedConfigSchema>;

export const DEFAULTS = {
  activitiesFile: 'activities.json',
  owner: 'mozilla',
  repo: 'standards-positions',
} as const;

// ─── Config file ─────────────────────────────────────────────────────

/** Project-level config: <root>/.specstance/config.json */
export function projectConfigPath(root: string): string {
  return join(root, '.specstance', 'config.json');
}

/** Read the project config; null when absent. Throws on malformed files. */
export function loadProjectConfig(root: string): SavedConfig | null {
  const path = projectConfigPath(root);
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Can't read ${path}: ${reason}`);
  }
  const parsed = savedConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid ${path}: ${detail}`);
  }
  return parsed.data;
}

// ─── Unified resolution ──────────────────────────────────────────────

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

/**
 * @param root  - Project root (relative registry paths resolve against it)
 * @param flags - Explicit CLI flags
 * @param env   - Environment, injectable for tests
 */
export function resolveConfig(
  root: string,
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const saved = loadProjectConfig(root) ?? {};

  const file = nonEmpty(flags.file)
    ?? nonEmpty(env.SPECSTANCE_FILE)
    ?? saved.activitiesFile
    ?? DEFAULTS.activitiesFile;

  return {
    activitiesFile: resolve(root, file),
    owner: nonEmpty(flags.owner) ?? nonEmpty(env.GH_OWNER) ?? saved.owner ?? DEFAULTS.owner,
    repo: nonEmpty(flags.repo) ?? nonEmpty(env.GH_REPO) ?? saved.repo ?? DEFAULTS.repo,
    user: nonEmpty(env.GH_USER),
    token: nonEmpty(env.GH_TOKEN),
  };
}

/** Mask a token for display: first 4 chars + asterisks */
export function maskToken(token: string): string {
  if (token.length <= 8) return '****';
  return token.slice(0, 4) + '*'.repeat(Math.min(token.length - 4, 20));
}
