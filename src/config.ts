// Configuration loading for the survey coding server.
//
// Priority: survey-coder-config.json, then env vars, then defaults
// Each source falls through to the next on failure.

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { BehaviorConfig, CoderConfig } from './types.js';
import {
  DEFAULT_MATCH_THRESHOLD,
  DEFAULT_MAX_MATCH_RESULTS,
  DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED,
  DEFAULT_INCLUDE_MISSING_DATA,
} from './thresholds.js';

/** How the config was loaded. `path` only exists when source is 'file'. */
export type ConfigOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

/** Behavior with every field filled in */
export type ResolvedBehavior = Required<BehaviorConfig>;

export interface LoadedConfig {
  readonly config: CoderConfig;
  readonly origin: ConfigOrigin;
  readonly behavior: ResolvedBehavior;
}

/** survey-coder-config.json next to the package root */
export const DEFAULT_CONFIG_PATH = path.resolve(
  new URL('.', import.meta.url).pathname,
  '..',
  'survey-coder-config.json',
);

const configFileSchema = z.object({
  workspaceRoot: z.string().min(1).optional(),
  behavior: z.record(z.unknown()).optional(),
});

const ENV_KEYS = [
  'SURVEY_CODER_WORKSPACE',
  'SURVEY_CODER_MATCH_THRESHOLD',
  'SURVEY_CODER_MAX_RESULTS',
  'SURVEY_CODER_MULTI_CLEARS_UNCATEGORIZED',
] as const;

/** Validate and clamp a numeric threshold to a given range.
 *  Returns the default if the value is missing, NaN, or out of range. */
function clampThreshold(value: unknown, defaultValue: number, min: number, max: number): number {
  if (value === undefined || value === null || value === '') return defaultValue;
  const n = Number(value);
  if (isNaN(n) || n < min || n > max) {
    process.stderr.write(`[survey-coder] Behavior threshold out of range [${min}, ${max}]: ${String(value)}, using default ${defaultValue}\n`);
    return defaultValue;
  }
  return Math.round(n);
}

/** Booleans, or the strings "true"/"false" as env vars deliver them */
function parseFlag(key: string, value: unknown, defaultValue: boolean): boolean {
  if (value === undefined || value === null || value === '') return defaultValue;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  process.stderr.write(`[survey-coder] Behavior flag "${key}" is not a boolean: ${String(value)}, using default ${defaultValue}\n`);
  return defaultValue;
}

/** Known behavior config keys, used to warn on typos at startup */
const KNOWN_BEHAVIOR_KEYS = new Set<string>([
  'matchThreshold', 'maxMatchResults',
  'multiModeClearsUncategorized', 'includeMissingDataByDefault',
]);

/** Parse and validate a behavior config block, falling back to defaults for each field.
 *  Warns to stderr for unknown keys (likely typos) and out-of-range values. */
export function parseBehaviorConfig(raw?: Readonly<Record<string, unknown>>): ResolvedBehavior {
  const block = raw ?? {};

  for (const key of Object.keys(block)) {
    if (!KNOWN_BEHAVIOR_KEYS.has(key)) {
      process.stderr.write(
        `[survey-coder] Unknown behavior config key "${key}" ignored. ` +
        `Valid keys: ${Array.from(KNOWN_BEHAVIOR_KEYS).join(', ')}\n`
      );
    }
  }

  return {
    matchThreshold: clampThreshold(block.matchThreshold, DEFAULT_MATCH_THRESHOLD, 0, 100),
    maxMatchResults: clampThreshold(block.maxMatchResults, DEFAULT_MAX_MATCH_RESULTS, 1, 1000),
    multiModeClearsUncategorized: parseFlag(
      'multiModeClearsUncategorized', block.multiModeClearsUncategorized, DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED,
    ),
    includeMissingDataByDefault: parseFlag(
      'includeMissingDataByDefault', block.includeMissingDataByDefault, DEFAULT_INCLUDE_MISSING_DATA,
    ),
  };
}

function resolveRoot(root: string): string {
  return root
    .replace(/^\$HOME\b/, process.env.HOME ?? '')
    .replace(/^~/, process.env.HOME ?? '');
}

/** Resolve a tool-supplied file path against the workspace root */
export function resolveWorkspacePath(config: CoderConfig, filePath: string): string {
  const expanded = resolveRoot(filePath);
  return path.isAbsolute(expanded) ? expanded : path.resolve(config.workspaceRoot, expanded);
}

/** Load config with priority: config file -> env vars -> defaults */
export function getCoderConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
  // 1. Config file (highest priority)
  try {
    const raw = readFileSync(configPath, 'utf-8');
    const parsed = configFileSchema.safeParse(JSON.parse(raw));

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      process.stderr.write(`[survey-coder] Invalid survey-coder-config.json: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unreadable'}\n`);
    } else {
      const root = parsed.data.workspaceRoot ? resolveRoot(parsed.data.workspaceRoot) : process.cwd();
      const workspaceRoot = path.resolve(path.dirname(configPath), root);
      const behavior = parseBehaviorConfig(parsed.data.behavior);
      process.stderr.write(`[survey-coder] Loaded config from ${configPath} (workspace: ${workspaceRoot})\n`);
      return {
        config: { workspaceRoot, behavior },
        origin: { source: 'file', path: configPath },
        behavior,
      };
    }
  } catch (error: unknown) {
    // ENOENT is the normal case: no config file
    const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!isFileNotFound) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] Failed to parse survey-coder-config.json: ${message}\n`);
    }
  }

  // 2. Environment variables
  if (ENV_KEYS.some(key => env[key] !== undefined)) {
    const workspaceRoot = path.resolve(resolveRoot(env.SURVEY_CODER_WORKSPACE ?? process.cwd()));
    const behavior = parseBehaviorConfig({
      matchThreshold: env.SURVEY_CODER_MATCH_THRESHOLD,
      maxMatchResults: env.SURVEY_CODER_MAX_RESULTS,
      multiModeClearsUncategorized: env.SURVEY_CODER_MULTI_CLEARS_UNCATEGORIZED,
    });
    process.stderr.write(`[survey-coder] Using config from SURVEY_CODER_* env vars (workspace: ${workspaceRoot})\n`);
    return { config: { workspaceRoot, behavior }, origin: { source: 'env' }, behavior };
  }

  // 3. Defaults
  const workspaceRoot = process.cwd();
  const behavior = parseBehaviorConfig();
  process.stderr.write(`[survey-coder] Using default config (workspace: ${workspaceRoot})\n`);
  return { config: { workspaceRoot, behavior }, origin: { source: 'default' }, behavior };
}
