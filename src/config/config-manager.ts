/**
 * Unified Configuration Loader
 *
 * Single entry point for loading, merging, and validating configuration
 * from user-level (~/.config/convoy/config.json) and project-level
 * (.convoy/config.json) sources.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { UserConfigSchema, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

type JsonObject = Record<string, unknown>;

const MAX_VALIDATION_PASSES = 10;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(base: JsonObject, override: JsonObject): JsonObject {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isJsonObject(value) && isJsonObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

/**
 * Copy of `obj` without the value at `path`. Returns null when the path
 * is the root (nothing left to keep).
 */
function omitPath(obj: JsonObject, path: ReadonlyArray<string | number>): JsonObject | null {
  if (path.length === 0) return null;

  const [head, ...rest] = path;
  const key = String(head);
  const copy = { ...obj };
  const child = copy[key];

  if (rest.length === 0 || !isJsonObject(child)) {
    delete copy[key];
    return copy;
  }

  const pruned = omitPath(child, rest);
  if (pruned === null) {
    delete copy[key];
  } else {
    copy[key] = pruned;
  }
  return copy;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): JsonObject | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  if (!isJsonObject(parsed)) {
    warnings.push(`${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
    return null;
  }

  return parsed;
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user).
 * Validates the merged result with Zod. Invalid values are dropped and
 * reported as warnings; the best-effort config is always returned.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  // 1. Load user-level config
  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  // 2. Load project-level config
  let projectRaw: JsonObject | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  // 3. Deep merge: user ← project
  let merged: JsonObject = userRaw ? { ...userRaw } : {};
  if (projectRaw) {
    merged = deepMergeConfigs(merged, projectRaw);
  }

  // 4. Validate, dropping each offending value until the rest parses
  for (let attempt = 0; attempt < MAX_VALIDATION_PASSES; attempt++) {
    const result = UserConfigSchema.safeParse(merged);
    if (result.success) {
      return { config: result.data, sources, warnings };
    }

    let next: JsonObject | null = merged;
    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      warnings.push(`config validation: ${path}: ${issue.message}`);

      const offending =
        issue.code === 'unrecognized_keys' ? issue.keys.map((key) => [...issue.path, key]) : [issue.path];
      for (const target of offending) {
        next = next === null ? null : omitPath(next, target);
      }
    }

    if (next === null) break;
    merged = next;
  }

  return { config: {}, sources, warnings };
}
