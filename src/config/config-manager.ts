/**
 * Configuration Loader
 *
 * Loads, merges and validates registry configuration from the user-level
 * (~/.config/toolshelf/config.json) and project-level
 * (.toolshelf/config.json) files, then applies environment overrides.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { formatError } from '../errors/index.js';
import { MAX_TIMER_DELAY_MS } from '../utilities/cancellation.js';
import { isLogLevel } from '../utilities/logger.js';
import { RegistryConfigSchema, type ValidatedRegistryConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Environment to read overrides from (defaults to process.env) */
  env?: Record<string, string | undefined>;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedRegistryConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

export const ENV_LOG_LEVEL = 'TOOLSHELF_LOG_LEVEL';
export const ENV_TIMEOUT_MS = 'TOOLSHELF_TIMEOUT_MS';

// =============================================================================
// MERGE
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Parse errors are collected as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isPlainObject(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON — ${formatError(err)}`);
    return null;
  }
}

function applyEnvOverrides(
  config: Record<string, unknown>,
  env: Record<string, string | undefined>,
  warnings: string[],
): Record<string, unknown> {
  const result = { ...config };

  const level = env[ENV_LOG_LEVEL];
  if (level !== undefined && level !== '') {
    if (isLogLevel(level)) {
      result.logLevel = level;
    } else {
      warnings.push(`${ENV_LOG_LEVEL}: unknown log level "${level}"`);
    }
  }

  const timeout = env[ENV_TIMEOUT_MS];
  if (timeout !== undefined && timeout !== '') {
    const parsed = Number(timeout);
    if (Number.isInteger(parsed) && parsed >= 0 && parsed <= MAX_TIMER_DELAY_MS) {
      result.defaultTimeoutMs = parsed;
    } else {
      warnings.push(`${ENV_TIMEOUT_MS}: expected an integer from 0 to ${MAX_TIMER_DELAY_MS}, got "${timeout}"`);
    }
  }

  return result;
}

/**
 * Load configuration.
 *
 * Priority: user ← project ← environment.
 * Validation issues become warnings; keys that fail validation are dropped
 * and the rest of the config is kept.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false, env = process.env } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: Record<string, unknown> | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  let merged: Record<string, unknown> = userRaw ? { ...userRaw } : {};
  if (projectRaw) {
    merged = mergeConfigs(merged, projectRaw);
  }
  merged = applyEnvOverrides(merged, env, warnings);

  const result = RegistryConfigSchema.safeParse(merged);
  if (result.success) {
    return { config: result.data, sources, warnings };
  }

  const invalidKeys = new Set<string>();
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`config validation: ${path} — ${issue.message}`);
    if (issue.path.length > 0) {
      invalidKeys.add(String(issue.path[0]));
    }
  }

  const cleaned = Object.fromEntries(Object.entries(merged).filter(([key]) => !invalidKeys.has(key)));
  const retry = RegistryConfigSchema.safeParse(cleaned);
  return { config: retry.success ? retry.data : {}, sources, warnings };
}
