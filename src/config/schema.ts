/**
 * Zod schema for registry configuration (config.json).
 *
 * Validates what users write in `~/.config/toolshelf/config.json` or
 * `.toolshelf/config.json`.
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../utilities/cancellation.js';
import { LOG_LEVELS, type LogLevel } from '../utilities/logger.js';

const LogLevelSchema = z.enum(LOG_LEVELS);

const SearchSchema = z
  .object({
    defaultLimit: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Top level uses `.passthrough()` so unrelated keys survive; nested
 * sections use `.strict()` to catch typos.
 */
export const RegistryConfigSchema = z
  .object({
    /** Transport timeout applied when a call passes none; 0 disables it */
    defaultTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
    logLevel: LogLevelSchema.optional(),
    /** JSON files holding descriptor arrays, registered at startup */
    catalogPaths: z.array(z.string()).optional(),
    /** Root of a `<category>/<name>.json` descriptor tree */
    toolsDirectory: z.string().optional(),
    search: SearchSchema.optional(),
  })
  .passthrough();

export type ValidatedRegistryConfig = z.infer<typeof RegistryConfigSchema>;

/**
 * Config with every default applied.
 */
export interface ResolvedRegistryConfig {
  defaultTimeoutMs: number;
  logLevel: LogLevel;
  catalogPaths: string[];
  toolsDirectory?: string;
  searchLimit: number;
}

export const DEFAULT_REGISTRY_CONFIG: ResolvedRegistryConfig = {
  defaultTimeoutMs: 30000,
  logLevel: 'info',
  catalogPaths: [],
  searchLimit: 5,
};

export function resolveRegistryConfig(config: ValidatedRegistryConfig = {}): ResolvedRegistryConfig {
  return {
    defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_REGISTRY_CONFIG.defaultTimeoutMs,
    logLevel: config.logLevel ?? DEFAULT_REGISTRY_CONFIG.logLevel,
    catalogPaths: config.catalogPaths ?? [...DEFAULT_REGISTRY_CONFIG.catalogPaths],
    ...(config.toolsDirectory !== undefined && { toolsDirectory: config.toolsDirectory }),
    searchLimit: config.search?.defaultLimit ?? DEFAULT_REGISTRY_CONFIG.searchLimit,
  };
}
