export {
  loadConfig,
  ENV_LOG_LEVEL,
  ENV_TIMEOUT_MS,
  type ConfigLoadResult,
  type ConfigLoadOptions,
} from './config-manager.js';
export {
  RegistryConfigSchema,
  DEFAULT_REGISTRY_CONFIG,
  resolveRegistryConfig,
  type ValidatedRegistryConfig,
  type ResolvedRegistryConfig,
} from './schema.js';
