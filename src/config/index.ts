/**
 * Config Module
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  ValidatedConfigSchema,
  EmbeddingConfigSchema,
  GenerationConfigSchema,
  ChunkingConfigSchema,
  SearchConfigSchema,
  IngestionConfigSchema,
  ProviderTypeSchema,
} from './schema.js';
export type { Config, PartialConfig, ProviderType } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, mergeConfig, validateConfig, type LoadConfigOptions } from './loader.js';

export { getGrantKbDir, getDbPath, getConfigPath, resolveProjectsDir } from './paths.js';

export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

export { resolveEndpoint, type ServiceEndpoint } from './providers.js';
