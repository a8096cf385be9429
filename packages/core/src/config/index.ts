export {
  loadExtractorConfig,
  createExtractor,
  CONFIG_ENV_VARS,
  DEFAULT_MODELS,
  type ExtractorConfig,
  type ExtractorConfigOverrides,
  type ConfigEnv,
  type CreateExtractorOptions,
} from './loader';
