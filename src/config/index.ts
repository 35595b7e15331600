export {
  TrialWatchConfigSchema,
  PipelineConfigSchema,
  LiteratureConfigSchema,
  RegistryConfigSchema,
  TopicConfigSchema,
  type TrialWatchConfig,
  type TrialWatchConfigInput,
  type PipelineConfig,
  type LiteratureConfig,
  type RegistryConfig,
  type TopicConfig,
} from './schema.js';
export { ConfigError, ENV, loadConfig, loadEnvironment, parseConfig } from './loader.js';
