export {
  configSchema,
  type AgentConfig,
  type AgentOverride,
  type ConfigData,
  type ConfigSource,
  type Configuration,
  type DeepReadonly,
  type LoggingSettings,
  type OrchestratorSettings,
  type ProviderSection,
} from './config.js';
export { ConfigResolver, fileConfigSource, resolveAgentConfig, type ConfigResolverOptions, type SanitizedConfiguration } from './resolver.js';
export { isSensitiveKey, redactSecrets, REDACTED } from './sanitize.js';
export * from './defaults.js';
