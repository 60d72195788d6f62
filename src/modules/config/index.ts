/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, readEnvOverrides, ENV_VAR_MAP, DEFAULT_CONFIG_PATH } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  QualityGateConfigSchema,
  PartialQualityGateConfigSchema,
  LogLevelSchema,
} from './config-schema.js'
export type { QualityGateConfig, PartialQualityGateConfig, LogLevelValue } from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_GATE_CONFIGS } from './defaults.js'
export type { DefaultGateDefinition } from './defaults.js'
