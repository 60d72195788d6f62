/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PartialQualityGateConfig, QualityGateConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Config file to read (default: <cwd>/.qualitygate/config.yaml); a missing file is skipped */
  configPath?: string
  /** Values that override everything else, typically from CLI flags */
  overrides?: PartialQualityGateConfig
  /** Environment to read QG_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Provides access to the merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < config file < env vars < explicit overrides
 */
export interface ConfigSystem {
  /**
   * Load and validate the configuration.
   * @throws {ConfigError} on an unreadable file or an invalid value at any layer
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if load() has not completed
   */
  getConfig(): QualityGateConfig

  readonly isLoaded: boolean
}
