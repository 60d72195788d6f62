/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → config file         (./.qualitygate/config.yaml)
 *     → environment vars    (QG_* prefixed)
 *     → explicit overrides  (ConfigSystemOptions.overrides)
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { ConfigError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  PartialQualityGateConfigSchema,
  QualityGateConfigSchema,
  type PartialQualityGateConfig,
  type QualityGateConfig,
} from './config-schema.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { DEFAULT_CONFIG } from './defaults.js'

const logger = createLogger('config')

export const DEFAULT_CONFIG_PATH = '.qualitygate/config.yaml'

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** QG_ environment variables and the config keys they set */
export const ENV_VAR_MAP: Readonly<Record<string, keyof QualityGateConfig>> = {
  QG_LOG_LEVEL: 'log_level',
  QG_DEFAULT_TIMEOUT_MS: 'default_timeout_ms',
  QG_MAX_PARALLEL_GATES: 'max_parallel_gates',
  QG_DATABASE_PATH: 'database_path',
  QG_ARTIFACTS_DIR: 'artifacts_dir',
}

function coerceEnvValue(raw: string): string | number {
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  return raw
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
}

/**
 * Read QG_* variables into a partial config overlay.
 * @throws {ConfigError} naming the variable of the first invalid value
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialQualityGateConfig {
  const overrides: Record<string, string | number> = {}
  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides[configKey] = coerceEnvValue(rawValue)
  }

  const parsed = PartialQualityGateConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const key = first?.path.join('.') ?? ''
    const envVar = Object.keys(ENV_VAR_MAP).find((k) => ENV_VAR_MAP[k] === key)
    throw new ConfigError(
      `Invalid environment variable override:\n${formatIssues(parsed.error.issues)}`,
      { key, envVar }
    )
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: QualityGateConfig | null = null
  private readonly _configPath: string
  private readonly _overrides: PartialQualityGateConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._configPath = resolve(options.configPath ?? DEFAULT_CONFIG_PATH)
    this._overrides = options.overrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const fileConfig = await this._loadYamlFile(this._configPath)
    const envConfig = readEnvOverrides(this._env)

    const merged = {
      ...DEFAULT_CONFIG,
      ...(fileConfig ?? {}),
      ...envConfig,
      ...this._overrides,
    }

    const result = QualityGateConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        key: result.error.issues[0]?.path.join('.'),
      })
    }

    this._config = result.data
    logger.debug({ configPath: this._configPath, fromFile: fileConfig !== null }, 'Configuration loaded')
  }

  getConfig(): QualityGateConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialQualityGateConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null
      }
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Invalid YAML in config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }
    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) {
      return {}
    }

    const result = PartialQualityGateConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        key: result.error.issues[0]?.path.join('.'),
      })
    }
    return result.data
  }
}

/**
 * @example
 * const config = createConfigSystem({ configPath: 'qualitygate.yaml' })
 * await config.load()
 * const { max_parallel_gates } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
