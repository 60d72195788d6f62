/**
 * Shared setup for CLI commands: load configuration, start the database
 * service and build the gate store on top of it.
 *
 * Services are started through a ServiceLifecycle so `close()` stops them
 * in reverse order; `evaluate` starts the engine after the database.
 */

import { isAbsolute, resolve } from 'node:path'
import { ServiceLifecycle } from '../../core/di.js'
import type { PartialQualityGateConfig, QualityGateConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem, DEFAULT_CONFIG_PATH } from '../../modules/config/config-system-impl.js'
import { SqliteGateStore } from '../../modules/quality-gates/sqlite-gate-store.js'
import { createDatabaseService, IN_MEMORY } from '../../persistence/database.js'
import { setLogLevel } from '../../utils/logger.js'

export interface CliContextOptions {
  projectRoot: string
  /** Config file path; relative paths resolve against projectRoot */
  configPath?: string
  overrides?: PartialQualityGateConfig
  env?: NodeJS.ProcessEnv
}

export interface CliContext {
  config: QualityGateConfig
  services: ServiceLifecycle
  store: SqliteGateStore
  /** Resolve a path from the configuration against the project root */
  resolvePath(path: string): string
  close(): Promise<void>
}

export async function openCliContext(options: CliContextOptions): Promise<CliContext> {
  const { projectRoot } = options
  const resolvePath = (path: string): string =>
    isAbsolute(path) ? path : resolve(projectRoot, path)

  const configSystem = createConfigSystem({
    configPath: resolvePath(options.configPath ?? DEFAULT_CONFIG_PATH),
    ...(options.overrides !== undefined && { overrides: options.overrides }),
    ...(options.env !== undefined && { env: options.env }),
  })
  await configSystem.load()
  const config = configSystem.getConfig()
  setLogLevel(config.log_level)

  const services = new ServiceLifecycle()
  const database = await services.start(
    'database',
    createDatabaseService(
      config.database_path === IN_MEMORY ? IN_MEMORY : resolvePath(config.database_path)
    )
  )

  return {
    config,
    services,
    store: new SqliteGateStore(database.db),
    resolvePath,
    close: () => services.stopAll(),
  }
}
