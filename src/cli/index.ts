#!/usr/bin/env node
/**
 * qualitygate CLI - main entry point
 */

import { createLogger } from '../utils/logger.js'
import { createProgram, getPackageVersion } from './program.js'

const logger = createLogger('cli')

async function main(): Promise<void> {
  try {
    const version = await getPackageVersion()
    await createProgram(version).parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
