/**
 * qualitygate CLI program definition
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { registerEvaluateCommand } from './commands/evaluate.js'
import { registerGatesCommand } from './commands/gates.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerStatsCommand } from './commands/stats.js'

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() })

/** Version from package.json; the file sits two levels up from src/cli and dist/cli */
export async function getPackageVersion(): Promise<string> {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), '../../package.json')
  let raw: string
  try {
    raw = await readFile(pkgPath, 'utf-8')
  } catch {
    return '0.0.0'
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(raw))
  return parsed.success ? parsed.data.version : '0.0.0'
}

export function createProgram(version: string, projectRoot = process.cwd()): Command {
  const program = new Command()

  program
    .name('qualitygate')
    .description('Evaluate configurable quality gates against build artifacts')
    .version(version, '-v, --version', 'Output the current version')

  registerGatesCommand(program, version, projectRoot)
  registerEvaluateCommand(program, version, projectRoot)
  registerHistoryCommand(program, version, projectRoot)
  registerStatsCommand(program, version, projectRoot)

  return program
}
