/**
 * `qualitygate gates` command group
 *
 * Usage:
 *   qualitygate gates list --workspace <id> --project <id>   Configured gates with counters
 *   qualitygate gates seed --workspace <id> --project <id>   Create the default gate set
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (invalid config, database failure)
 */

import type { Command } from 'commander'
import type { GateConfig } from '../../core/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { openCliContext } from '../utils/context.js'
import type { CliContext } from '../utils/context.js'
import { formatTable, writeJson } from '../utils/formatting.js'

export const GATES_EXIT_SUCCESS = 0
export const GATES_EXIT_ERROR = 1

export interface GatesActionOptions {
  workspaceId: string
  projectId: string
  outputFormat: 'table' | 'json'
  projectRoot: string
  configPath?: string
  version?: string
}

function formatLastResult(gate: GateConfig): string {
  if (gate.lastResult === null) return '-'
  return gate.lastResult ? 'pass' : 'fail'
}

/**
 * Columns: Type, Name, Enabled, Blocking, Evaluations, Passed, Failed, Last Result
 */
export function formatGatesTable(gates: GateConfig[]): string {
  const headers = ['Type', 'Name', 'Enabled', 'Blocking', 'Evaluations', 'Passed', 'Failed', 'Last Result']
  const keys = ['type', 'name', 'enabled', 'blocking', 'total', 'passed', 'failed', 'last']
  const rows = gates.map((gate) => ({
    type: gate.gateType,
    name: gate.name,
    enabled: gate.isEnabled ? 'yes' : 'no',
    blocking: gate.isBlocking ? 'yes' : 'no',
    total: String(gate.totalEvaluations),
    passed: String(gate.passedEvaluations),
    failed: String(gate.failedEvaluations),
    last: formatLastResult(gate),
  }))
  return formatTable(headers, rows, keys)
}

async function withContext(
  options: GatesActionOptions,
  action: (ctx: CliContext) => number
): Promise<number> {
  let ctx: CliContext | null = null
  try {
    ctx = await openCliContext({
      projectRoot: options.projectRoot,
      ...(options.configPath !== undefined && { configPath: options.configPath }),
    })
    return action(ctx)
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return GATES_EXIT_ERROR
  } finally {
    await ctx?.close()
  }
}

export async function runGatesListAction(options: GatesActionOptions): Promise<number> {
  const { workspaceId, projectId, outputFormat, version = '0.0.0' } = options
  return withContext(options, (ctx) => {
    const gates = ctx.store.getGates(workspaceId, projectId)
    if (outputFormat === 'json') {
      writeJson('qualitygate gates list', gates, version)
    } else if (gates.length === 0) {
      process.stdout.write(
        `No gates configured for ${workspaceId}/${projectId}. Run 'qualitygate gates seed' to create the defaults.\n`
      )
    } else {
      process.stdout.write(formatGatesTable(gates) + '\n')
    }
    return GATES_EXIT_SUCCESS
  })
}

export async function runGatesSeedAction(options: GatesActionOptions): Promise<number> {
  const { workspaceId, projectId, outputFormat, version = '0.0.0' } = options
  return withContext(options, (ctx) => {
    const created = ctx.store.seedDefaultGates(workspaceId, projectId)
    if (outputFormat === 'json') {
      writeJson('qualitygate gates seed', created, version)
    } else if (created.length === 0) {
      process.stdout.write('All default gates already exist\n')
    } else {
      const types = created.map((g) => g.gateType).join(', ')
      process.stdout.write(`Created ${created.length} gate(s): ${types}\n`)
    }
    return GATES_EXIT_SUCCESS
  })
}

interface GatesCommandOpts {
  workspace: string
  project: string
  config?: string
  json: boolean
}

export function registerGatesCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd()
): void {
  const gates = program.command('gates').description('Manage the quality gates of a project')

  const toOptions = (opts: GatesCommandOpts): GatesActionOptions => ({
    workspaceId: opts.workspace,
    projectId: opts.project,
    outputFormat: opts.json ? 'json' : 'table',
    projectRoot,
    version,
    ...(opts.config !== undefined && { configPath: opts.config }),
  })

  gates
    .command('list')
    .description('List configured gates with their evaluation counters')
    .requiredOption('--workspace <id>', 'Workspace ID')
    .requiredOption('--project <id>', 'Project ID')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output JSON', false)
    .action(async (opts: GatesCommandOpts) => {
      process.exitCode = await runGatesListAction(toOptions(opts))
    })

  gates
    .command('seed')
    .description('Create the default gate set for a project')
    .requiredOption('--workspace <id>', 'Workspace ID')
    .requiredOption('--project <id>', 'Project ID')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output JSON', false)
    .action(async (opts: GatesCommandOpts) => {
      process.exitCode = await runGatesSeedAction(toOptions(opts))
    })
}
