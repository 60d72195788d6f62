/**
 * `qualitygate history` command
 *
 * Paginated execution history of a project, newest first.
 *
 * Usage:
 *   qualitygate history --workspace <id> --project <id>
 *   qualitygate history ... --gate-type <type>    Only one gate type
 *   qualitygate history ... --limit <n> --offset <n>
 *   qualitygate history ... --json
 *
 * Exit codes:
 *   0 - Success (including empty result)
 *   1 - Error (invalid option, config or database failure)
 */

import type { Command } from 'commander'
import type { GateExecution } from '../../core/types.js'
import { GATE_TYPES, isGateType } from '../../core/types.js'
import type { GateType } from '../../core/types.js'
import type { ExecutionHistory } from '../../modules/quality-gates/sqlite-gate-store.js'
import { DEFAULT_HISTORY_LIMIT } from '../../modules/quality-gates/sqlite-gate-store.js'
import { errorMessage } from '../../utils/helpers.js'
import { openCliContext } from '../utils/context.js'
import type { CliContext } from '../utils/context.js'
import { formatTable, orDash, writeJson } from '../utils/formatting.js'

export const HISTORY_EXIT_SUCCESS = 0
export const HISTORY_EXIT_ERROR = 1

export interface HistoryActionOptions {
  workspaceId: string
  projectId: string
  gateType?: GateType
  limit: number
  offset: number
  outputFormat: 'table' | 'json'
  projectRoot: string
  configPath?: string
  version?: string
}

function targetLabel(execution: GateExecution): string {
  return `${execution.target.kind}:${execution.target.id}`
}

/**
 * Columns: Created, Run, Gate, Target, Status, Issues, Duration (ms)
 */
export function formatHistoryTable(executions: GateExecution[]): string {
  const headers = ['Created', 'Run', 'Gate', 'Target', 'Status', 'Issues', 'Duration (ms)']
  const keys = ['created', 'run', 'gate', 'target', 'status', 'issues', 'duration']
  const rows = executions.map((execution) => {
    const { critical, high, medium, low } = execution.issueCounts
    return {
      created: execution.createdAt,
      run: execution.runId,
      gate: execution.gateType,
      target: targetLabel(execution),
      status: execution.status,
      issues: String(critical + high + medium + low),
      duration: orDash(execution.durationMs),
    }
  })
  return formatTable(headers, rows, keys)
}

export async function runHistoryAction(options: HistoryActionOptions): Promise<number> {
  const { workspaceId, projectId, gateType, limit, offset, outputFormat, version = '0.0.0' } = options

  if (!Number.isInteger(limit) || limit < 1) {
    process.stderr.write(`Error: --limit must be a positive integer\n`)
    return HISTORY_EXIT_ERROR
  }
  if (!Number.isInteger(offset) || offset < 0) {
    process.stderr.write(`Error: --offset must be a non-negative integer\n`)
    return HISTORY_EXIT_ERROR
  }

  let ctx: CliContext | null = null
  try {
    ctx = await openCliContext({
      projectRoot: options.projectRoot,
      ...(options.configPath !== undefined && { configPath: options.configPath }),
    })
    const history: ExecutionHistory = ctx.store.getExecutionHistory({
      workspaceId,
      projectId,
      limit,
      offset,
      ...(gateType !== undefined && { gateType }),
    })

    if (outputFormat === 'json') {
      writeJson('qualitygate history', history, version)
    } else if (history.executions.length === 0) {
      process.stdout.write('No gate executions found\n')
    } else {
      process.stdout.write(formatHistoryTable(history.executions) + '\n')
      const last = offset + history.executions.length
      process.stdout.write(`\nShowing ${offset + 1}-${last} of ${history.totalCount}\n`)
    }
    return HISTORY_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return HISTORY_EXIT_ERROR
  } finally {
    await ctx?.close()
  }
}

interface HistoryCommandOpts {
  workspace: string
  project: string
  gateType?: string
  limit: string
  offset: string
  config?: string
  json: boolean
}

export function registerHistoryCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd()
): void {
  program
    .command('history')
    .description('Show the gate execution history of a project, newest first')
    .requiredOption('--workspace <id>', 'Workspace ID')
    .requiredOption('--project <id>', 'Project ID')
    .option('--gate-type <type>', `Only this gate type (${GATE_TYPES.join(', ')})`)
    .option('--limit <n>', 'Maximum number of executions', String(DEFAULT_HISTORY_LIMIT))
    .option('--offset <n>', 'Executions to skip', '0')
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output JSON', false)
    .action(async (opts: HistoryCommandOpts) => {
      const { gateType } = opts
      if (gateType !== undefined && !isGateType(gateType)) {
        process.stderr.write(
          `Error: Invalid gate type '${gateType}'. Valid types: ${GATE_TYPES.join(', ')}\n`
        )
        process.exitCode = HISTORY_EXIT_ERROR
        return
      }
      process.exitCode = await runHistoryAction({
        workspaceId: opts.workspace,
        projectId: opts.project,
        limit: parseInt(opts.limit, 10),
        offset: parseInt(opts.offset, 10),
        outputFormat: opts.json ? 'json' : 'table',
        projectRoot,
        version,
        ...(gateType !== undefined && { gateType }),
        ...(opts.config !== undefined && { configPath: opts.config }),
      })
    })
}
