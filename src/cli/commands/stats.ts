/**
 * `qualitygate stats` command
 *
 * Per-gate-type outcome statistics over the last N days.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (invalid option, config or database failure)
 */

import type { Command } from 'commander'
import type { GateStatistics } from '../../modules/quality-gates/sqlite-gate-store.js'
import { DEFAULT_STATISTICS_DAYS } from '../../modules/quality-gates/sqlite-gate-store.js'
import { errorMessage } from '../../utils/helpers.js'
import { openCliContext } from '../utils/context.js'
import type { CliContext } from '../utils/context.js'
import { formatPercent, formatTable, orDash, writeJson } from '../utils/formatting.js'

export const STATS_EXIT_SUCCESS = 0
export const STATS_EXIT_ERROR = 1

export interface StatsActionOptions {
  workspaceId: string
  projectId: string
  days: number
  outputFormat: 'table' | 'json'
  projectRoot: string
  configPath?: string
  version?: string
}

export function formatStatsTable(stats: GateStatistics): string {
  const headers = ['Gate', 'Total', 'Passed', 'Warnings', 'Failed', 'Errors', 'Timeouts', 'Skipped', 'Success', 'Avg (ms)']
  const keys = ['gate', 'total', 'passed', 'warnings', 'failed', 'errors', 'timeouts', 'skipped', 'success', 'avg']
  const rows = stats.byGateType.map((s) => ({
    gate: s.gateType,
    total: String(s.total),
    passed: String(s.passed),
    warnings: String(s.warnings),
    failed: String(s.failed),
    errors: String(s.errors),
    timeouts: String(s.timeouts),
    skipped: String(s.skipped),
    success: formatPercent(s.successRate),
    avg: orDash(s.averageDurationMs),
  }))
  return formatTable(headers, rows, keys)
}

export async function runStatsAction(options: StatsActionOptions): Promise<number> {
  const { workspaceId, projectId, days, outputFormat, version = '0.0.0' } = options

  if (!Number.isInteger(days) || days < 1) {
    process.stderr.write('Error: --days must be a positive integer\n')
    return STATS_EXIT_ERROR
  }

  let ctx: CliContext | null = null
  try {
    ctx = await openCliContext({
      projectRoot: options.projectRoot,
      ...(options.configPath !== undefined && { configPath: options.configPath }),
    })
    const stats = ctx.store.getStatistics(workspaceId, projectId, days)

    if (outputFormat === 'json') {
      writeJson('qualitygate stats', stats, version)
    } else if (stats.totalExecutions === 0) {
      process.stdout.write(`No gate executions in the last ${days} day(s)\n`)
    } else {
      process.stdout.write(formatStatsTable(stats) + '\n')
      process.stdout.write(
        `\n${stats.totalExecutions} execution(s), ${formatPercent(stats.successRate)} success over ${days} day(s)\n`
      )
    }
    return STATS_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return STATS_EXIT_ERROR
  } finally {
    await ctx?.close()
  }
}

export function registerStatsCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd()
): void {
  program
    .command('stats')
    .description('Show per-gate-type statistics over recent executions')
    .requiredOption('--workspace <id>', 'Workspace ID')
    .requiredOption('--project <id>', 'Project ID')
    .option('--days <n>', 'Period in days', String(DEFAULT_STATISTICS_DAYS))
    .option('--config <path>', 'Config file path')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { workspace: string; project: string; days: string; config?: string; json: boolean }) => {
      process.exitCode = await runStatsAction({
        workspaceId: opts.workspace,
        projectId: opts.project,
        days: parseInt(opts.days, 10),
        outputFormat: opts.json ? 'json' : 'table',
        projectRoot,
        version,
        ...(opts.config !== undefined && { configPath: opts.config }),
      })
    })
}
