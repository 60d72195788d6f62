/**
 * `qualitygate evaluate` command
 *
 * Runs every enabled gate of a project against a target, reading each gate's
 * artifact from `<artifacts-dir>/<gate_type>.json`.
 *
 * Usage:
 *   qualitygate evaluate --workspace <id> --project <id> --task <id>
 *   qualitygate evaluate ... --task-run <id> | --sandbox <id>
 *   qualitygate evaluate ... --artifacts <dir>       Override artifacts_dir
 *   qualitygate evaluate ... --dry-run-disabled      Record disabled gates as skipped
 *   qualitygate evaluate ... --json                  JSON output
 *
 * Exit codes:
 *   0 - Allowed (no blocking gate failed)
 *   1 - Error (invalid options, config, store or artifact directory unavailable)
 *   2 - Blocked by at least one blocking gate
 */

import type { Command } from 'commander'
import type { GateExecution, GateTarget, TargetRef } from '../../core/types.js'
import { FileArtifactProvider } from '../../modules/quality-gates/file-artifact-provider.js'
import { createQualityGateEngine } from '../../modules/quality-gates/gate-engine.js'
import type { RunResult } from '../../modules/quality-gates/types.js'
import { errorMessage, formatDuration } from '../../utils/helpers.js'
import { openCliContext } from '../utils/context.js'
import type { CliContext } from '../utils/context.js'
import { formatTable, orDash, writeJson } from '../utils/formatting.js'

export const EVALUATE_EXIT_ALLOWED = 0
export const EVALUATE_EXIT_ERROR = 1
export const EVALUATE_EXIT_BLOCKED = 2

export interface EvaluateActionOptions {
  workspaceId: string
  projectId: string
  target: TargetRef
  /** Overrides artifacts_dir from the configuration */
  artifactsDir?: string
  dryRunDisabled: boolean
  outputFormat: 'table' | 'json'
  projectRoot: string
  configPath?: string
  version?: string
  signal?: AbortSignal
}

function issueSummary(execution: GateExecution): string {
  const { critical, high, medium, low } = execution.issueCounts
  const total = critical + high + medium + low
  if (total === 0) return '-'
  return `${total} (C${critical}/H${high}/M${medium}/L${low})`
}

/**
 * Columns: Gate, Status, Blocking, Issues, Duration, Detail
 */
export function formatRunTable(result: RunResult): string {
  const headers = ['Gate', 'Status', 'Blocking', 'Issues', 'Duration', 'Detail']
  const keys = ['gate', 'status', 'blocking', 'issues', 'duration', 'detail']
  const blocking = new Set(result.blockingGateIds)
  const rows = result.executions.map((execution) => {
    const cancellation = execution.resultDetails['cancellation_reason']
    return {
      gate: execution.gateType,
      status: execution.status,
      blocking: blocking.has(execution.gateId) ? 'yes' : '-',
      issues: issueSummary(execution),
      duration: execution.durationMs === null ? '-' : formatDuration(execution.durationMs),
      detail: orDash(
        execution.errorMessage ?? (typeof cancellation === 'string' ? cancellation : null)
      ),
    }
  })
  return formatTable(headers, rows, keys)
}

export function formatRunSummary(result: RunResult): string {
  const lines: string[] = []
  const verdict = result.blocking ? 'BLOCKED' : 'ALLOWED'
  lines.push(`Run ${result.runId}: ${verdict} (${result.summary.status})`)
  if (result.summary.recommendations.length > 0) {
    lines.push('', 'Recommendations:')
    for (const rec of result.summary.recommendations) {
      lines.push(`  - ${rec}`)
    }
  }
  return lines.join('\n')
}

export async function runEvaluateAction(options: EvaluateActionOptions): Promise<number> {
  const { outputFormat, version = '0.0.0' } = options

  let ctx: CliContext | null = null
  try {
    ctx = await openCliContext({
      projectRoot: options.projectRoot,
      ...(options.configPath !== undefined && { configPath: options.configPath }),
    })
    const artifactsDir = ctx.resolvePath(options.artifactsDir ?? ctx.config.artifacts_dir)

    const engine = createQualityGateEngine({
      store: ctx.store,
      artifacts: new FileArtifactProvider(artifactsDir),
      config: {
        defaultTimeoutMs: ctx.config.default_timeout_ms,
        maxParallelGates: ctx.config.max_parallel_gates,
      },
    })
    await ctx.services.start('engine', engine)

    const target: GateTarget = {
      workspaceId: options.workspaceId,
      projectId: options.projectId,
      ref: options.target,
    }
    const result = await engine.runGates(target, {
      dryRunDisabled: options.dryRunDisabled,
      ...(options.signal !== undefined && { signal: options.signal }),
    })

    if (outputFormat === 'json') {
      writeJson('qualitygate evaluate', result, version)
    } else if (result.executions.length === 0) {
      process.stdout.write(`No enabled gates for ${options.workspaceId}/${options.projectId}\n`)
    } else {
      process.stdout.write(formatRunTable(result) + '\n\n')
      process.stdout.write(formatRunSummary(result) + '\n')
    }

    return result.blocking ? EVALUATE_EXIT_BLOCKED : EVALUATE_EXIT_ALLOWED
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return EVALUATE_EXIT_ERROR
  } finally {
    await ctx?.close()
  }
}

/** Exactly one of the target options must be given */
export function resolveTargetRef(opts: {
  task?: string
  taskRun?: string
  sandbox?: string
}): TargetRef | null {
  const refs: TargetRef[] = []
  if (opts.task !== undefined) refs.push({ kind: 'task', id: opts.task })
  if (opts.taskRun !== undefined) refs.push({ kind: 'task_run', id: opts.taskRun })
  if (opts.sandbox !== undefined) refs.push({ kind: 'sandbox_execution', id: opts.sandbox })
  return refs.length === 1 ? (refs[0] ?? null) : null
}

interface EvaluateCommandOpts {
  workspace: string
  project: string
  task?: string
  taskRun?: string
  sandbox?: string
  artifacts?: string
  config?: string
  dryRunDisabled: boolean
  json: boolean
}

export function registerEvaluateCommand(
  program: Command,
  version = '0.0.0',
  projectRoot = process.cwd()
): void {
  program
    .command('evaluate')
    .description('Run the enabled quality gates of a project against a target')
    .requiredOption('--workspace <id>', 'Workspace ID')
    .requiredOption('--project <id>', 'Project ID')
    .option('--task <id>', 'Target a task')
    .option('--task-run <id>', 'Target a task run')
    .option('--sandbox <id>', 'Target a sandbox execution')
    .option('--artifacts <dir>', 'Directory holding <gate_type>.json artifacts')
    .option('--config <path>', 'Config file path')
    .option('--dry-run-disabled', 'Record disabled gates as skipped', false)
    .option('--json', 'Output JSON', false)
    .action(async (opts: EvaluateCommandOpts) => {
      const target = resolveTargetRef(opts)
      if (target === null) {
        process.stderr.write('Error: specify exactly one of --task, --task-run or --sandbox\n')
        process.exitCode = EVALUATE_EXIT_ERROR
        return
      }

      const controller = new AbortController()
      const onSigint = (): void => controller.abort(new Error('Interrupted'))
      process.once('SIGINT', onSigint)
      try {
        process.exitCode = await runEvaluateAction({
          workspaceId: opts.workspace,
          projectId: opts.project,
          target,
          dryRunDisabled: opts.dryRunDisabled,
          outputFormat: opts.json ? 'json' : 'table',
          projectRoot,
          version,
          signal: controller.signal,
          ...(opts.artifacts !== undefined && { artifactsDir: opts.artifacts }),
          ...(opts.config !== undefined && { configPath: opts.config }),
        })
      } finally {
        process.off('SIGINT', onSigint)
      }
    })
}
