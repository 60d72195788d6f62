/**
 * Shared setup for CLI command tests: a temporary project root and
 * captured stdout/stderr.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { vi } from 'vitest'
import type { GateType, ThresholdConfig } from '../../../core/types.js'
import { openCliContext } from '../../utils/context.js'

export interface CapturedOutput {
  stdout(): string
  stderr(): string
}

export function captureOutput(): CapturedOutput {
  const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  return {
    stdout: () => out.mock.calls.map((call) => String(call[0])).join(''),
    stderr: () => err.mock.calls.map((call) => String(call[0])).join(''),
  }
}

export async function createTempProject(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'qualitygate-cli-'))
}

export async function removeTempProject(projectRoot: string): Promise<void> {
  await rm(projectRoot, { recursive: true, force: true })
}

/** Write `<projectRoot>/.qualitygate/<relativePath>` */
export async function writeProjectFile(
  projectRoot: string,
  relativePath: string,
  content: string
): Promise<void> {
  const path = join(projectRoot, '.qualitygate', relativePath)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf-8')
}

export async function writeArtifact(projectRoot: string, gateType: GateType, artifact: unknown): Promise<void> {
  await writeProjectFile(projectRoot, join('artifacts', `${gateType}.json`), JSON.stringify(artifact))
}

/** Create a single gate in the project's database */
export async function createGate(
  projectRoot: string,
  gateType: GateType,
  thresholdConfig: ThresholdConfig
): Promise<void> {
  const ctx = await openCliContext({ projectRoot })
  try {
    ctx.store.createGateConfig({
      workspaceId: 'ws-1',
      projectId: 'proj-1',
      gateType,
      name: `${gateType} gate`,
      thresholdConfig,
    })
  } finally {
    await ctx.close()
  }
}
