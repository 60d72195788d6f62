/**
 * FileArtifactProvider: reads tool output from `<dir>/<gate_type>.json`.
 *
 * A missing file means the tool produced nothing for that gate. A file that
 * is not valid JSON is an ArtifactError for that gate alone; any other I/O
 * failure propagates and the runner treats it as an environment fault.
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { ArtifactError } from '../../core/errors.js'
import type { GateTarget, GateType } from '../../core/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactProvider } from './artifact-provider.js'

const logger = createLogger('quality-gates:artifacts')

export class FileArtifactProvider implements ArtifactProvider {
  private readonly _dir: string

  constructor(dir: string) {
    this._dir = resolve(dir)
  }

  get directory(): string {
    return this._dir
  }

  artifactPath(gateType: GateType): string {
    return join(this._dir, `${gateType}.json`)
  }

  async getArtifact(target: GateTarget, gateType: GateType): Promise<unknown> {
    const filePath = this.artifactPath(gateType)
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug({ gateType, filePath, target: target.ref }, 'No artifact file')
        return null
      }
      throw err
    }

    try {
      return JSON.parse(raw)
    } catch (err) {
      throw new ArtifactError(`Malformed ${gateType} artifact at ${filePath}: ${errorMessage(err)}`, {
        gateType,
        filePath,
      })
    }
  }
}
