/**
 * ArtifactProvider: supplies the evidence a checker evaluates.
 */

import type { GateTarget, GateType } from '../../core/types.js'

export interface ArtifactProvider {
  /**
   * The artifact produced for `gateType` against `target`, or null when the
   * tool never produced one. Throwing means the provider itself is unavailable.
   */
  getArtifact(target: GateTarget, gateType: GateType): Promise<unknown>
}
