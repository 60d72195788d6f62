/**
 * Migration 002: indexes for execution history and statistics queries.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const executionIndexesMigration: Migration = {
  version: 2,
  name: '002-execution-indexes',

  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_gate_executions_gate
        ON gate_executions(gate_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_gate_executions_project
        ON gate_executions(workspace_id, project_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_gate_executions_type
        ON gate_executions(gate_type, created_at);
      CREATE INDEX IF NOT EXISTS idx_gate_executions_run
        ON gate_executions(run_id);
      CREATE INDEX IF NOT EXISTS idx_quality_gates_enabled
        ON quality_gates(is_enabled, gate_type);
    `)
  },
}
