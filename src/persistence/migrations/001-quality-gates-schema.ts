/**
 * Migration 001: quality gate schema.
 *
 * Creates:
 *  - quality_gates: one row per (workspace, project, gate type) with its
 *    thresholds and rolling evaluation counters
 *  - gate_executions: one row per gate evaluated in a run
 *
 * JSON-valued columns (threshold_config, issues, metrics, ...) are stored as
 * TEXT and decoded by the query layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { GATE_TYPES } from '../../core/types.js'
import type { Migration } from './index.js'

const GATE_TYPE_LIST = GATE_TYPES.map((t) => `'${t}'`).join(', ')

export const qualityGatesSchemaMigration: Migration = {
  version: 1,
  name: '001-quality-gates-schema',

  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS quality_gates (
        id                  TEXT    PRIMARY KEY,
        workspace_id        TEXT    NOT NULL,
        project_id          TEXT    NOT NULL,
        gate_type           TEXT    NOT NULL CHECK (gate_type IN (${GATE_TYPE_LIST})),
        name                TEXT    NOT NULL,
        description         TEXT,
        is_enabled          INTEGER NOT NULL DEFAULT 1 CHECK (is_enabled IN (0, 1)),
        is_blocking         INTEGER NOT NULL DEFAULT 1 CHECK (is_blocking IN (0, 1)),
        threshold_config    TEXT    NOT NULL DEFAULT '{}',
        timeout_ms          INTEGER CHECK (timeout_ms IS NULL OR timeout_ms > 0),
        total_evaluations   INTEGER NOT NULL DEFAULT 0,
        passed_evaluations  INTEGER NOT NULL DEFAULT 0,
        failed_evaluations  INTEGER NOT NULL DEFAULT 0,
        last_evaluation_at  TEXT,
        last_result         INTEGER CHECK (last_result IS NULL OR last_result IN (0, 1)),
        created_at          TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at          TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        UNIQUE (workspace_id, project_id, gate_type)
      )
    `)

    db.exec(`
      CREATE TABLE IF NOT EXISTS gate_executions (
        id                    TEXT    PRIMARY KEY,
        run_id                TEXT    NOT NULL,
        gate_id               TEXT    NOT NULL REFERENCES quality_gates(id) ON DELETE RESTRICT,
        gate_type             TEXT    NOT NULL CHECK (gate_type IN (${GATE_TYPE_LIST})),
        workspace_id          TEXT    NOT NULL,
        project_id            TEXT    NOT NULL,
        task_id               TEXT,
        task_run_id           TEXT,
        sandbox_execution_id  TEXT,
        status                TEXT    NOT NULL CHECK (status IN (
                                'pending', 'running', 'passed', 'failed',
                                'warning', 'skipped', 'error', 'timeout')),
        created_at            TEXT    NOT NULL,
        started_at            TEXT,
        completed_at          TEXT,
        duration_ms           INTEGER,
        passed                INTEGER CHECK (passed IS NULL OR passed IN (0, 1)),
        passed_with_warnings  INTEGER NOT NULL DEFAULT 0,
        critical_issues       INTEGER NOT NULL DEFAULT 0,
        high_issues           INTEGER NOT NULL DEFAULT 0,
        medium_issues         INTEGER NOT NULL DEFAULT 0,
        low_issues            INTEGER NOT NULL DEFAULT 0,
        issues                TEXT    NOT NULL DEFAULT '[]',
        metrics               TEXT    NOT NULL DEFAULT '{}',
        recommendations       TEXT    NOT NULL DEFAULT '[]',
        result_details        TEXT    NOT NULL DEFAULT '{}',
        config_used           TEXT    NOT NULL DEFAULT '{}',
        error_message         TEXT,
        counted_at            TEXT,
        CHECK ((task_id IS NOT NULL) + (task_run_id IS NOT NULL) + (sandbox_execution_id IS NOT NULL) <= 1),
        CHECK ((completed_at IS NULL) = (duration_ms IS NULL))
      )
    `)
  },
}
