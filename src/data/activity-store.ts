import type Database from 'better-sqlite3'
import type { Statement } from 'better-sqlite3'
import type { ActivityRecord, NewActivity, ProjectSource } from '../types'
import { ACTIVITY_COLUMNS, type ActivityRow, toActivityRecord } from './rows'

/**
 * Writes to the activities table. Duration, timestamp and date are only ever
 * written by the session merger; classification writes touch project_id and
 * project_source and nothing else.
 */
class ActivityStore {
  db: Database.Database
  _insertStmt: Statement
  _updateDurationStmt: Statement
  _assignStmt: Statement
  _assignIfUnassignedStmt: Statement
  _unassignStmt: Statement

  constructor(db: Database.Database) {
    this.db = db
    this._insertStmt = db.prepare(`
      INSERT INTO activities (timestamp, app_name, bundle_id, window_title, url, extra_info, duration_seconds, date, project_id, project_source)
      VALUES (@timestamp, @appName, @bundleId, @windowTitle, @url, @extraInfo, @durationSeconds, @date, @projectId, @projectSource)
    `)
    this._updateDurationStmt = db.prepare(`
      UPDATE activities SET duration_seconds = @seconds WHERE id = @id
    `)
    this._assignStmt = db.prepare(`
      UPDATE activities SET project_id = @projectId, project_source = @source WHERE id = @id
    `)
    this._assignIfUnassignedStmt = db.prepare(`
      UPDATE activities SET project_id = @projectId, project_source = @source WHERE id = @id AND project_id IS NULL
    `)
    this._unassignStmt = db.prepare(`
      UPDATE activities SET project_id = NULL, project_source = NULL WHERE id = ?
    `)
  }

  insert(record: NewActivity): number {
    const projectId = record.projectId ?? null
    const result = this._insertStmt.run({
      timestamp: record.timestamp,
      appName: record.appName,
      bundleId: record.bundleId,
      windowTitle: record.windowTitle,
      url: record.url,
      extraInfo: record.extraInfo,
      durationSeconds: record.durationSeconds,
      date: record.date,
      projectId,
      projectSource: projectId === null ? null : (record.projectSource ?? 'auto_rule'),
    })
    return Number(result.lastInsertRowid)
  }

  /** Overwrites the stored duration; writing the same value twice is harmless. */
  updateDuration(id: number, seconds: number) {
    this._updateDurationStmt.run({ id, seconds })
  }

  /** Sets the project on every given activity, assigned or not. Returns the rows changed. */
  assignProject(ids: number[], projectId: number, source: ProjectSource): number {
    const run = this.db.transaction((activityIds: number[]) => {
      let changed = 0
      for (const id of activityIds) {
        changed += this._assignStmt.run({ id, projectId, source }).changes
      }
      return changed
    })
    return run(ids)
  }

  /**
   * Assigns only while the row is still unassigned, so a manual decision made
   * between reading and writing is never overwritten.
   */
  assignIfUnassigned(id: number, projectId: number, source: ProjectSource): boolean {
    return this._assignIfUnassignedStmt.run({ id, projectId, source }).changes > 0
  }

  unassign(ids: number[]): number {
    const run = this.db.transaction((activityIds: number[]) => {
      let changed = 0
      for (const id of activityIds) {
        changed += this._unassignStmt.run(id).changes
      }
      return changed
    })
    return run(ids)
  }

  get(id: number): ActivityRecord | undefined {
    const row = this.db.prepare(`SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE id = ?`).get(id) as
      | ActivityRow
      | undefined
    return row ? toActivityRecord(row) : undefined
  }

  /** Unassigned activities, optionally for one date, in insertion order. */
  queryUnassignedRaw(date?: string): ActivityRecord[] {
    const rows =
      date === undefined
        ? (this.db
            .prepare(`SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE project_id IS NULL ORDER BY id ASC`)
            .all() as ActivityRow[])
        : (this.db
            .prepare(`SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE project_id IS NULL AND date = ? ORDER BY id ASC`)
            .all(date) as ActivityRow[])
    return rows.map(toActivityRecord)
  }
}

export { ActivityStore }
