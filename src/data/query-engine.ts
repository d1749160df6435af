import type Database from 'better-sqlite3'
import {
  ONE_MINUTE_MS,
  ONE_SECOND_MS,
  RECENT_APPS_LIMIT,
  RECENT_APPS_MIN_SECONDS,
  RECENT_APPS_MINUTES,
  RECENT_DATES_LIMIT,
  TOP_WINDOWS_LIMIT,
  UNASSIGNED_MIN_SECONDS,
  WEEK_DAYS,
} from '../constants'
import { addDays, firstDayOfMonth, formatClock, isLocalDate, lastDayOfMonth, toLocalDate } from '../dates'
import { ValidationError } from '../errors'
import type {
  ActivityRecord,
  AppDetailReport,
  AppSummary,
  BrandSummary,
  DayBreakdown,
  DaySummary,
  ProjectSummary,
  RecentApp,
  TimelineEntry,
  UnassignedActivity,
  WindowDetail,
} from '../types'
import { ACTIVITY_COLUMNS, type ActivityRow, toActivityRecord } from './rows'

function requireDate(date: string, field = 'date'): string {
  if (!isLocalDate(date)) throw new ValidationError(`Expected a YYYY-MM-DD date, got "${date}"`, field)
  return date
}

// Larger totals first; equal totals fall back to the label so output is stable
function byTotalDesc<T>(total: (item: T) => number, label: (item: T) => string) {
  return (a: T, b: T) => total(b) - total(a) || (label(a) < label(b) ? -1 : label(a) > label(b) ? 1 : 0)
}

function windowKey(record: ActivityRecord): string {
  return JSON.stringify([record.windowTitle, record.url, record.extraInfo])
}

/** Buckets records by identical (title, url, extraInfo), summing durations. */
function bucketWindows(records: ActivityRecord[]): WindowDetail[] {
  const buckets = new Map<string, WindowDetail>()
  for (const r of records) {
    const key = windowKey(r)
    let bucket = buckets.get(key)
    if (!bucket) {
      bucket = { windowTitle: r.windowTitle, url: r.url, extraInfo: r.extraInfo, totalSeconds: 0, activityIds: [] }
      buckets.set(key, bucket)
    }
    bucket.totalSeconds += r.durationSeconds
    bucket.activityIds.push(r.id)
  }
  return [...buckets.values()].sort(
    byTotalDesc(
      (w) => w.totalSeconds,
      (w) => w.windowTitle,
    ),
  )
}

/** Builds one DaySummary from that day's records, ordered by timestamp. */
function summarizeDay(date: string, records: ActivityRecord[]): DaySummary {
  const byApp = new Map<string, ActivityRecord[]>()
  let totalSeconds = 0
  let firstStart = Infinity
  let lastEnd = -Infinity

  for (const r of records) {
    const list = byApp.get(r.appName)
    if (list) list.push(r)
    else byApp.set(r.appName, [r])
    totalSeconds += r.durationSeconds
    firstStart = Math.min(firstStart, r.timestamp)
    lastEnd = Math.max(lastEnd, r.timestamp + r.durationSeconds * ONE_SECOND_MS)
  }

  const apps: AppSummary[] = []
  for (const [appName, list] of byApp) {
    const appTotal = list.reduce((sum, r) => sum + r.durationSeconds, 0)
    if (appTotal === 0) continue
    apps.push({ appName, bundleId: list[0].bundleId, totalSeconds: appTotal, windows: bucketWindows(list) })
  }
  apps.sort(
    byTotalDesc(
      (a) => a.totalSeconds,
      (a) => a.appName,
    ),
  )

  const hasRecords = records.length > 0
  return {
    date,
    totalSeconds,
    apps,
    wallClockSeconds: hasRecords ? Math.round((lastEnd - firstStart) / ONE_SECOND_MS) : 0,
    activeTrackingSeconds: totalSeconds,
    firstActivity: hasRecords ? formatClock(firstStart) : null,
    lastActivity: hasRecords ? formatClock(lastEnd) : null,
  }
}

/**
 * Read-side aggregation over the activities table. Reports are built from
 * materialized rows; nothing here writes.
 */
class QueryEngine {
  db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  queryDay(date: string): DaySummary {
    requireDate(date)
    const rows = this.db
      .prepare(`SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE date = ? ORDER BY timestamp ASC, id ASC`)
      .all(date) as ActivityRow[]
    return summarizeDay(date, rows.map(toActivityRecord))
  }

  /**
   * One DaySummary per date in [from, to] that has tracked time.
   * Days without activity are left out, not zero-filled.
   */
  queryDays(from: string, to: string): DaySummary[] {
    requireDate(from, 'from')
    requireDate(to, 'to')
    if (from > to) return []
    const rows = this.db
      .prepare(
        `SELECT ${ACTIVITY_COLUMNS} FROM activities
         WHERE date >= ? AND date <= ?
         ORDER BY date ASC, timestamp ASC, id ASC`,
      )
      .all(from, to) as ActivityRow[]

    const byDate = new Map<string, ActivityRecord[]>()
    for (const row of rows) {
      const record = toActivityRecord(row)
      const list = byDate.get(record.date)
      if (list) list.push(record)
      else byDate.set(record.date, [record])
    }

    const summaries: DaySummary[] = []
    for (const [date, records] of byDate) {
      const summary = summarizeDay(date, records)
      if (summary.totalSeconds > 0) summaries.push(summary)
    }
    return summaries
  }

  /** The seven days ending today. */
  queryWeek(): DaySummary[] {
    const today = toLocalDate(Date.now())
    return this.queryDays(addDays(today, -(WEEK_DAYS - 1)), today)
  }

  /** The given month up to today; empty for a month that has not started. */
  queryMonth(year: number, month: number): DaySummary[] {
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new ValidationError(`Expected a year and a month 1-12, got ${year}-${month}`, 'month')
    }
    const today = toLocalDate(Date.now())
    const first = firstDayOfMonth(year, month)
    const last = lastDayOfMonth(year, month)
    const end = last < today ? last : today
    return this.queryDays(first, end)
  }

  /** Case-insensitive substring match on the app name, across all dates. */
  queryApp(name: string): AppDetailReport {
    const rows = this.db
      .prepare(
        `SELECT ${ACTIVITY_COLUMNS} FROM activities
         WHERE instr(lower(app_name), lower(?)) > 0
         ORDER BY timestamp ASC, id ASC`,
      )
      .all(name) as ActivityRow[]
    const records = rows.map(toActivityRecord)

    const dayTotals = new Map<string, number>()
    let totalSeconds = 0
    for (const r of records) {
      totalSeconds += r.durationSeconds
      dayTotals.set(r.date, (dayTotals.get(r.date) ?? 0) + r.durationSeconds)
    }
    const days: DayBreakdown[] = [...dayTotals]
      .map(([date, seconds]) => ({ date, totalSeconds: seconds }))
      .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))

    return {
      appName: name,
      totalSeconds,
      days,
      topWindows: bucketWindows(records).slice(0, TOP_WINDOWS_LIMIT),
    }
  }

  queryTimeline(date: string): TimelineEntry[] {
    requireDate(date)
    return this.db
      .prepare(
        `SELECT id, timestamp, app_name AS appName, window_title AS windowTitle, url,
           extra_info AS extraInfo, duration_seconds AS durationSeconds, project_id AS projectId
         FROM activities WHERE date = ?
         ORDER BY timestamp ASC, id ASC`,
      )
      .all(date) as TimelineEntry[]
  }

  /** Assigned time of one day, grouped brand → project → app. */
  queryDayByProject(date: string): BrandSummary[] {
    requireDate(date)
    const rows = this.db
      .prepare(
        `SELECT a.project_id AS projectId, p.name AS projectName, p.color AS projectColor,
           b.id AS brandId, b.name AS brandName, b.color AS brandColor,
           a.app_name AS appName, SUM(a.duration_seconds) AS seconds
         FROM activities a
         JOIN projects p ON p.id = a.project_id
         JOIN brands b ON b.id = p.brand_id
         WHERE a.date = ?
         GROUP BY a.project_id, a.app_name`,
      )
      .all(date) as {
      projectId: number
      projectName: string
      projectColor: string
      brandId: number
      brandName: string
      brandColor: string
      appName: string
      seconds: number
    }[]

    const brands = new Map<number, BrandSummary>()
    const projects = new Map<number, ProjectSummary>()
    for (const row of rows) {
      if (row.seconds <= 0) continue
      let brand = brands.get(row.brandId)
      if (!brand) {
        brand = { brandId: row.brandId, brandName: row.brandName, color: row.brandColor, totalSeconds: 0, projects: [] }
        brands.set(row.brandId, brand)
      }
      let project = projects.get(row.projectId)
      if (!project) {
        project = {
          projectId: row.projectId,
          projectName: row.projectName,
          brandId: row.brandId,
          brandName: row.brandName,
          color: row.projectColor,
          totalSeconds: 0,
          appBreakdown: [],
        }
        projects.set(row.projectId, project)
        brand.projects.push(project)
      }
      project.appBreakdown.push({ appName: row.appName, seconds: row.seconds })
      project.totalSeconds += row.seconds
      brand.totalSeconds += row.seconds
    }

    for (const brand of brands.values()) {
      for (const project of brand.projects) {
        project.appBreakdown.sort(
          byTotalDesc(
            (e) => e.seconds,
            (e) => e.appName,
          ),
        )
      }
      brand.projects.sort(
        byTotalDesc(
          (p) => p.totalSeconds,
          (p) => p.projectName,
        ),
      )
    }
    return [...brands.values()].sort(
      byTotalDesc(
        (b) => b.totalSeconds,
        (b) => b.brandName,
      ),
    )
  }

  /** Unassigned records of one day, longest first. */
  queryUnassignedActivities(date: string, minSeconds = UNASSIGNED_MIN_SECONDS): UnassignedActivity[] {
    requireDate(date)
    return this.db
      .prepare(
        `SELECT id, app_name AS appName, window_title AS windowTitle, url,
           extra_info AS extraInfo, duration_seconds AS durationSeconds
         FROM activities
         WHERE date = ? AND project_id IS NULL AND duration_seconds >= ?
         ORDER BY duration_seconds DESC, id ASC`,
      )
      .all(date, minSeconds) as UnassignedActivity[]
  }

  /** Most recent dates with tracked time, newest first. */
  queryRecentDates(limit = RECENT_DATES_LIMIT): DayBreakdown[] {
    return this.db
      .prepare(
        `SELECT date, SUM(duration_seconds) AS totalSeconds
         FROM activities
         GROUP BY date
         HAVING totalSeconds > 0
         ORDER BY date DESC
         LIMIT ?`,
      )
      .all(limit) as DayBreakdown[]
  }

  /** Apps used in the last `lastMinutes` with at least `minSeconds`, most recently seen first. */
  queryRecentApps(
    lastMinutes = RECENT_APPS_MINUTES,
    minSeconds = RECENT_APPS_MIN_SECONDS,
    limit = RECENT_APPS_LIMIT,
  ): RecentApp[] {
    const cutoff = Date.now() - lastMinutes * ONE_MINUTE_MS
    return this.db
      .prepare(
        `SELECT app_name AS appName, SUM(duration_seconds) AS seconds, MAX(timestamp) AS lastSeen
         FROM activities
         WHERE timestamp >= ?
         GROUP BY app_name
         HAVING seconds >= ?
         ORDER BY lastSeen DESC, appName ASC
         LIMIT ?`,
      )
      .all(cutoff, minSeconds, limit) as RecentApp[]
  }
}

export { QueryEngine, summarizeDay }
