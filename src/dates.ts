import { ONE_DAY_MS } from './constants'

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/** Local calendar date of an instant, as "YYYY-MM-DD". */
export function toLocalDate(timestampMs: number): string {
  const d = new Date(timestampMs)
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
}

/** Local wall-clock label of an instant, as "HH:mm". */
export function formatClock(timestampMs: number): string {
  const d = new Date(timestampMs)
  return `${pad(d.getHours())}:${pad(d.getMinutes())}`
}

/**
 * Parses "YYYY-MM-DD" into local midnight of that day.
 * Returns null for strings that are not a real calendar date ("2024-02-30").
 */
export function parseLocalDate(dateStr: string): Date | null {
  const m = DATE_PATTERN.exec(dateStr)
  if (!m) return null
  const year = Number(m[1])
  const month = Number(m[2])
  const day = Number(m[3])
  const d = new Date(year, month - 1, day)
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null
  return d
}

export function isLocalDate(dateStr: string): boolean {
  return parseLocalDate(dateStr) !== null
}

export function addDays(dateStr: string, days: number): string {
  const d = parseLocalDate(dateStr)
  if (!d) throw new RangeError(`Not a date: ${dateStr}`)
  // DST days are 23 or 25 hours long, so step by calendar day
  d.setDate(d.getDate() + days)
  return toLocalDate(d.getTime())
}

/** Every date from `from` to `to`, both inclusive. Empty when `from` is after `to`. */
export function dateRange(from: string, to: string): string[] {
  const start = parseLocalDate(from)
  const end = parseLocalDate(to)
  if (!start || !end || start.getTime() > end.getTime()) return []

  const dates: string[] = []
  const maxDays = Math.round((end.getTime() - start.getTime()) / ONE_DAY_MS) + 1
  let cursor = from
  for (let i = 0; i < maxDays; i++) {
    dates.push(cursor)
    if (cursor === to) break
    cursor = addDays(cursor, 1)
  }
  return dates
}

export function lastDayOfMonth(year: number, month: number): string {
  // Day 0 of the following month is the last day of this one
  const d = new Date(year, month, 0)
  return toLocalDate(d.getTime())
}

export function firstDayOfMonth(year: number, month: number): string {
  return `${year}-${pad(month)}-01`
}
