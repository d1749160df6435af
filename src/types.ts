// ── Activities ─────────────────────────────────────────────────────────────

export type ProjectSource = 'auto_rule' | 'manual'

export interface ActivityRecord {
  id: number
  timestamp: number
  appName: string
  bundleId: string
  windowTitle: string
  url: string | null
  extraInfo: string | null
  durationSeconds: number
  date: string
  projectId: number | null
  projectSource: ProjectSource | null
}

export interface NewActivity {
  timestamp: number
  appName: string
  bundleId: string
  windowTitle: string
  url: string | null
  extraInfo: string | null
  durationSeconds: number
  date: string
  projectId?: number | null
  projectSource?: ProjectSource | null
}

/** The fields rule matching and token extraction look at. */
export type ActivityFields = Pick<ActivityRecord, 'appName' | 'bundleId' | 'windowTitle' | 'url' | 'extraInfo'>

// ── Sampling ───────────────────────────────────────────────────────────────

/**
 * One foreground-window sample as reported by the OS sensor.
 * `idleSeconds` is the time since the last user input.
 */
export interface WindowSnapshot {
  appName: string
  bundleId: string
  windowTitle: string
  url?: string | null
  extraInfo?: string | null
  idleSeconds: number
  timestamp: number
}

export interface Heartbeat extends WindowSnapshot {
  intervalSeconds: number
}

export interface OpenSession {
  id: number
  appName: string
  bundleId: string
  windowTitle: string
  url: string | null
  extraInfo: string | null
  date: string
  durationSeconds: number
  persistedSeconds: number
}

// ── Taxonomy ───────────────────────────────────────────────────────────────

export interface Brand {
  id: number
  name: string
  color: string
  sortOrder: number
}

export interface Project {
  id: number
  brandId: number
  name: string
  color: string
  sortOrder: number
}

export interface ProjectWithBrand extends Project {
  brandName: string
}

export const RULE_TYPES = [
  'terminal-folder',
  'url-domain',
  'url-path',
  'page-title',
  'design-file',
  'bundle-id',
  'window-title',
] as const

export type RuleType = (typeof RULE_TYPES)[number]

export interface ProjectRule {
  id: number
  projectId: number
  ruleType: RuleType
  pattern: string
  isRegex: boolean
  priority: number
}

export interface NewRule {
  projectId: number
  ruleType: RuleType
  pattern: string
  isRegex?: boolean
  priority?: number
}

// ── Reports ────────────────────────────────────────────────────────────────

export interface WindowDetail {
  windowTitle: string
  url: string | null
  extraInfo: string | null
  totalSeconds: number
  activityIds: number[]
}

export interface AppSummary {
  appName: string
  bundleId: string
  totalSeconds: number
  windows: WindowDetail[]
}

export interface DaySummary {
  date: string
  totalSeconds: number
  apps: AppSummary[]
  wallClockSeconds: number
  activeTrackingSeconds: number
  firstActivity: string | null
  lastActivity: string | null
}

export interface DayBreakdown {
  date: string
  totalSeconds: number
}

export interface AppDetailReport {
  appName: string
  totalSeconds: number
  days: DayBreakdown[]
  topWindows: WindowDetail[]
}

export interface TimelineEntry {
  id: number
  timestamp: number
  appName: string
  windowTitle: string
  url: string | null
  extraInfo: string | null
  durationSeconds: number
  projectId: number | null
}

export interface AppBreakdownEntry {
  appName: string
  seconds: number
}

export interface ProjectSummary {
  projectId: number
  projectName: string
  brandId: number
  brandName: string
  color: string
  totalSeconds: number
  appBreakdown: AppBreakdownEntry[]
}

export interface BrandSummary {
  brandId: number
  brandName: string
  color: string
  totalSeconds: number
  projects: ProjectSummary[]
}

export interface UnassignedActivity {
  id: number
  appName: string
  windowTitle: string
  url: string | null
  extraInfo: string | null
  durationSeconds: number
}

export interface RecentApp {
  appName: string
  seconds: number
  lastSeen: number
}

// ── Suggestions ────────────────────────────────────────────────────────────

export interface SuggestedRule {
  ruleType: RuleType
  pattern: string
  isRegex: boolean
}

export interface DetectedProject {
  suggestedName: string
  token: string
  activityCount: number
  apps: string[]
  suggestedRules: SuggestedRule[]
}

export interface DetectedBrand {
  suggestedName: string
  rootToken: string
  projects: DetectedProject[]
  totalActivities: number
  apps: string[]
}

export type AcceptTarget = { brandName: string; projectName: string; color?: string } | { projectId: number }
