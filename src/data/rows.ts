import type { ActivityRecord, ProjectRule, ProjectSource } from '../types'
import { RULE_TYPES, type RuleType } from '../types'

// Column lists aliased to the camelCase row shapes below
export const ACTIVITY_COLUMNS = `
  id, timestamp, app_name AS appName, bundle_id AS bundleId, window_title AS windowTitle,
  url, extra_info AS extraInfo, duration_seconds AS durationSeconds, date,
  project_id AS projectId, project_source AS projectSource
`

export const RULE_COLUMNS = `
  id, project_id AS projectId, rule_type AS ruleType, pattern, is_regex AS isRegex, priority
`

export interface ActivityRow extends Omit<ActivityRecord, 'projectSource'> {
  projectSource: string | null
}

export interface RuleRow extends Omit<ProjectRule, 'ruleType' | 'isRegex'> {
  ruleType: string
  isRegex: number
}

export function isRuleType(value: string): value is RuleType {
  return RULE_TYPES.some((t) => t === value)
}

function toProjectSource(value: string | null): ProjectSource | null {
  return value === 'auto_rule' || value === 'manual' ? value : null
}

export function toActivityRecord(row: ActivityRow): ActivityRecord {
  return { ...row, projectSource: toProjectSource(row.projectSource) }
}

/**
 * Rows with a rule type this build does not know (written by a newer schema)
 * are skipped rather than guessed at.
 */
export function toProjectRule(row: RuleRow): ProjectRule | null {
  if (!isRuleType(row.ruleType)) return null
  return {
    id: row.id,
    projectId: row.projectId,
    ruleType: row.ruleType,
    pattern: row.pattern,
    isRegex: row.isRegex === 1,
    priority: row.priority,
  }
}
