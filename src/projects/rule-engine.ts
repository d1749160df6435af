import type Database from 'better-sqlite3'
import type { ActivityStore } from '../data/activity-store'
import type { ProjectStore } from '../data/project-store'
import { isLocalDate } from '../dates'
import { ValidationError } from '../errors'
import type { ActivityFields, RuleType } from '../types'
import { RuleCache } from './rule-cache'
import { findMatchingRule } from './rule-matcher'

class RuleEngine {
  db: Database.Database
  activityStore: ActivityStore
  projectStore: ProjectStore
  cache: RuleCache

  constructor(
    db: Database.Database,
    activityStore: ActivityStore,
    projectStore: ProjectStore,
    cache: RuleCache = new RuleCache(projectStore),
  ) {
    this.db = db
    this.activityStore = activityStore
    this.projectStore = projectStore
    this.cache = cache
  }

  /** Project of the first matching rule, or null when nothing matches. */
  match(activity: ActivityFields): number | null {
    return findMatchingRule(this.cache.get(), activity)?.projectId ?? null
  }

  /**
   * Matches every unassigned activity (of one date, when given) against the
   * current rules. Rows assigned in the meantime are left alone, so running it
   * twice on unchanged data assigns nothing the second time.
   */
  autoAssignUnclassified(date?: string): number {
    if (date !== undefined && !isLocalDate(date)) {
      throw new ValidationError(`Expected a YYYY-MM-DD date, got "${date}"`, 'date')
    }
    const rules = this.cache.get()
    if (rules.length === 0) return 0

    return this.db.transaction(() => {
      let assigned = 0
      for (const activity of this.activityStore.queryUnassignedRaw(date)) {
        const rule = findMatchingRule(rules, activity)
        if (rule && this.activityStore.assignIfUnassigned(activity.id, rule.projectId, 'auto_rule')) {
          assigned++
        }
      }
      return assigned
    })()
  }

  reloadRules() {
    this.cache.invalidate()
  }

  /**
   * Manually assigns activities to a project, optionally saving a literal rule
   * so future activities classify on their own. Returns the activities changed.
   */
  classify(
    activityIds: number[],
    projectId: number,
    createRule = false,
    ruleType?: RuleType,
    pattern?: string,
  ): number {
    if (!this.projectStore.getProject(projectId)) {
      throw new ValidationError(`Project ${projectId} does not exist`, 'projectId')
    }
    if (createRule && (ruleType === undefined || pattern === undefined)) {
      throw new ValidationError('A rule type and pattern are required to create a rule', 'ruleType')
    }

    const changed = this.db.transaction(() => {
      const count = this.activityStore.assignProject(activityIds, projectId, 'manual')
      if (createRule && ruleType !== undefined && pattern !== undefined) {
        this.projectStore.insertRule({ projectId, ruleType, pattern, isRegex: false })
      }
      return count
    })()

    if (createRule) this.reloadRules()
    return changed
  }

  unclassify(activityIds: number[]): number {
    return this.activityStore.unassign(activityIds)
  }
}

export { RuleEngine }
