import type Database from 'better-sqlite3'
import { DEFAULT_COLOR } from '../constants'
import { ValidationError } from '../errors'
import type { Brand, NewRule, Project, ProjectRule, ProjectWithBrand } from '../types'
import { isRuleType, RULE_COLUMNS, type RuleRow, toProjectRule } from './rows'

const COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/

const BRAND_COLUMNS = 'id, name, color, sort_order AS sortOrder'
const PROJECT_COLUMNS = 'id, brand_id AS brandId, name, color, sort_order AS sortOrder'

interface BrandChanges {
  name?: string
  color?: string
}

interface ProjectChanges {
  name?: string
  color?: string
  brandId?: number
}

interface RuleChanges {
  pattern?: string
  isRegex?: boolean
  priority?: number
}

function requireName(value: string, what: string): string {
  const name = value.trim()
  if (name === '') throw new ValidationError(`${what} name must not be blank`, 'name')
  return name
}

function requireColor(value: string): string {
  if (!COLOR_PATTERN.test(value)) {
    throw new ValidationError(`Color must look like #rgb or #rrggbb, got "${value}"`, 'color')
  }
  return value
}

function requirePattern(pattern: string, isRegex: boolean): string {
  if (pattern.trim() === '') throw new ValidationError('Rule pattern must not be blank', 'pattern')
  if (isRegex) {
    try {
      new RegExp(pattern)
    } catch (e) {
      throw new ValidationError(`Rule pattern is not a valid regular expression: ${(e as Error).message}`, 'pattern')
    }
  }
  return pattern
}

/**
 * Brands, projects, rules and dismissed suggestion tokens.
 * Every write validates first and throws ValidationError instead of coercing.
 */
class ProjectStore {
  db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  // ── Brands ──

  insertBrand(name: string, color: string = DEFAULT_COLOR): number {
    const brandName = requireName(name, 'Brand')
    requireColor(color)
    if (this.findBrandByName(brandName)) {
      throw new ValidationError(`Brand "${brandName}" already exists`, 'name')
    }
    const { n } = this.db.prepare('SELECT COUNT(*) as n FROM brands').get() as { n: number }
    const result = this.db
      .prepare('INSERT INTO brands (name, color, sort_order, created_at) VALUES (?, ?, ?, ?)')
      .run(brandName, color, n, Date.now())
    return Number(result.lastInsertRowid)
  }

  updateBrand(id: number, changes: BrandChanges) {
    const brand = this._requireBrand(id)
    const name = changes.name === undefined ? brand.name : requireName(changes.name, 'Brand')
    const color = changes.color === undefined ? brand.color : requireColor(changes.color)
    const clash = this.findBrandByName(name)
    if (clash && clash.id !== id) {
      throw new ValidationError(`Brand "${name}" already exists`, 'name')
    }
    this.db.prepare('UPDATE brands SET name = ?, color = ? WHERE id = ?').run(name, color, id)
  }

  /** Deletes the brand with its projects and rules; assigned activities become unassigned. */
  deleteBrand(id: number) {
    this._requireBrand(id)
    this.db.transaction(() => {
      this.db
        .prepare(
          `UPDATE activities SET project_id = NULL, project_source = NULL
           WHERE project_id IN (SELECT id FROM projects WHERE brand_id = ?)`,
        )
        .run(id)
      this.db.prepare('DELETE FROM brands WHERE id = ?').run(id)
    })()
  }

  /**
   * Moves every project of `sourceId` under `targetId`, after the target's
   * own projects, and deletes the source brand.
   */
  mergeBrand(sourceId: number, targetId: number) {
    if (sourceId === targetId) {
      throw new ValidationError('Cannot merge a brand into itself', 'targetId')
    }
    this._requireBrand(sourceId)
    this._requireBrand(targetId)
    const clashes = this.db
      .prepare(
        `SELECT s.name as name FROM projects s
         JOIN projects t ON t.brand_id = ? AND t.name = s.name
         WHERE s.brand_id = ?
         ORDER BY s.name`,
      )
      .all(targetId, sourceId) as { name: string }[]
    if (clashes.length > 0) {
      const names = clashes.map((c) => `"${c.name}"`).join(', ')
      throw new ValidationError(`Target brand already has projects named ${names}`, 'targetId')
    }
    this.db.transaction(() => {
      // Moved projects keep their relative order after the target's own
      const { next } = this.db
        .prepare('SELECT COALESCE(MAX(sort_order), -1) + 1 AS next FROM projects WHERE brand_id = ?')
        .get(targetId) as { next: number }
      const moved = this.db
        .prepare('SELECT id FROM projects WHERE brand_id = ? ORDER BY sort_order ASC, id ASC')
        .all(sourceId) as { id: number }[]
      const move = this.db.prepare('UPDATE projects SET brand_id = ?, sort_order = ? WHERE id = ?')
      moved.forEach((p, i) => move.run(targetId, next + i, p.id))
      this.db.prepare('DELETE FROM brands WHERE id = ?').run(sourceId)
    })()
  }

  allBrands(): Brand[] {
    return this.db.prepare(`SELECT ${BRAND_COLUMNS} FROM brands ORDER BY sort_order ASC, id ASC`).all() as Brand[]
  }

  getBrand(id: number): Brand | undefined {
    return this.db.prepare(`SELECT ${BRAND_COLUMNS} FROM brands WHERE id = ?`).get(id) as Brand | undefined
  }

  findBrandByName(name: string): Brand | undefined {
    return this.db.prepare(`SELECT ${BRAND_COLUMNS} FROM brands WHERE name = ?`).get(name.trim()) as
      | Brand
      | undefined
  }

  // ── Projects ──

  insertProject(brandId: number, name: string, color: string = DEFAULT_COLOR): number {
    this._requireBrand(brandId)
    const projectName = requireName(name, 'Project')
    requireColor(color)
    if (this.findProject(brandId, projectName)) {
      throw new ValidationError(`Project "${projectName}" already exists in this brand`, 'name')
    }
    const { n } = this.db.prepare('SELECT COUNT(*) as n FROM projects WHERE brand_id = ?').get(brandId) as {
      n: number
    }
    const result = this.db
      .prepare('INSERT INTO projects (brand_id, name, color, sort_order, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(brandId, projectName, color, n, Date.now())
    return Number(result.lastInsertRowid)
  }

  updateProject(id: number, changes: ProjectChanges) {
    const project = this._requireProject(id)
    const brandId = changes.brandId ?? project.brandId
    if (brandId !== project.brandId) this._requireBrand(brandId)
    const name = changes.name === undefined ? project.name : requireName(changes.name, 'Project')
    const color = changes.color === undefined ? project.color : requireColor(changes.color)
    const clash = this.findProject(brandId, name)
    if (clash && clash.id !== id) {
      throw new ValidationError(`Project "${name}" already exists in this brand`, 'name')
    }
    this.db
      .prepare('UPDATE projects SET brand_id = ?, name = ?, color = ? WHERE id = ?')
      .run(brandId, name, color, id)
  }

  deleteProject(id: number) {
    this._requireProject(id)
    this.db.transaction(() => {
      this.db.prepare('UPDATE activities SET project_id = NULL, project_source = NULL WHERE project_id = ?').run(id)
      this.db.prepare('DELETE FROM projects WHERE id = ?').run(id)
    })()
  }

  allProjects(): ProjectWithBrand[] {
    return this.db
      .prepare(
        `SELECT p.id, p.brand_id AS brandId, p.name, p.color, p.sort_order AS sortOrder, b.name AS brandName
         FROM projects p JOIN brands b ON b.id = p.brand_id
         ORDER BY b.sort_order ASC, b.id ASC, p.sort_order ASC, p.id ASC`,
      )
      .all() as ProjectWithBrand[]
  }

  getProject(id: number): Project | undefined {
    return this.db.prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = ?`).get(id) as Project | undefined
  }

  findProject(brandId: number, name: string): Project | undefined {
    return this.db
      .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE brand_id = ? AND name = ?`)
      .get(brandId, name.trim()) as Project | undefined
  }

  // ── Rules ──

  insertRule(rule: NewRule): number {
    this._requireProject(rule.projectId)
    if (!isRuleType(rule.ruleType)) {
      throw new ValidationError(`Unknown rule type "${rule.ruleType}"`, 'ruleType')
    }
    const isRegex = rule.isRegex ?? false
    const pattern = requirePattern(rule.pattern, isRegex)
    const result = this.db
      .prepare(
        `INSERT INTO project_rules (project_id, rule_type, pattern, is_regex, priority, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(rule.projectId, rule.ruleType, pattern, isRegex ? 1 : 0, rule.priority ?? 0, Date.now())
    return Number(result.lastInsertRowid)
  }

  updateRule(id: number, changes: RuleChanges) {
    const rule = this.getRule(id)
    if (!rule) throw new ValidationError(`Rule ${id} does not exist`, 'id')
    const isRegex = changes.isRegex ?? rule.isRegex
    const pattern = requirePattern(changes.pattern ?? rule.pattern, isRegex)
    const priority = changes.priority ?? rule.priority
    this.db
      .prepare('UPDATE project_rules SET pattern = ?, is_regex = ?, priority = ? WHERE id = ?')
      .run(pattern, isRegex ? 1 : 0, priority, id)
  }

  deleteRule(id: number) {
    const result = this.db.prepare('DELETE FROM project_rules WHERE id = ?').run(id)
    if (result.changes === 0) throw new ValidationError(`Rule ${id} does not exist`, 'id')
  }

  getRule(id: number): ProjectRule | undefined {
    const row = this.db.prepare(`SELECT ${RULE_COLUMNS} FROM project_rules WHERE id = ?`).get(id) as
      | RuleRow
      | undefined
    return row ? (toProjectRule(row) ?? undefined) : undefined
  }

  /** Every rule in evaluation order: priority ascending, then id. */
  loadAllProjectRules(): ProjectRule[] {
    const rows = this.db
      .prepare(`SELECT ${RULE_COLUMNS} FROM project_rules ORDER BY priority ASC, id ASC`)
      .all() as RuleRow[]
    const rules: ProjectRule[] = []
    for (const row of rows) {
      const rule = toProjectRule(row)
      if (rule) {
        rules.push(rule)
      } else {
        console.warn(`Database: skipping rule ${row.id} with unknown type "${row.ruleType}"`)
      }
    }
    return rules
  }

  // ── Dismissed suggestions ──

  dismissToken(token: string) {
    this.db
      .prepare('INSERT OR IGNORE INTO dismissed_suggestions (token, dismissed_at) VALUES (?, ?)')
      .run(token, Date.now())
  }

  /** Returns true when the token was dismissed before. */
  restoreToken(token: string): boolean {
    return this.db.prepare('DELETE FROM dismissed_suggestions WHERE token = ?').run(token).changes > 0
  }

  dismissedTokens(): Set<string> {
    const rows = this.db.prepare('SELECT token FROM dismissed_suggestions').all() as { token: string }[]
    return new Set(rows.map((r) => r.token))
  }

  _requireBrand(id: number): Brand {
    const brand = this.getBrand(id)
    if (!brand) throw new ValidationError(`Brand ${id} does not exist`, 'brandId')
    return brand
  }

  _requireProject(id: number): Project {
    const project = this.getProject(id)
    if (!project) throw new ValidationError(`Project ${id} does not exist`, 'projectId')
    return project
  }
}

export { ProjectStore }
export type { BrandChanges, ProjectChanges, RuleChanges }
