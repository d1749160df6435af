import type Database from 'better-sqlite3'
import {
  DESIGN_BUNDLE_IDS,
  GENERIC_FOLDER_NAMES,
  SUGGESTION_MAX_TITLE_WORDS,
  SUGGESTION_MIN_ACTIVITIES,
  SUGGESTION_MIN_APPS,
  SUGGESTION_MIN_TOKEN_LENGTH,
  SUGGESTION_SKIP_DOMAINS,
  TITLE_STOP_TOKENS,
  TWO_PART_SUFFIXES,
} from '../constants'
import type { ActivityStore } from '../data/activity-store'
import type { ProjectStore } from '../data/project-store'
import { ValidationError } from '../errors'
import type {
  AcceptTarget,
  ActivityFields,
  DetectedBrand,
  DetectedProject,
  RuleType,
  SuggestedRule,
} from '../types'
import type { RuleEngine } from './rule-engine'
import {
  type CompiledRule,
  compareRules,
  compileRule,
  escapeRegExp,
  findMatchingRule,
  hostOf,
  pathSegments,
} from './rule-matcher'

const TITLE_SEPARATORS = [' — ', ' – ', ' - ', ' | ', ': ']
const IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/

// Literal rule types in the order they are suggested; window-title comes last
const LITERAL_SUGGESTIONS: RuleType[] = ['url-domain', 'terminal-folder', 'design-file']

interface SuggestionOptions {
  minActivities: number
  minApps: number
}

/** The grouping token of one activity and the raw value a rule would be built from. */
interface TokenHit {
  token: string
  ruleType: RuleType
  value: string
}

interface TokenGroup {
  token: string
  activityCount: number
  apps: Set<string>
  values: Map<RuleType, Map<string, number>>
}

interface Candidate {
  token: string
  activityCount: number
  apps: Set<string>
  rules: SuggestedRule[]
}

/** "acme web+shop" → "Acme Web+shop" */
function smartCapitalize(input: string): string {
  return input
    .split(' ')
    .filter((w) => w !== '')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ')
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function registrableDomain(host: string): string | null {
  const parts = host.replace(/^www\./, '').split('.').filter((p) => p !== '')
  if (parts.length < 2) return null
  const take = TWO_PART_SUFFIXES.includes(parts.slice(-2).join('.')) ? 3 : 2
  if (parts.length < take) return null
  return parts.slice(-take).join('.')
}

function isFolderPath(value: string): boolean {
  return value.includes('/') || value.startsWith('~')
}

function normalizeFolder(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/[-_.]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/** Text before the first title separator, cut to the leading words. */
function leadingWords(text: string): string {
  let end = text.length
  for (const sep of TITLE_SEPARATORS) {
    const idx = text.indexOf(sep)
    if (idx !== -1 && idx < end) end = idx
  }
  return text
    .slice(0, end)
    .split(/\s+/)
    .filter((w) => w !== '')
    .slice(0, SUGGESTION_MAX_TITLE_WORDS)
    .join(' ')
}

function urlToken(url: string | null): TokenHit | null {
  const host = hostOf(url)
  if (!host || IPV4.test(host) || SUGGESTION_SKIP_DOMAINS.includes(host)) return null
  const domain = registrableDomain(host)
  if (!domain || SUGGESTION_SKIP_DOMAINS.includes(domain)) return null
  return { token: domain.split('.')[0], ruleType: 'url-domain', value: domain }
}

function folderToken(extraInfo: string | null): TokenHit | null {
  if (!extraInfo || !isFolderPath(extraInfo)) return null
  const segments = pathSegments(extraInfo)
  if (segments.length === 0) return null
  const last = segments[segments.length - 1]
  const parent = segments.length >= 2 ? segments[segments.length - 2] : null
  if (parent !== null && GENERIC_FOLDER_NAMES.includes(last.toLowerCase())) {
    return {
      token: `${normalizeFolder(parent)} ${normalizeFolder(last)}`,
      ruleType: 'terminal-folder',
      value: `${parent}/${last}`,
    }
  }
  return { token: normalizeFolder(last), ruleType: 'terminal-folder', value: last }
}

function designToken(activity: ActivityFields): TokenHit | null {
  const file = activity.extraInfo
  if (!file || isFolderPath(file) || !DESIGN_BUNDLE_IDS.includes(activity.bundleId)) return null
  return { token: leadingWords(file).toLowerCase(), ruleType: 'design-file', value: file }
}

function titleToken(activity: ActivityFields): TokenHit | null {
  const prefix = leadingWords(activity.windowTitle)
  if (prefix === '') return null
  const token = prefix.toLowerCase()
  // A title that only names the app says nothing about the project
  if (token === activity.appName.toLowerCase()) return null
  return { token, ruleType: 'window-title', value: prefix }
}

/**
 * Grouping token of an activity: URL domain first, then a folder path, then a
 * design file, then the leading words of the window title.
 */
function tokenFor(activity: ActivityFields): TokenHit | null {
  const hit = urlToken(activity.url) ?? folderToken(activity.extraInfo) ?? designToken(activity) ?? titleToken(activity)
  if (!hit) return null
  if (hit.token.length < SUGGESTION_MIN_TOKEN_LENGTH || TITLE_STOP_TOKENS.includes(hit.token)) return null
  return hit
}

// Literal rules ignore case, so their patterns compare lowercased; regex patterns compare as written
function ruleKey(ruleType: RuleType, pattern: string, isRegex: boolean): string {
  return isRegex ? `${ruleType}:/${pattern}` : `${ruleType}:${pattern.toLowerCase()}`
}

/**
 * Anchored regex matching every observed title prefix: words joined by `\s+`,
 * one alternative per distinct spelling, most frequent first.
 */
function titlePattern(prefixes: Map<string, number>): string {
  const alternatives = [...prefixes]
    .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
    .map(([prefix]) => prefix.split(' ').map(escapeRegExp).join('\\s+'))
  const body = alternatives.length === 1 ? alternatives[0] : `(?:${alternatives.join('|')})`
  return `^\\s*${body}(?!\\w)`
}

function suggestRules(group: TokenGroup, existing: Set<string>): SuggestedRule[] {
  const rules: SuggestedRule[] = []
  for (const ruleType of LITERAL_SUGGESTIONS) {
    const values = [...(group.values.get(ruleType)?.keys() ?? [])].sort(compareText)
    for (const pattern of values) {
      if (!existing.has(ruleKey(ruleType, pattern, false))) rules.push({ ruleType, pattern, isRegex: false })
    }
  }

  const prefixes = group.values.get('window-title')
  if (prefixes) {
    const pattern = titlePattern(prefixes)
    if (!existing.has(ruleKey('window-title', pattern, true))) {
      rules.push({ ruleType: 'window-title', pattern, isRegex: true })
    }
  }
  return rules
}

function toBrand(root: string, members: Candidate[]): DetectedBrand {
  members.sort((a, b) => b.activityCount - a.activityCount || compareText(a.token, b.token))
  const apps = new Set<string>()
  const projects: DetectedProject[] = members.map((c) => {
    for (const app of c.apps) apps.add(app)
    const remainder = c.token.slice(root.length).trim()
    return {
      suggestedName: smartCapitalize(c.token === root || remainder === '' ? root : remainder),
      token: c.token,
      activityCount: c.activityCount,
      apps: [...c.apps].sort(compareText),
      suggestedRules: c.rules,
    }
  })
  return {
    suggestedName: smartCapitalize(root),
    rootToken: root,
    projects,
    totalActivities: projects.reduce((sum, p) => sum + p.activityCount, 0),
    apps: [...apps].sort(compareText),
  }
}

/**
 * Proposes brands, projects and rules from unassigned activities.
 * `detect()` only reads; `accept()` and `dismiss()` write.
 */
class SuggestionEngine {
  db: Database.Database
  activityStore: ActivityStore
  projectStore: ProjectStore
  ruleEngine: RuleEngine
  options: SuggestionOptions

  constructor(
    db: Database.Database,
    activityStore: ActivityStore,
    projectStore: ProjectStore,
    ruleEngine: RuleEngine,
    options: Partial<SuggestionOptions> = {},
  ) {
    this.db = db
    this.activityStore = activityStore
    this.projectStore = projectStore
    this.ruleEngine = ruleEngine
    this.options = {
      minActivities: options.minActivities ?? SUGGESTION_MIN_ACTIVITIES,
      minApps: options.minApps ?? SUGGESTION_MIN_APPS,
    }
  }

  detect(): DetectedBrand[] {
    const dismissed = this.projectStore.dismissedTokens()
    const existing = new Set(this.ruleEngine.cache.get().map((r) => ruleKey(r.ruleType, r.pattern, r.isRegex)))

    const groups = new Map<string, TokenGroup>()
    for (const activity of this.activityStore.queryUnassignedRaw()) {
      const hit = tokenFor(activity)
      if (!hit || dismissed.has(hit.token)) continue
      let group = groups.get(hit.token)
      if (!group) {
        group = { token: hit.token, activityCount: 0, apps: new Set(), values: new Map() }
        groups.set(hit.token, group)
      }
      group.activityCount++
      group.apps.add(activity.appName)
      let values = group.values.get(hit.ruleType)
      if (!values) {
        values = new Map()
        group.values.set(hit.ruleType, values)
      }
      values.set(hit.value, (values.get(hit.value) ?? 0) + 1)
    }

    const byRoot = new Map<string, Candidate[]>()
    for (const group of groups.values()) {
      if (group.activityCount < this.options.minActivities || group.apps.size < this.options.minApps) continue
      const rules = suggestRules(group, existing)
      if (rules.length === 0) continue
      const root = group.token.split(' ')[0]
      const candidate = { token: group.token, activityCount: group.activityCount, apps: group.apps, rules }
      const members = byRoot.get(root)
      if (members) members.push(candidate)
      else byRoot.set(root, [candidate])
    }

    return [...byRoot]
      .map(([root, members]) => toBrand(root, members))
      .sort((a, b) => b.totalActivities - a.totalActivities || compareText(a.rootToken, b.rootToken))
  }

  /**
   * Creates or reuses the target project, saves the rules and assigns the
   * unassigned activities those rules match. Returns the activities assigned.
   */
  accept(target: AcceptTarget, rules: SuggestedRule[]): number {
    const assigned = this.db.transaction(() => {
      const projectId = this._resolveTarget(target)
      const inserted: CompiledRule[] = []
      for (const rule of rules) {
        const id = this.projectStore.insertRule({
          projectId,
          ruleType: rule.ruleType,
          pattern: rule.pattern,
          isRegex: rule.isRegex,
        })
        const saved = this.projectStore.getRule(id)
        if (saved) inserted.push(compileRule(saved))
      }
      if (inserted.length === 0) return 0
      inserted.sort(compareRules)

      let count = 0
      for (const activity of this.activityStore.queryUnassignedRaw()) {
        if (findMatchingRule(inserted, activity) && this.activityStore.assignIfUnassigned(activity.id, projectId, 'auto_rule')) {
          count++
        }
      }
      return count
    })()
    this.ruleEngine.reloadRules()
    return assigned
  }

  dismiss(token: string) {
    const value = token.trim()
    if (value === '') throw new ValidationError('Token must not be blank', 'token')
    this.projectStore.dismissToken(value)
  }

  /** Lets a dismissed token surface again. Returns false when it was not dismissed. */
  restore(token: string): boolean {
    return this.projectStore.restoreToken(token.trim())
  }

  _resolveTarget(target: AcceptTarget): number {
    if ('projectId' in target) {
      if (!this.projectStore.getProject(target.projectId)) {
        throw new ValidationError(`Project ${target.projectId} does not exist`, 'projectId')
      }
      return target.projectId
    }
    const brandId =
      this.projectStore.findBrandByName(target.brandName)?.id ??
      this.projectStore.insertBrand(target.brandName, target.color)
    return (
      this.projectStore.findProject(brandId, target.projectName)?.id ??
      this.projectStore.insertProject(brandId, target.projectName, target.color)
    )
  }
}

export { SuggestionEngine, smartCapitalize, tokenFor }
export type { SuggestionOptions, TokenHit }
