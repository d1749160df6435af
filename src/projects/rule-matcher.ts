import type { ActivityFields, ProjectRule, RuleType } from '../types'

/** A rule with its regex compiled once; `regex` is null for literals and for patterns that fail to compile. */
export interface CompiledRule extends ProjectRule {
  regex: RegExp | null
}

export function compileRule(rule: ProjectRule): CompiledRule {
  if (!rule.isRegex) return { ...rule, regex: null }
  try {
    return { ...rule, regex: new RegExp(rule.pattern) }
  } catch (e) {
    console.warn(`Rule matcher: ignoring invalid pattern /${rule.pattern}/ of rule ${rule.id}: ${(e as Error).message}`)
    return { ...rule, regex: null }
  }
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url.includes('://') ? url : `https://${url}`)
  } catch {
    return null
  }
}

export function hostOf(url: string | null): string | null {
  if (!url) return null
  const host = parseUrl(url)?.hostname.toLowerCase()
  return host || null
}

export function pathOf(url: string | null): string | null {
  if (!url) return null
  const pathname = parseUrl(url)?.pathname
  return pathname || null
}

export function pathSegments(folder: string): string[] {
  return folder.split(/[\\/]/).filter((s) => s !== '' && s !== '~')
}

function nonEmpty(value: string | null): string | null {
  return value === null || value === '' ? null : value
}

/**
 * The activity field a rule type inspects, or null when the activity does not
 * carry it. Rules whose field is null are not candidates.
 */
export function ruleField(ruleType: RuleType, activity: ActivityFields): string | null {
  switch (ruleType) {
    case 'terminal-folder':
      return nonEmpty(activity.extraInfo)
    case 'url-domain':
      return hostOf(activity.url)
    case 'url-path':
      return pathOf(activity.url)
    case 'page-title':
    case 'window-title':
      return nonEmpty(activity.windowTitle)
    case 'design-file':
      return nonEmpty(activity.extraInfo) ?? nonEmpty(activity.url)
    case 'bundle-id':
      return nonEmpty(activity.bundleId)
  }
}

function matchLiteral(ruleType: RuleType, pattern: string, field: string): boolean {
  const needle = pattern.trim().toLowerCase()
  const value = field.toLowerCase()
  switch (ruleType) {
    case 'url-domain': {
      const domain = needle.replace(/^\*?\./, '')
      return value === domain || value.endsWith(`.${domain}`)
    }
    case 'terminal-folder': {
      const want = pathSegments(needle)
      const have = pathSegments(value)
      if (want.length === 0 || want.length > have.length) return false
      const tail = have.slice(have.length - want.length)
      return want.every((seg, i) => seg === tail[i])
    }
    case 'bundle-id':
      return value === needle
    default:
      return value.includes(needle)
  }
}

function matchRegex(ruleType: RuleType, regex: RegExp | null, field: string): boolean {
  if (!regex) return false
  // Folder regexes look at the last path segment only
  const subject = ruleType === 'terminal-folder' ? (pathSegments(field).pop() ?? '') : field
  return regex.test(subject)
}

export function matchRule(rule: CompiledRule, activity: ActivityFields): boolean {
  const field = ruleField(rule.ruleType, activity)
  if (field === null) return false
  return rule.isRegex ? matchRegex(rule.ruleType, rule.regex, field) : matchLiteral(rule.ruleType, rule.pattern, field)
}

/** First rule that matches, with `rules` already in evaluation order. */
export function findMatchingRule<T extends CompiledRule>(rules: readonly T[], activity: ActivityFields): T | null {
  for (const rule of rules) {
    if (matchRule(rule, activity)) return rule
  }
  return null
}

export function compareRules(a: ProjectRule, b: ProjectRule): number {
  return a.priority - b.priority || a.id - b.id
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
