import type { ProjectStore } from '../data/project-store'
import { type CompiledRule, compareRules, compileRule } from './rule-matcher'

/**
 * Snapshot of every project rule in evaluation order, regexes compiled.
 * Loaded lazily on the first `get()` and after each `invalidate()`; callers
 * that write rules must invalidate before the next match.
 */
class RuleCache {
  store: ProjectStore
  _rules: CompiledRule[] | null

  constructor(store: ProjectStore) {
    this.store = store
    this._rules = null
  }

  get(): readonly CompiledRule[] {
    return this._rules ?? this.reload()
  }

  invalidate() {
    this._rules = null
  }

  reload(): readonly CompiledRule[] {
    const rules = this.store.loadAllProjectRules().sort(compareRules).map(compileRule)
    this._rules = rules
    return rules
  }
}

export { RuleCache }
