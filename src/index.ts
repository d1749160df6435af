import { type Commands, createCommands } from './commands'
import { type LedgerConfig, parseConfig } from './config'
import { ActivityStore } from './data/activity-store'
import { AppDatabase } from './data/database'
import { ProjectStore } from './data/project-store'
import { QueryEngine } from './data/query-engine'
import { RuleCache } from './projects/rule-cache'
import { RuleEngine } from './projects/rule-engine'
import { SuggestionEngine } from './projects/suggestion-engine'
import { TrackingEvents } from './tracking/events'
import { SessionMerger } from './tracking/session-merger'
import { Tracker, type WindowSampler } from './tracking/tracker'

interface LedgerOptions {
  /** Defaults are filled in for anything left out. */
  config?: Partial<LedgerConfig>
  sampler?: WindowSampler
}

interface ActivityLedger {
  config: LedgerConfig
  database: AppDatabase
  activityStore: ActivityStore
  projectStore: ProjectStore
  queryEngine: QueryEngine
  ruleEngine: RuleEngine
  suggestionEngine: SuggestionEngine
  events: TrackingEvents
  merger: SessionMerger
  tracker: Tracker | null
  commands: Commands
  close(): void
}

/**
 * Opens the database and wires stores, engines, the session merger and, when
 * a sampler is given, the sampling loop. Nothing starts until `tracker.start()`.
 */
function createActivityLedger(options: LedgerOptions = {}): ActivityLedger {
  const config = parseConfig(options.config ?? {})
  const database = new AppDatabase(config.databasePath)
  const activityStore = new ActivityStore(database.db)
  const projectStore = new ProjectStore(database.db)
  const queryEngine = new QueryEngine(database.db)
  const ruleEngine = new RuleEngine(database.db, activityStore, projectStore, new RuleCache(projectStore))
  const suggestionEngine = new SuggestionEngine(
    database.db,
    activityStore,
    projectStore,
    ruleEngine,
    config.suggestions,
  )
  const events = new TrackingEvents()
  const merger = new SessionMerger(activityStore, events, {
    idleThresholdSeconds: config.idleThresholdSeconds,
    passiveMediaBundleIds: config.passiveMediaBundleIds,
    classifier: ruleEngine,
  })
  const tracker = options.sampler
    ? new Tracker(options.sampler, merger, {
        sampleIntervalSeconds: config.sampleIntervalSeconds,
        ignoredAppNames: config.ignoredAppNames,
      })
    : null
  const commands = createCommands({ projectStore, ruleEngine, suggestionEngine })

  console.log(`Database: opened ${config.databasePath}`)

  return {
    config,
    database,
    activityStore,
    projectStore,
    queryEngine,
    ruleEngine,
    suggestionEngine,
    events,
    merger,
    tracker,
    commands,
    close() {
      if (tracker) tracker.stop()
      else merger.close()
      events.removeAllListeners()
      database.close()
    },
  }
}

export { createCommands, runCommand } from './commands'
export { CONFIG_DIR, loadConfig, parseConfig } from './config'
export { ActivityStore } from './data/activity-store'
export { AppDatabase } from './data/database'
export { ProjectStore } from './data/project-store'
export { QueryEngine } from './data/query-engine'
export { isValidationError, ValidationError } from './errors'
export { RuleCache } from './projects/rule-cache'
export { RuleEngine } from './projects/rule-engine'
export { compileRule, matchRule } from './projects/rule-matcher'
export type { CompiledRule } from './projects/rule-matcher'
export { SuggestionEngine } from './projects/suggestion-engine'
export { TrackingEvents } from './tracking/events'
export { SessionMerger } from './tracking/session-merger'
export { Tracker } from './tracking/tracker'
export type { LedgerConfig } from './config'
export type { WindowSampler } from './tracking/tracker'
export type * from './types'
export { RULE_TYPES } from './types'
export { createActivityLedger }
export type { ActivityLedger, LedgerOptions }
