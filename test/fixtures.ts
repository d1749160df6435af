import { ActivityStore } from '../src/data/activity-store'
import { AppDatabase } from '../src/data/database'
import { ProjectStore } from '../src/data/project-store'
import { QueryEngine } from '../src/data/query-engine'
import { RuleEngine } from '../src/projects/rule-engine'
import { SuggestionEngine } from '../src/projects/suggestion-engine'
import { toLocalDate } from '../src/dates'
import type { NewActivity } from '../src/types'

// Local time in January 2024
function at(day: number, hour: number, minute = 0, second = 0): number {
  return new Date(2024, 0, day, hour, minute, second).getTime()
}

function activity(overrides: Partial<NewActivity> = {}): NewActivity {
  const timestamp = overrides.timestamp ?? at(15, 14, 30)
  return {
    timestamp,
    appName: 'Code',
    bundleId: 'com.microsoft.VSCode',
    windowTitle: 'main.ts — acme-web',
    url: null,
    extraInfo: null,
    durationSeconds: 60,
    date: toLocalDate(timestamp),
    ...overrides,
  }
}

/** Everything wired over one in-memory database. */
function createTestLedger() {
  const database = new AppDatabase(':memory:')
  const activityStore = new ActivityStore(database.db)
  const projectStore = new ProjectStore(database.db)
  const queryEngine = new QueryEngine(database.db)
  const ruleEngine = new RuleEngine(database.db, activityStore, projectStore)
  const suggestionEngine = new SuggestionEngine(database.db, activityStore, projectStore, ruleEngine)
  return { database, activityStore, projectStore, queryEngine, ruleEngine, suggestionEngine }
}

export { activity, at, createTestLedger }
