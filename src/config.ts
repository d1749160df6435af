import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import {
  IDLE_THRESHOLD_SECONDS,
  IGNORED_APP_NAMES,
  PASSIVE_MEDIA_BUNDLE_IDS,
  SAMPLE_INTERVAL_SECONDS,
  SUGGESTION_MIN_ACTIVITIES,
  SUGGESTION_MIN_APPS,
} from './constants'
import { formatIssues, ValidationError } from './errors'

const CONFIG_DIR = path.join(os.homedir(), '.config', 'activity-ledger')
const CONFIG_FILENAME = 'config.json'

// --- Validation Schemas ---

const SuggestionConfigSchema = z.object({
  minActivities: z.number().int().min(1).default(SUGGESTION_MIN_ACTIVITIES),
  minApps: z.number().int().min(1).default(SUGGESTION_MIN_APPS),
})

const LedgerConfigSchema = z.object({
  databasePath: z.string().min(1).default(path.join(CONFIG_DIR, 'activity.db')),
  sampleIntervalSeconds: z.number().int().positive().default(SAMPLE_INTERVAL_SECONDS),
  idleThresholdSeconds: z.number().int().positive().default(IDLE_THRESHOLD_SECONDS),
  passiveMediaBundleIds: z.array(z.string()).default(PASSIVE_MEDIA_BUNDLE_IDS),
  ignoredAppNames: z.array(z.string()).default(IGNORED_APP_NAMES),
  suggestions: SuggestionConfigSchema.default({}),
})

type LedgerConfig = z.infer<typeof LedgerConfigSchema>
type LedgerConfigInput = z.input<typeof LedgerConfigSchema>

/**
 * Validates a raw config object and fills in defaults.
 */
function parseConfig(raw: unknown): LedgerConfig {
  const result = LedgerConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ValidationError(`Invalid config: ${formatIssues(result.error)}`)
  }
  return result.data
}

function envInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key]
  if (value === undefined || value === '') return undefined
  const n = Number(value)
  if (!Number.isInteger(n)) {
    throw new ValidationError(`Invalid config: ${key} must be an integer, got "${value}"`, key)
  }
  return n
}

/**
 * Loads config.json (when present), then lets ACTIVITY_LEDGER_* environment
 * variables override individual settings.
 */
function loadConfig(filePath: string = path.join(CONFIG_DIR, CONFIG_FILENAME), env = process.env): LedgerConfig {
  let fileConfig: Record<string, unknown> = {}
  if (fs.existsSync(filePath)) {
    let json: unknown
    try {
      json = JSON.parse(fs.readFileSync(filePath, 'utf8'))
    } catch (e) {
      throw new ValidationError(`Invalid config: ${filePath} is not valid JSON (${(e as Error).message})`)
    }
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
      throw new ValidationError(`Invalid config: ${filePath} must contain a JSON object`)
    }
    fileConfig = { ...json }
  }

  const overrides: Record<string, unknown> = {}
  if (env.ACTIVITY_LEDGER_DB) overrides.databasePath = env.ACTIVITY_LEDGER_DB
  const interval = envInteger(env, 'ACTIVITY_LEDGER_INTERVAL')
  if (interval !== undefined) overrides.sampleIntervalSeconds = interval
  const idle = envInteger(env, 'ACTIVITY_LEDGER_IDLE_THRESHOLD')
  if (idle !== undefined) overrides.idleThresholdSeconds = idle

  return parseConfig({ ...fileConfig, ...overrides })
}

export { CONFIG_DIR, loadConfig, parseConfig }
export type { LedgerConfig, LedgerConfigInput }
