import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { CONFIG_DIR, loadConfig, parseConfig } from '../src/config'
import { ValidationError } from '../src/errors'

describe('config', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'activity-ledger-config-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  function writeConfig(contents: string): string {
    const file = path.join(dir, 'config.json')
    fs.writeFileSync(file, contents)
    return file
  }

  describe('parseConfig', () => {
    test('fills in every default', () => {
      expect(parseConfig({})).toEqual({
        databasePath: path.join(CONFIG_DIR, 'activity.db'),
        sampleIntervalSeconds: 2,
        idleThresholdSeconds: 600,
        passiveMediaBundleIds: expect.arrayContaining(['com.spotify.client']),
        ignoredAppNames: ['activity-ledger'],
        suggestions: { minActivities: 2, minApps: 1 },
      })
    })

    test('keeps given values', () => {
      const config = parseConfig({ databasePath: ':memory:', suggestions: { minApps: 2 } })

      expect(config.databasePath).toBe(':memory:')
      expect(config.suggestions).toEqual({ minActivities: 2, minApps: 2 })
    })

    test('names the offending setting', () => {
      expect(() => parseConfig({ sampleIntervalSeconds: 0 })).toThrow(ValidationError)
      expect(() => parseConfig({ sampleIntervalSeconds: 0 })).toThrow(/^Invalid config: sampleIntervalSeconds: /)
      expect(() => parseConfig({ suggestions: { minActivities: 1.5 } })).toThrow(
        /^Invalid config: suggestions\.minActivities: /,
      )
    })
  })

  describe('loadConfig', () => {
    test('uses defaults when the file does not exist', () => {
      expect(loadConfig(path.join(dir, 'missing.json'), {})).toEqual(parseConfig({}))
    })

    test('environment variables override the file', () => {
      const file = writeConfig(JSON.stringify({ databasePath: '/data/ledger.db', idleThresholdSeconds: 300 }))

      const config = loadConfig(file, { ACTIVITY_LEDGER_IDLE_THRESHOLD: '120', ACTIVITY_LEDGER_INTERVAL: '' })

      expect(config.databasePath).toBe('/data/ledger.db')
      expect(config.idleThresholdSeconds).toBe(120)
      expect(config.sampleIntervalSeconds).toBe(2)
      expect(loadConfig(file, { ACTIVITY_LEDGER_DB: '/tmp/other.db' }).databasePath).toBe('/tmp/other.db')
    })

    test('rejects a non-integer environment value', () => {
      expect(() => loadConfig(path.join(dir, 'missing.json'), { ACTIVITY_LEDGER_INTERVAL: 'abc' })).toThrow(
        'Invalid config: ACTIVITY_LEDGER_INTERVAL must be an integer, got "abc"',
      )
    })

    test('rejects a file that is not a JSON object', () => {
      expect(() => loadConfig(writeConfig('{ nope'), {})).toThrow(/is not valid JSON/)
      expect(() => loadConfig(writeConfig('[1, 2]'), {})).toThrow(/must contain a JSON object$/)
    })
  })
})
