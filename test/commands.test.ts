/**
 * Tests for the command layer: payload validation, delegation to the stores
 * and engines, and rule cache reloads after rule-changing commands.
 */

import { type Commands, createCommands, runCommand } from '../src/commands'
import { ValidationError } from '../src/errors'
import { activity, at, createTestLedger } from './fixtures'

describe('commands', () => {
  let ledger: ReturnType<typeof createTestLedger>
  let commands: Commands

  beforeEach(() => {
    ledger = createTestLedger()
    commands = createCommands(ledger)
  })

  afterEach(() => {
    ledger.database.close()
  })

  function fieldOf(fn: () => unknown): string | null | undefined {
    try {
      fn()
    } catch (e) {
      return e instanceof ValidationError ? e.field : undefined
    }
    return undefined
  }

  function acmeWeb() {
    const { id: brandId } = commands.insertBrand({ name: 'Acme' })
    const { id: projectId } = commands.insertProject({ brandId, name: 'Web' })
    return { brandId, projectId }
  }

  const acmeVisit = activity({ url: 'https://app.acme.com' })

  // ── Validation ─────────────────────────────────────────────────────────

  describe('validation', () => {
    test('rejects malformed payloads with the offending field', () => {
      expect(() => commands.insertBrand({ name: '   ' })).toThrow(/^Invalid insertBrand payload: name: /)
      expect(fieldOf(() => commands.insertBrand({ name: 'Acme', color: 'red' }))).toBe('color')
      expect(fieldOf(() => commands.insertRule({ projectId: 1, ruleType: 'app-name', pattern: 'x' }))).toBe('ruleType')
      expect(fieldOf(() => commands.deleteRule(undefined))).toBe(null)
      expect(fieldOf(() => commands.autoAssign({ date: '2024-02-30' }))).toBe('date')
    })

    test('classify requires a rule type and pattern when creating a rule', () => {
      const { projectId } = acmeWeb()

      expect(fieldOf(() => commands.classify({ activityIds: [1], projectId, createRule: true, ruleType: 'url-domain' }))).toBe(
        'pattern',
      )
    })

    test('store errors pass through', () => {
      acmeWeb()

      expect(() => commands.insertBrand({ name: 'acme' })).toThrow('Brand "acme" already exists')
    })
  })

  // ── Taxonomy ───────────────────────────────────────────────────────────

  describe('taxonomy', () => {
    test('listTaxonomy nests projects and rules under brands', () => {
      const { brandId, projectId } = acmeWeb()
      const { id: ruleId } = commands.insertRule({ projectId, ruleType: 'url-domain', pattern: 'acme.com' })

      expect(commands.listTaxonomy()).toEqual([
        {
          id: brandId,
          name: 'Acme',
          color: '#6366f1',
          sortOrder: 0,
          projects: [
            {
              id: projectId,
              brandId,
              name: 'Web',
              color: '#6366f1',
              sortOrder: 0,
              rules: [
                { id: ruleId, projectId, ruleType: 'url-domain', pattern: 'acme.com', isRegex: false, priority: 0 },
              ],
            },
          ],
        },
      ])
    })

    test('mergeBrand returns the target id', () => {
      const { brandId } = acmeWeb()
      const { id: other } = commands.insertBrand({ name: 'Acme Inc' })

      expect(commands.mergeBrand({ sourceId: other, targetId: brandId })).toEqual({ id: brandId })
      expect(commands.listTaxonomy().map((b) => b.name)).toEqual(['Acme'])
    })
  })

  // ── Rule cache ─────────────────────────────────────────────────────────

  describe('rule changes', () => {
    test('insertRule, updateRule and deleteRule take effect on the next match', () => {
      const { projectId } = acmeWeb()
      expect(ledger.ruleEngine.match(acmeVisit)).toBeNull()

      const { id } = commands.insertRule({ projectId, ruleType: 'url-domain', pattern: 'acme.com' })
      expect(ledger.ruleEngine.match(acmeVisit)).toBe(projectId)

      commands.updateRule({ id, pattern: 'globex.com' })
      expect(ledger.ruleEngine.match(acmeVisit)).toBeNull()

      commands.updateRule({ id, pattern: 'acme.com' })
      commands.deleteRule({ id })
      expect(ledger.ruleEngine.match(acmeVisit)).toBeNull()
    })

    test('deleteProject drops its rules from matching', () => {
      const { projectId } = acmeWeb()
      commands.insertRule({ projectId, ruleType: 'url-domain', pattern: 'acme.com' })
      expect(ledger.ruleEngine.match(acmeVisit)).toBe(projectId)

      commands.deleteProject({ id: projectId })

      expect(ledger.ruleEngine.match(acmeVisit)).toBeNull()
    })
  })

  // ── Classification ─────────────────────────────────────────────────────

  describe('classification', () => {
    test('classify and autoAssign report how many activities they assigned', () => {
      const { projectId } = acmeWeb()
      const first = ledger.activityStore.insert(activity({ url: 'https://acme.com', timestamp: at(15, 9) }))
      ledger.activityStore.insert(activity({ url: 'https://shop.acme.com', timestamp: at(15, 10) }))

      expect(
        commands.classify({ activityIds: [first], projectId, createRule: true, ruleType: 'url-domain', pattern: 'acme.com' }),
      ).toEqual({ assigned: 1 })
      expect(commands.autoAssign(undefined)).toEqual({ assigned: 1 })
      expect(commands.autoAssign({ date: '2024-01-15' })).toEqual({ assigned: 0 })
    })
  })

  // ── Suggestions ────────────────────────────────────────────────────────

  describe('suggestions', () => {
    test('acceptSuggestion creates the target and assigns matches', () => {
      ledger.activityStore.insert(activity({ extraInfo: '~/code/acme-web' }))

      expect(
        commands.acceptSuggestion({
          target: { brandName: 'Acme', projectName: 'Web' },
          rules: [{ ruleType: 'terminal-folder', pattern: 'acme-web', isRegex: false }],
        }),
      ).toEqual({ assigned: 1 })
      expect(commands.listTaxonomy()[0].projects[0].name).toBe('Web')
    })

    test('dismissSuggestion stores the trimmed token', () => {
      expect(commands.dismissSuggestion({ token: ' acme web ' })).toEqual({ token: 'acme web' })
      expect(ledger.projectStore.dismissedTokens()).toEqual(new Set(['acme web']))
    })
  })

  // ── Routing ────────────────────────────────────────────────────────────

  describe('runCommand', () => {
    test('routes by name', () => {
      expect(runCommand(commands, 'insertBrand', { name: 'Acme' })).toEqual({ id: 1 })
      expect(runCommand(commands, 'listTaxonomy')).toHaveLength(1)
    })

    test('rejects unknown names', () => {
      expect(() => runCommand(commands, 'dropTables', {})).toThrow('Unknown command "dropTables"')
      expect(() => runCommand(commands, 'toString', {})).toThrow(ValidationError)
    })
  })
})
