import { z } from 'zod'
import type { ProjectStore } from './data/project-store'
import { isLocalDate } from './dates'
import { formatIssues, ValidationError } from './errors'
import type { RuleEngine } from './projects/rule-engine'
import type { SuggestionEngine } from './projects/suggestion-engine'
import { type Brand, type Project, type ProjectRule, RULE_TYPES } from './types'

// --- Payload Schemas ---

const Id = z.number().int().positive()
const Name = z.string().trim().min(1)
const Color = z.string().regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'must look like #rgb or #rrggbb')
const RuleTypeSchema = z.enum(RULE_TYPES)

const InsertBrandSchema = z.object({ name: Name, color: Color.optional() })
const UpdateBrandSchema = z.object({ id: Id, name: Name.optional(), color: Color.optional() })
const IdSchema = z.object({ id: Id })
const MergeBrandSchema = z.object({ sourceId: Id, targetId: Id })
const InsertProjectSchema = z.object({ brandId: Id, name: Name, color: Color.optional() })
const UpdateProjectSchema = z.object({ id: Id, name: Name.optional(), color: Color.optional(), brandId: Id.optional() })

const InsertRuleSchema = z.object({
  projectId: Id,
  ruleType: RuleTypeSchema,
  pattern: z.string().min(1),
  isRegex: z.boolean().optional(),
  priority: z.number().int().optional(),
})

const UpdateRuleSchema = z.object({
  id: Id,
  pattern: z.string().min(1).optional(),
  isRegex: z.boolean().optional(),
  priority: z.number().int().optional(),
})

const ClassifySchema = z
  .object({
    activityIds: z.array(Id),
    projectId: Id,
    createRule: z.boolean().default(false),
    ruleType: RuleTypeSchema.optional(),
    pattern: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.createRule) return
    if (value.ruleType === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ruleType'], message: 'required when createRule is set' })
    }
    if (value.pattern === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pattern'], message: 'required when createRule is set' })
    }
  })

const AutoAssignSchema = z
  .object({ date: z.string().refine(isLocalDate, 'must be a YYYY-MM-DD date').optional() })
  .default({})

const SuggestedRuleSchema = z.object({ ruleType: RuleTypeSchema, pattern: z.string().min(1), isRegex: z.boolean() })

const AcceptSuggestionSchema = z.object({
  target: z.union([
    z.object({ brandName: Name, projectName: Name, color: Color.optional() }),
    z.object({ projectId: Id }),
  ]),
  rules: z.array(SuggestedRuleSchema),
})

const DismissSuggestionSchema = z.object({ token: Name })

function parsePayload<T extends z.ZodTypeAny>(command: string, schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload)
  if (!result.success) {
    const field = result.error.issues[0]?.path.join('.') || null
    throw new ValidationError(`Invalid ${command} payload: ${formatIssues(result.error)}`, field)
  }
  return result.data
}

interface CommandDeps {
  projectStore: ProjectStore
  ruleEngine: RuleEngine
  suggestionEngine: SuggestionEngine
}

interface TaxonomyProject extends Project {
  rules: ProjectRule[]
}

interface TaxonomyBrand extends Brand {
  projects: TaxonomyProject[]
}

/**
 * Data-in/data-out operations for any front end (CLI, HTTP, a dialog).
 * Payloads arrive untyped and are validated here; anything that changes
 * rules reloads the rule cache before returning.
 */
function createCommands({ projectStore, ruleEngine, suggestionEngine }: CommandDeps) {
  return {
    insertBrand(payload: unknown) {
      const p = parsePayload('insertBrand', InsertBrandSchema, payload)
      return { id: projectStore.insertBrand(p.name, p.color) }
    },

    updateBrand(payload: unknown) {
      const { id, ...changes } = parsePayload('updateBrand', UpdateBrandSchema, payload)
      projectStore.updateBrand(id, changes)
      return { id }
    },

    deleteBrand(payload: unknown) {
      const { id } = parsePayload('deleteBrand', IdSchema, payload)
      projectStore.deleteBrand(id)
      ruleEngine.reloadRules()
      return { id }
    },

    mergeBrand(payload: unknown) {
      const p = parsePayload('mergeBrand', MergeBrandSchema, payload)
      projectStore.mergeBrand(p.sourceId, p.targetId)
      ruleEngine.reloadRules()
      return { id: p.targetId }
    },

    insertProject(payload: unknown) {
      const p = parsePayload('insertProject', InsertProjectSchema, payload)
      return { id: projectStore.insertProject(p.brandId, p.name, p.color) }
    },

    updateProject(payload: unknown) {
      const { id, ...changes } = parsePayload('updateProject', UpdateProjectSchema, payload)
      projectStore.updateProject(id, changes)
      return { id }
    },

    deleteProject(payload: unknown) {
      const { id } = parsePayload('deleteProject', IdSchema, payload)
      projectStore.deleteProject(id)
      ruleEngine.reloadRules()
      return { id }
    },

    insertRule(payload: unknown) {
      const rule = parsePayload('insertRule', InsertRuleSchema, payload)
      const id = projectStore.insertRule(rule)
      ruleEngine.reloadRules()
      return { id }
    },

    updateRule(payload: unknown) {
      const { id, ...changes } = parsePayload('updateRule', UpdateRuleSchema, payload)
      projectStore.updateRule(id, changes)
      ruleEngine.reloadRules()
      return { id }
    },

    deleteRule(payload: unknown) {
      const { id } = parsePayload('deleteRule', IdSchema, payload)
      projectStore.deleteRule(id)
      ruleEngine.reloadRules()
      return { id }
    },

    classify(payload: unknown) {
      const p = parsePayload('classify', ClassifySchema, payload)
      return { assigned: ruleEngine.classify(p.activityIds, p.projectId, p.createRule, p.ruleType, p.pattern) }
    },

    autoAssign(payload: unknown) {
      const { date } = parsePayload('autoAssign', AutoAssignSchema, payload)
      return { assigned: ruleEngine.autoAssignUnclassified(date) }
    },

    acceptSuggestion(payload: unknown) {
      const p = parsePayload('acceptSuggestion', AcceptSuggestionSchema, payload)
      return { assigned: suggestionEngine.accept(p.target, p.rules) }
    },

    dismissSuggestion(payload: unknown) {
      const { token } = parsePayload('dismissSuggestion', DismissSuggestionSchema, payload)
      suggestionEngine.dismiss(token)
      return { token }
    },

    listTaxonomy(_payload?: unknown): TaxonomyBrand[] {
      const rules = projectStore.loadAllProjectRules()
      const projects = projectStore.allProjects()
      return projectStore.allBrands().map((brand) => ({
        ...brand,
        projects: projects
          .filter((p) => p.brandId === brand.id)
          .map(({ brandName: _brandName, ...project }) => ({
            ...project,
            rules: rules.filter((r) => r.projectId === project.id),
          })),
      }))
    },
  }
}

type Commands = ReturnType<typeof createCommands>
type CommandName = keyof Commands

function isCommandName(commands: Commands, name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(commands, name)
}

/** Looks a command up by name, for front ends that route on strings. */
function runCommand(commands: Commands, name: string, payload?: unknown) {
  if (!isCommandName(commands, name)) {
    throw new ValidationError(`Unknown command "${name}"`, 'command')
  }
  return commands[name](payload)
}

export { createCommands, runCommand }
export type { CommandDeps, CommandName, Commands, TaxonomyBrand, TaxonomyProject }
