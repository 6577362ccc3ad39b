import { z } from 'zod'

import { ExportConfigError } from '../errors.js'
import { contextModes, defaultExportOptions, exportTypes, roleStyles } from '../models.js'
import type { ExportOptions } from '../models.js'

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'y'])
const FALSE_WORDS = new Set(['0', 'false', 'no', 'n'])
const INT_RE = /^[+-]?\d+$/

// Query strings may repeat a key; the first value wins.
function firstText(value: unknown): string | undefined {
  const v = Array.isArray(value) ? value[0] : value
  if (typeof v !== 'string') return undefined
  const s = v.trim()
  return s ? s : undefined
}

function toInt(value: unknown): number | undefined {
  const s = firstText(value)
  if (s === undefined || !INT_RE.test(s)) return undefined
  const n = Number(s)
  return Number.isSafeInteger(n) ? n : undefined
}

function toBool(value: unknown): boolean | undefined {
  const s = firstText(value)?.toLowerCase()
  if (s === undefined) return undefined
  if (TRUE_WORDS.has(s)) return true
  if (FALSE_WORDS.has(s)) return false
  return undefined
}

const text = (fallback: string) => z.preprocess(firstText, z.string().default(fallback))

const count = (fallback: number) =>
  z.preprocess(toInt, z.number().int().default(fallback)).transform((n) => Math.max(0, n))

const exportQuerySchema = z.object({
  type: z.preprocess(firstText, z.enum(exportTypes).default(defaultExportOptions.type)),
  dataset_id: count(defaultExportOptions.datasetId),
  split: text(defaultExportOptions.split),
  status: text(defaultExportOptions.status),
  include_system: z.preprocess(toBool, z.boolean().default(defaultExportOptions.includeSystem)),
  context: z.preprocess(firstText, z.enum(contextModes).catch(defaultExportOptions.context)),
  context_turns: count(defaultExportOptions.contextTurns),
  role_style: z.preprocess(firstText, z.enum(roleStyles).catch(defaultExportOptions.roleStyle)),
  max_examples: count(defaultExportOptions.maxExamples),
})

/**
 * Reads export options from URL query parameters. Malformed numbers and
 * booleans fall back to their defaults; only an unknown `type` is rejected.
 */
export function parseExportQuery(query: Record<string, unknown>): ExportOptions {
  const parsed = exportQuerySchema.safeParse(query)
  if (!parsed.success) {
    throw new ExportConfigError(`unknown export type: ${firstText(query.type) ?? ''}`)
  }
  const q = parsed.data
  return {
    type: q.type,
    datasetId: q.dataset_id,
    split: q.split,
    status: q.status,
    includeSystem: q.include_system,
    context: q.context,
    contextTurns: q.context_turns,
    roleStyle: q.role_style,
    maxExamples: q.max_examples,
  }
}

function clampCount(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback
  return Math.max(0, Math.floor(value))
}

/** Fills in defaults for programmatic callers. */
export function resolveExportOptions(input: Partial<ExportOptions> = {}): ExportOptions {
  const d = defaultExportOptions
  return {
    type: input.type ?? d.type,
    datasetId: clampCount(input.datasetId, d.datasetId),
    split: input.split || d.split,
    status: input.status || d.status,
    includeSystem: input.includeSystem ?? d.includeSystem,
    context: input.context ?? d.context,
    contextTurns: clampCount(input.contextTurns, d.contextTurns),
    roleStyle: input.roleStyle ?? d.roleStyle,
    maxExamples: clampCount(input.maxExamples, d.maxExamples),
  }
}
