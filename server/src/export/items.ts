import { z } from 'zod'

import type { ExportPair, Message } from '../models.js'
import { derivePairs } from './pairs.js'
import type { PairOptions } from './pairs.js'

const singleTurnSchema = z.object({
  user: z.string(),
  assistant: z.string(),
})

// Any string role is kept; pairing only looks at user and assistant turns.
const messageSchema = z.object({
  role: z.string().nullish().transform((v) => v ?? ''),
  content: z.string().nullish().transform((v) => v ?? ''),
  name: z.string().nullish().transform((v) => v ?? undefined),
  meta: z.unknown().optional(),
})

const messagesSchema = z.object({
  messages: z.array(messageSchema.nullable().transform((m) => m ?? { role: '', content: '' })),
})

export type ItemShape =
  | { kind: 'single-turn'; pair: ExportPair }
  | { kind: 'messages'; messages: Message[] }

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Recognizes `{user, assistant}` (checked first) and `{messages: [...]}`.
 * Anything else, malformed JSON included, is `null`.
 */
export function parseItemData(text: string): ItemShape | null {
  const value = parseJson(text)

  const single = singleTurnSchema.safeParse(value)
  if (single.success) {
    const user = single.data.user.trim()
    const assistant = single.data.assistant.trim()
    if (user && assistant) return { kind: 'single-turn', pair: { user, assistant } }
  }

  const multi = messagesSchema.safeParse(value)
  if (multi.success) return { kind: 'messages', messages: multi.data.messages }

  return null
}

export function* derivePairsFromItemData(text: string, opts: PairOptions): Generator<ExportPair> {
  const shape = parseItemData(text)
  if (!shape) return
  if (shape.kind === 'single-turn') {
    yield shape.pair
    return
  }
  yield* derivePairs(shape.messages, opts)
}
