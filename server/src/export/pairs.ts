import type { ExportOptions, ExportPair, Message, Role } from '../models.js'
import { renderContext } from './context.js'

export type PairOptions = Pick<ExportOptions, 'context' | 'contextTurns' | 'includeSystem' | 'roleStyle'>

export function findPrevRole(messages: Message[], from: number, role: Role): number {
  for (let j = from; j >= 0; j--) {
    if (messages[j].role === role) return j
  }
  return -1
}

function promptFor(messages: Message[], userIndex: number, opts: PairOptions): string {
  switch (opts.context) {
    case 'window':
      return renderContext(messages, userIndex, {
        includeSystem: opts.includeSystem,
        contextTurns: opts.contextTurns,
        roleStyle: opts.roleStyle,
      })
    case 'full':
      return renderContext(messages, userIndex, {
        includeSystem: opts.includeSystem,
        contextTurns: 0,
        roleStyle: opts.roleStyle,
      })
    case 'none':
      return messages[userIndex].content.trim()
  }
}

/**
 * Pairs every non-blank assistant message with the nearest user message
 * before it. Consecutive assistant turns each pair with the same user turn.
 */
export function* derivePairs(messages: Message[], opts: PairOptions): Generator<ExportPair> {
  for (let i = 0; i < messages.length; i++) {
    if (messages[i].role !== 'assistant') continue
    const assistant = messages[i].content.trim()
    if (!assistant) continue

    const userIndex = findPrevRole(messages, i - 1, 'user')
    if (userIndex < 0) continue

    const user = promptFor(messages, userIndex, opts)
    if (!user) continue
    yield { user, assistant }
  }
}
