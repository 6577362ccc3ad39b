import type { Message, RoleStyle } from '../models.js'

export type ContextOptions = {
  includeSystem: boolean
  /** 0 = full history */
  contextTurns: number
  roleStyle: RoleStyle
}

// Roles outside system/assistant read as the user speaking.
export function roleLabel(role: string): string {
  switch (role) {
    case 'system':
      return 'System: '
    case 'assistant':
      return 'Assistant: '
    default:
      return 'User: '
  }
}

/**
 * Index where the prompt window opens: the earliest of the last
 * `contextTurns` user messages up to `userIndex`, or 0 when there are fewer.
 */
export function contextStart(messages: Message[], userIndex: number, contextTurns: number): number {
  if (contextTurns <= 0) return 0
  let turns = 0
  for (let j = userIndex; j >= 0; j--) {
    if (messages[j].role !== 'user') continue
    turns++
    if (turns >= contextTurns) return j
  }
  return 0
}

/**
 * Renders messages[start..userIndex] as one prompt, a line per message.
 * Blank messages are dropped, and system messages unless asked for.
 */
export function renderContext(messages: Message[], userIndex: number, opts: ContextOptions): string {
  const start = contextStart(messages, userIndex, opts.contextTurns)
  const lines: string[] = []
  for (let i = start; i <= userIndex && i < messages.length; i++) {
    const m = messages[i]
    if (m.role === 'system' && !opts.includeSystem) continue
    const text = m.content.trim()
    if (!text) continue
    lines.push(opts.roleStyle === 'plain' ? text : roleLabel(m.role) + text)
  }
  return lines.join('\n')
}
