export const roles = ['system', 'user', 'assistant'] as const

export type Role = typeof roles[number]

export const datasetKinds = ['items', 'conversations'] as const

export type DatasetKind = typeof datasetKinds[number]

export const exportTypes = ['pairs', 'conversations', 'items', 'items_with_meta'] as const

export type ExportType = typeof exportTypes[number]

export const contextModes = ['none', 'window', 'full'] as const

export type ContextMode = typeof contextModes[number]

export const roleStyles = ['labels', 'plain'] as const

export type RoleStyle = typeof roleStyles[number]

export type Message = {
  /** One of `roles` for stored conversations; item data may carry others. */
  role: string
  content: string
  name?: string
  meta?: unknown
}

export type Conversation = {
  id: number
  datasetId: number
  split: string
  status: string
  tags: string[]
  source: string
  notes: string
  messages: Message[]
}

export type DatasetItem = {
  id: number
  datasetId: number
  sourceRef: string
  /** Stored JSON document, as text. */
  data: string
}

export type ExportPair = {
  user: string
  assistant: string
}

export type ExportOptions = {
  type: ExportType
  /** 0 = every dataset */
  datasetId: number
  /** train | valid | test | all */
  split: string
  status: string
  includeSystem: boolean
  context: ContextMode
  contextTurns: number
  roleStyle: RoleStyle
  /** 0 = unlimited */
  maxExamples: number
}

export const defaultExportOptions: ExportOptions = {
  type: 'pairs',
  datasetId: 0,
  split: 'train',
  status: 'approved',
  includeSystem: false,
  context: 'none',
  contextTurns: 6,
  roleStyle: 'labels',
  maxExamples: 0,
}

export function toDatasetKind(raw: unknown): DatasetKind {
  return String(raw ?? '').trim().toLowerCase() === 'items' ? 'items' : 'conversations'
}
