import { throwIfAborted } from './errors.js'
import { roles, toDatasetKind } from './models.js'
import type { Conversation, DatasetItem, DatasetKind, Message, Role } from './models.js'
import type { ConversationFilter, ItemFilter, RecordSource } from './export/source.js'
import type { Queryable } from './pg.js'

type DatasetRow = {
  kind: string | null
}

// bigint columns come back from pg as strings
type ConversationRow = {
  id: string
  dataset_id: string
  split: string
  status: string
  tags: unknown
  source: string | null
  notes: string | null
}

type MessageRow = {
  role: string
  name: string | null
  content: string | null
  meta: unknown
}

type ItemRow = {
  id: string
  dataset_id: string
  source_ref: string | null
  data: string
}

export type SqlQuery = {
  text: string
  values: unknown[]
}

export function conversationsFilterQuery(filter: ConversationFilter, afterId: string, limit: number): SqlQuery {
  const values: unknown[] = [filter.status]
  const where = ['status = $1']

  if (filter.datasetId > 0) {
    values.push(filter.datasetId)
    where.push(`dataset_id = $${values.length}`)
  }
  if (filter.split && filter.split !== 'all') {
    values.push(filter.split)
    where.push(`split = $${values.length}`)
  }
  values.push(afterId)
  where.push(`id > $${values.length}::bigint`)
  values.push(limit)

  const text = `select id, dataset_id, split, status, tags, source, notes
  from conversations
 where ${where.join(' and ')}
 order by id asc
 limit $${values.length}`
  return { text, values }
}

export function itemsQuery(filter: ItemFilter, afterId: string, limit: number): SqlQuery {
  return {
    text: `select id, dataset_id, source_ref, data::text as data
  from dataset_items
 where dataset_id = $1 and id > $2::bigint
 order by id asc
 limit $3`,
    values: [filter.datasetId, afterId, limit],
  }
}

function toRole(raw: string): Role | null {
  const role = raw.trim()
  return roles.find((r) => r === role) ?? null
}

function toTags(raw: unknown): string[] {
  if (!Array.isArray(raw)) return []
  return raw.filter((t): t is string => typeof t === 'string')
}

function toMessage(row: MessageRow): Message | null {
  const role = toRole(row.role)
  if (!role) return null
  const message: Message = { role, content: row.content ?? '' }
  if (row.name) message.name = row.name
  if (row.meta !== null && row.meta !== undefined) message.meta = row.meta
  return message
}

/**
 * Record source over Postgres. Cursors page through ids in batches
 * (`id > last order by id limit n`), so a run holds one batch of
 * conversation headers and one conversation's messages at a time.
 */
export class PgRecordSource implements RecordSource {
  constructor(private readonly db: Queryable, private readonly batchSize = 200) {}

  async resolveDatasetKind(datasetId: number): Promise<DatasetKind | null> {
    const res = await this.db.query('select kind from datasets where id = $1', [datasetId])
    const rows = res.rows as DatasetRow[]
    if (rows.length === 0) return null
    return toDatasetKind(rows[0].kind)
  }

  async loadMessages(conversationId: string): Promise<Message[]> {
    const res = await this.db.query(
      `select role, name, content, meta
         from conversation_messages
        where conversation_id = $1::bigint
        order by idx asc`,
      [conversationId]
    )
    const out: Message[] = []
    for (const row of res.rows as MessageRow[]) {
      const m = toMessage(row)
      if (m) out.push(m)
    }
    return out
  }

  async *openConversations(filter: ConversationFilter, signal?: AbortSignal): AsyncGenerator<Conversation> {
    let afterId = '0'
    for (;;) {
      throwIfAborted(signal)
      const q = conversationsFilterQuery(filter, afterId, this.batchSize)
      const res = await this.db.query(q.text, q.values)
      const rows = res.rows as ConversationRow[]
      for (const row of rows) {
        throwIfAborted(signal)
        const messages = await this.loadMessages(row.id)
        yield {
          id: Number(row.id),
          datasetId: Number(row.dataset_id),
          split: row.split,
          status: row.status,
          tags: toTags(row.tags),
          source: row.source ?? '',
          notes: row.notes ?? '',
          messages,
        }
      }
      if (rows.length < this.batchSize) return
      afterId = rows[rows.length - 1].id
    }
  }

  async *openItems(filter: ItemFilter, signal?: AbortSignal): AsyncGenerator<DatasetItem> {
    let afterId = '0'
    for (;;) {
      throwIfAborted(signal)
      const q = itemsQuery(filter, afterId, this.batchSize)
      const res = await this.db.query(q.text, q.values)
      const rows = res.rows as ItemRow[]
      for (const row of rows) {
        yield {
          id: Number(row.id),
          datasetId: Number(row.dataset_id),
          sourceRef: row.source_ref ?? '',
          data: row.data,
        }
      }
      if (rows.length < this.batchSize) return
      afterId = rows[rows.length - 1].id
    }
  }
}
