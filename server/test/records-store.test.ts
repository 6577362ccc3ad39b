import { describe, expect, it } from 'vitest'

import { ExportAbortedError } from '../src/errors.js'
import type { Conversation } from '../src/models.js'
import type { Queryable } from '../src/pg.js'
import { PgRecordSource, conversationsFilterQuery, itemsQuery } from '../src/records-store.js'
import { streamExport } from '../src/export/stream-export.js'
import { MemorySink } from './helpers/sinks.js'

type Call = { text: string; values: unknown[] }

/** Answers the store's queries from fixed rows, honouring the keyset and limit parameters. */
class FakeDb implements Queryable {
  readonly calls: Call[] = []

  constructor(
    private readonly tables: {
      datasets?: Array<{ id: number; kind: string }>
      conversations?: Array<Record<string, unknown> & { id: string }>
      messages?: Record<string, Array<Record<string, unknown>>>
      items?: Array<Record<string, unknown> & { id: string }>
    }
  ) {}

  async query(text: string, values: unknown[] = []) {
    this.calls.push({ text, values })
    const rows = this.rowsFor(text, values)
    return { rows, rowCount: rows.length }
  }

  private rowsFor(text: string, values: unknown[]): unknown[] {
    if (text.includes('from datasets')) {
      return (this.tables.datasets ?? []).filter((d) => d.id === values[0]).map((d) => ({ kind: d.kind }))
    }
    if (text.includes('from conversation_messages')) {
      return this.tables.messages?.[String(values[0])] ?? []
    }
    const after = Number(values[values.length - 2])
    const limit = Number(values[values.length - 1])
    const table = text.includes('from conversations') ? this.tables.conversations : this.tables.items
    return (table ?? []).filter((r) => Number(r.id) > after).slice(0, limit)
  }

  count(fragment: string): number {
    return this.calls.filter((c) => c.text.includes(fragment)).length
  }
}

function conversationRow(id: string) {
  return { id, dataset_id: '1', split: 'train', status: 'approved', tags: ['x', 1], source: null, notes: 'n' }
}

describe('conversationsFilterQuery', () => {
  it('filters by status and split with the keyset last', () => {
    const q = conversationsFilterQuery({ datasetId: 0, split: 'train', status: 'approved' }, '0', 200)
    expect(q.values).toEqual(['approved', 'train', '0', 200])
    expect(q.text).toContain(' where status = $1 and split = $2 and id > $3::bigint\n order by id asc\n limit $4')
  })

  it('adds the dataset and drops the split for all', () => {
    const q = conversationsFilterQuery({ datasetId: 5, split: 'all', status: 'draft' }, '42', 10)
    expect(q.values).toEqual(['draft', 5, '42', 10])
    expect(q.text).toContain(' where status = $1 and dataset_id = $2 and id > $3::bigint\n')
    expect(q.text).toMatch(/limit \$4$/)
  })
})

describe('itemsQuery', () => {
  it('reads data as text by dataset', () => {
    const q = itemsQuery({ datasetId: 3 }, '9', 50)
    expect(q.values).toEqual([3, '9', 50])
    expect(q.text).toContain('data::text as data')
    expect(q.text).toContain('where dataset_id = $1 and id > $2::bigint')
  })
})

describe('PgRecordSource', () => {
  it('resolves dataset kinds', async () => {
    const source = new PgRecordSource(new FakeDb({ datasets: [{ id: 2, kind: 'Items' }] }))
    await expect(source.resolveDatasetKind(2)).resolves.toBe('items')
    await expect(source.resolveDatasetKind(3)).resolves.toBeNull()
  })

  it('pages through conversations by id', async () => {
    const db = new FakeDb({
      conversations: [conversationRow('1'), conversationRow('2'), conversationRow('3')],
      messages: {
        '1': [
          { role: 'user', name: '', content: 'Hi', meta: {} },
          { role: 'assistant', name: 'bot', content: 'Hello', meta: null },
        ],
      },
    })
    const source = new PgRecordSource(db, 2)
    const seen: Conversation[] = []
    for await (const c of source.openConversations({ datasetId: 0, split: 'train', status: 'approved' })) seen.push(c)

    expect(seen.map((c) => c.id)).toEqual([1, 2, 3])
    expect(seen[0]).toEqual({
      id: 1,
      datasetId: 1,
      split: 'train',
      status: 'approved',
      tags: ['x'],
      source: '',
      notes: 'n',
      messages: [
        { role: 'user', content: 'Hi', meta: {} },
        { role: 'assistant', content: 'Hello', name: 'bot' },
      ],
    })
    const pages = db.calls.filter((c) => c.text.includes('from conversations')).map((c) => c.values[c.values.length - 2])
    expect(pages).toEqual(['0', '2'])
  })

  it('stops querying when iteration stops early', async () => {
    const db = new FakeDb({ conversations: [conversationRow('1'), conversationRow('2')] })
    const source = new PgRecordSource(db, 1)
    for await (const c of source.openConversations({ datasetId: 0, split: 'train', status: 'approved' })) {
      expect(c.id).toBe(1)
      break
    }
    expect(db.count('from conversations')).toBe(1)
    expect(db.count('from conversation_messages')).toBe(1)
  })

  it('does not query once aborted', async () => {
    const db = new FakeDb({ items: [{ id: '1', dataset_id: '2', source_ref: '', data: '{}' }] })
    const controller = new AbortController()
    controller.abort()
    const iterator = new PgRecordSource(db).openItems({ datasetId: 2 }, controller.signal)
    await expect(iterator.next()).rejects.toBeInstanceOf(ExportAbortedError)
    expect(db.calls).toEqual([])
  })

  it('feeds an items export end to end', async () => {
    const db = new FakeDb({
      datasets: [{ id: 2, kind: 'items' }],
      items: [
        { id: '7', dataset_id: '2', source_ref: 'f.jsonl:1', data: '{"user": "Hi", "assistant": "Hello"}' },
        { id: '8', dataset_id: '2', source_ref: null, data: '{"other": true}' },
      ],
    })
    const sink = new MemorySink()
    const stats = await streamExport(new PgRecordSource(db, 1), { datasetId: 2, type: 'items_with_meta' }, sink)
    expect(sink.lines).toEqual([
      '{"data":{"user":"Hi","assistant":"Hello"},"dataset_id":2,"id":7,"source_ref":"f.jsonl:1"}',
      '{"data":{"other":true},"dataset_id":2,"id":8,"source_ref":""}',
    ])
    expect(stats).toEqual({ mode: 'items-with-meta', written: 2, aborted: false })
    expect(db.calls.filter((c) => c.text.includes('from dataset_items')).map((c) => c.values[1])).toEqual(['0', '7', '8'])
  })
})
