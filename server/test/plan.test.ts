import { describe, expect, it } from 'vitest'

import { ExportConfigError } from '../src/errors.js'
import { resolveExportOptions } from '../src/export/options.js'
import { planExport } from '../src/export/stream-export.js'
import { toDatasetKind } from '../src/models.js'
import { MemoryRecordSource } from './helpers/memory-source.js'

const source = new MemoryRecordSource({
  datasets: [
    { id: 1, kind: 'conversations' },
    { id: 2, kind: 'Items' },
  ],
})

function plan(input: Parameters<typeof resolveExportOptions>[0]) {
  return planExport(source, resolveExportOptions(input))
}

describe('planExport', () => {
  it('exports conversation pairs across every dataset by default', async () => {
    await expect(plan({})).resolves.toEqual({
      mode: 'conversation-pairs',
      filter: { datasetId: 0, split: 'train', status: 'approved' },
    })
  })

  it('exports raw conversations', async () => {
    await expect(plan({ type: 'conversations', datasetId: 1, split: 'all' })).resolves.toEqual({
      mode: 'conversations',
      filter: { datasetId: 1, split: 'all', status: 'approved' },
    })
  })

  it('requires a dataset for items exports', async () => {
    await expect(plan({ type: 'items' })).rejects.toThrow('dataset_id is required for items exports')
    await expect(plan({ type: 'items_with_meta' })).rejects.toBeInstanceOf(ExportConfigError)
  })

  it('maps every legal type on an items dataset', async () => {
    await expect(plan({ datasetId: 2 })).resolves.toEqual({ mode: 'item-pairs', filter: { datasetId: 2 } })
    await expect(plan({ datasetId: 2, type: 'items' })).resolves.toEqual({ mode: 'items', filter: { datasetId: 2 } })
    await expect(plan({ datasetId: 2, type: 'items_with_meta' })).resolves.toEqual({
      mode: 'items-with-meta',
      filter: { datasetId: 2 },
    })
  })

  it('rejects conversations on an items dataset', async () => {
    await expect(plan({ datasetId: 2, type: 'conversations' })).rejects.toThrow(
      'type=conversations is not valid for items datasets'
    )
  })

  it('rejects items types on a conversations dataset', async () => {
    await expect(plan({ datasetId: 1, type: 'items' })).rejects.toThrow(
      'items export types are only valid for items datasets'
    )
  })

  it('reports an unknown dataset as not found', async () => {
    await expect(plan({ datasetId: 99 })).rejects.toMatchObject({ status: 404, message: 'dataset not found' })
  })
})

describe('toDatasetKind', () => {
  it('matches items case-insensitively and defaults to conversations', () => {
    expect(toDatasetKind(' ITEMS ')).toBe('items')
    expect(toDatasetKind('conversations')).toBe('conversations')
    expect(toDatasetKind(null)).toBe('conversations')
  })
})
