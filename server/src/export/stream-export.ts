import type { Writable } from 'node:stream'

import { ExportAbortedError, ExportConfigError, throwIfAborted } from '../errors.js'
import type { ExportOptions, ExportPair } from '../models.js'
import { derivePairsFromItemData } from './items.js'
import { encodeConversation, encodeItem, encodeItemWithMeta, encodePair, NdjsonWriter } from './ndjson.js'
import { resolveExportOptions } from './options.js'
import { derivePairs } from './pairs.js'
import type { ConversationFilter, ItemFilter, RecordSource } from './source.js'

export type ExportPlan =
  | { mode: 'conversation-pairs'; filter: ConversationFilter }
  | { mode: 'conversations'; filter: ConversationFilter }
  | { mode: 'item-pairs'; filter: ItemFilter }
  | { mode: 'items'; filter: ItemFilter }
  | { mode: 'items-with-meta'; filter: ItemFilter }

export type ExportMode = ExportPlan['mode']

export type ExportStats = {
  mode: ExportMode
  written: number
  aborted: boolean
}

function conversationFilter(options: ExportOptions): ConversationFilter {
  return { datasetId: options.datasetId, split: options.split, status: options.status }
}

/**
 * Picks the generation mode for `(type, dataset kind)`. Illegal combinations
 * throw an ExportConfigError before anything is written.
 */
export async function planExport(source: RecordSource, options: ExportOptions): Promise<ExportPlan> {
  const itemsType = options.type === 'items' || options.type === 'items_with_meta'

  if (options.datasetId <= 0) {
    if (itemsType) throw new ExportConfigError('dataset_id is required for items exports')
    return options.type === 'conversations'
      ? { mode: 'conversations', filter: conversationFilter(options) }
      : { mode: 'conversation-pairs', filter: conversationFilter(options) }
  }

  const kind = await source.resolveDatasetKind(options.datasetId)
  if (!kind) throw new ExportConfigError('dataset not found', 404)

  if (kind === 'items') {
    const filter: ItemFilter = { datasetId: options.datasetId }
    switch (options.type) {
      case 'pairs':
        return { mode: 'item-pairs', filter }
      case 'items':
        return { mode: 'items', filter }
      case 'items_with_meta':
        return { mode: 'items-with-meta', filter }
      case 'conversations':
        throw new ExportConfigError('type=conversations is not valid for items datasets')
    }
  }

  if (itemsType) throw new ExportConfigError('items export types are only valid for items datasets')
  return options.type === 'conversations'
    ? { mode: 'conversations', filter: conversationFilter(options) }
    : { mode: 'conversation-pairs', filter: conversationFilter(options) }
}

/** State owned by one export request. */
class ExportRun {
  written = 0

  constructor(
    private readonly writer: NdjsonWriter,
    private readonly cap: number,
    readonly signal?: AbortSignal
  ) {}

  get full(): boolean {
    return this.cap > 0 && this.written >= this.cap
  }

  checkpoint(): void {
    throwIfAborted(this.signal)
  }

  async emit(line: string): Promise<void> {
    await this.writer.writeLine(line)
    this.written++
  }
}

function* encodePairs(pairs: Iterable<ExportPair>): Generator<string> {
  for (const pair of pairs) yield encodePair(pair)
}

async function drive<T>(records: AsyncIterable<T>, encode: (record: T) => Iterable<string>, run: ExportRun): Promise<void> {
  for await (const record of records) {
    run.checkpoint()
    for (const line of encode(record)) {
      await run.emit(line)
      if (run.full) return
    }
  }
}

function generate(plan: ExportPlan, source: RecordSource, options: ExportOptions, run: ExportRun): Promise<void> {
  const { signal } = run
  switch (plan.mode) {
    case 'conversation-pairs':
      return drive(source.openConversations(plan.filter, signal), (c) => encodePairs(derivePairs(c.messages, options)), run)
    case 'conversations':
      return drive(source.openConversations(plan.filter, signal), (c) => [encodeConversation(c)], run)
    case 'item-pairs':
      return drive(source.openItems(plan.filter, signal), (item) => encodePairs(derivePairsFromItemData(item.data, options)), run)
    case 'items':
      return drive(source.openItems(plan.filter, signal), (item) => [encodeItem(item)], run)
    case 'items-with-meta':
      return drive(source.openItems(plan.filter, signal), (item) => [encodeItemWithMeta(item)], run)
  }
}

/**
 * Streams a planned export into `sink`. A consumer that goes away resolves
 * with `aborted: true`; storage and sink failures reject.
 */
export async function runExport(
  plan: ExportPlan,
  source: RecordSource,
  options: ExportOptions,
  sink: Writable,
  signal?: AbortSignal
): Promise<ExportStats> {
  const writer = new NdjsonWriter(sink, signal)
  const run = new ExportRun(writer, options.maxExamples, signal)
  try {
    await generate(plan, source, options, run)
    return { mode: plan.mode, written: run.written, aborted: false }
  } catch (err) {
    if (err instanceof ExportAbortedError || signal?.aborted) {
      return { mode: plan.mode, written: run.written, aborted: true }
    }
    throw err
  } finally {
    writer.release()
  }
}

export async function streamExport(
  source: RecordSource,
  input: Partial<ExportOptions>,
  sink: Writable,
  { signal }: { signal?: AbortSignal } = {}
): Promise<ExportStats> {
  const options = resolveExportOptions(input)
  const plan = await planExport(source, options)
  return runExport(plan, source, options, sink, signal)
}
