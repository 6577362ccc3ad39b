import type { Conversation, DatasetItem, DatasetKind } from '../models.js'

export type ConversationFilter = {
  /** 0 = every dataset */
  datasetId: number
  /** `all` disables the split filter */
  split: string
  status: string
}

export type ItemFilter = {
  datasetId: number
}

/**
 * Read side of the storage layer. Both cursors yield records in ascending id
 * order and must release whatever they hold when iteration stops early.
 */
export interface RecordSource {
  /** `null` when the dataset does not exist. */
  resolveDatasetKind(datasetId: number): Promise<DatasetKind | null>
  openConversations(filter: ConversationFilter, signal?: AbortSignal): AsyncIterable<Conversation>
  openItems(filter: ItemFilter, signal?: AbortSignal): AsyncIterable<DatasetItem>
}
