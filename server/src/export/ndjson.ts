import type { Writable } from 'node:stream'

import { ExportAbortedError } from '../errors.js'
import type { Conversation, DatasetItem, ExportPair, Message } from '../models.js'

/** Drops insignificant whitespace from a JSON document without re-encoding it. */
export function compactJson(text: string): string {
  const out: string[] = []
  let inString = false
  let escaped = false
  for (const ch of text) {
    if (inString) {
      out.push(ch)
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') continue
    if (ch === '"') inString = true
    out.push(ch)
  }
  return out.join('')
}

export function encodePair(pair: ExportPair): string {
  return JSON.stringify({ user: pair.user, assistant: pair.assistant })
}

function messageRecord(m: Message): Record<string, unknown> {
  const record: Record<string, unknown> = { role: m.role, content: m.content }
  if (m.name) record.name = m.name
  if (m.meta !== undefined) record.meta = m.meta
  return record
}

// Keys are sorted, matching the files the previous exporter produced.
export function encodeConversation(c: Conversation): string {
  return JSON.stringify({
    id: c.id,
    messages: c.messages.map(messageRecord),
    notes: c.notes,
    source: c.source,
    split: c.split,
    status: c.status,
    tags: c.tags,
  })
}

export function encodeItem(item: DatasetItem): string {
  return /[\r\n]/.test(item.data) ? compactJson(item.data) : item.data
}

export function encodeItemWithMeta(item: DatasetItem): string {
  return (
    `{"data":${compactJson(item.data)}` +
    `,"dataset_id":${JSON.stringify(item.datasetId)}` +
    `,"id":${JSON.stringify(item.id)}` +
    `,"source_ref":${JSON.stringify(item.sourceRef)}}`
  )
}

/**
 * Writes one document per line to a sink it does not own: the caller ends
 * it. Waits for `drain` when the sink pushes back.
 */
export class NdjsonWriter {
  private failure: Error | null = null
  private readonly onError = (err: Error) => {
    this.failure = err
  }

  constructor(private readonly sink: Writable, private readonly signal?: AbortSignal) {
    sink.on('error', this.onError)
  }

  async writeLine(json: string): Promise<void> {
    this.ensureWritable()
    if (this.sink.write(json + '\n')) return
    await this.drain()
  }

  release(): void {
    this.sink.off('error', this.onError)
  }

  private ensureWritable(): void {
    if (this.failure) throw this.failure
    if (this.signal?.aborted || this.sink.destroyed || this.sink.writableEnded) {
      throw new ExportAbortedError()
    }
  }

  private drain(): Promise<void> {
    const { sink, signal } = this
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        sink.off('drain', onDrain)
        sink.off('close', onClose)
        sink.off('error', onFail)
        signal?.removeEventListener('abort', onClose)
      }
      const onDrain = () => {
        cleanup()
        resolve()
      }
      const onClose = () => {
        cleanup()
        reject(new ExportAbortedError())
      }
      const onFail = (err: Error) => {
        cleanup()
        reject(err)
      }
      sink.on('drain', onDrain)
      sink.on('close', onClose)
      sink.on('error', onFail)
      signal?.addEventListener('abort', onClose)
    })
  }
}

/**
 * Keeps an error listener on a sink the caller writes to after any writer
 * has let go (stdout). A closed pipe (`export-jsonl | head`) aborts the run
 * instead of crashing the process.
 */
export function abortOnBrokenPipe(sink: Writable, controller: AbortController): void {
  sink.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EPIPE') {
      controller.abort()
      return
    }
    console.error('[export] output error:', err.message)
  })
}
