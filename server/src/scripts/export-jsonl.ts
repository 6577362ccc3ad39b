#!/usr/bin/env node
import 'dotenv/config'
import fs from 'node:fs'
import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { Command, Option } from 'commander'

import { loadConfig } from '../config.js'
import { errorMessage } from '../errors.js'
import { contextModes, exportTypes, roleStyles } from '../models.js'
import { abortOnBrokenPipe } from '../export/ndjson.js'
import { parseExportQuery } from '../export/options.js'
import { planExport, runExport } from '../export/stream-export.js'
import { closePool, getPool } from '../pg.js'
import { PgRecordSource } from '../records-store.js'

type CliFlags = {
  type: string
  dataset: string
  split: string
  status: string
  includeSystem: boolean
  context: string
  contextTurns: string
  roleStyle: string
  max: string
  out?: string
}

function createProgram(): Command {
  return new Command()
    .name('export-jsonl')
    .description('Stream a dataset export as newline-delimited JSON')
    .addOption(new Option('-t, --type <type>', 'export type').choices(exportTypes).default('pairs'))
    .option('-d, --dataset <id>', 'dataset id (0 = every dataset)', '0')
    .option('--split <split>', 'train, valid, test or all', 'train')
    .option('--status <status>', 'conversation status', 'approved')
    .option('--include-system', 'keep system messages in rendered context', false)
    .addOption(new Option('--context <mode>', 'prompt context').choices(contextModes).default('none'))
    .option('--context-turns <n>', 'user turns in a window context', '6')
    .addOption(new Option('--role-style <style>', 'context line style').choices(roleStyles).default('labels'))
    .option('-m, --max <n>', 'stop after n records (0 = unlimited)', '0')
    .option('-o, --out <path>', 'write to a file instead of stdout')
}

async function main() {
  const program = createProgram()
  program.parse()
  const flags = program.opts<CliFlags>()

  const options = parseExportQuery({
    type: flags.type,
    dataset_id: flags.dataset,
    split: flags.split,
    status: flags.status,
    include_system: String(flags.includeSystem),
    context: flags.context,
    context_turns: flags.contextTurns,
    role_style: flags.roleStyle,
    max_examples: flags.max,
  })

  const config = loadConfig()
  const source = new PgRecordSource(getPool(), config.exportBatchSize)
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  try {
    const plan = await planExport(source, options)
    const sink: Writable = flags.out ? fs.createWriteStream(flags.out) : process.stdout
    if (!flags.out) abortOnBrokenPipe(sink, controller)
    const startedAt = Date.now()
    const stats = await runExport(plan, source, options, sink, controller.signal)
    if (flags.out) {
      sink.end()
      await once(sink, 'finish')
    }
    // stdout carries the data, so progress goes to stderr
    console.error(`[cli] ${stats.mode}: ${stats.written} records in ${Date.now() - startedAt}ms${stats.aborted ? ' (aborted)' : ''}`)
    if (flags.out) console.error(`[cli] wrote ${flags.out}`)
  } finally {
    await closePool()
  }
}

main().catch((e) => {
  console.error('[cli] export failed:', errorMessage(e))
  process.exit(1)
})
