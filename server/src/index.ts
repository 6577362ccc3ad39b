import 'dotenv/config'

import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { closePool, ensureSchema, getPool } from './pg.js'
import { PgRecordSource } from './records-store.js'

const config = loadConfig()
const pool = getPool()

const app = createApp({
  source: new PgRecordSource(pool, config.exportBatchSize),
  exportFilename: config.exportFilename,
  ping: async () => {
    await pool.query('select 1')
  },
})

ensureSchema(pool).then(() => {
  const server = app.listen(config.port, () => {
    console.log(`[server] listening on http://localhost:${config.port}`)
  })
  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`)
    server.close(() => {
      closePool().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error('[server] failed to close pool', e)
          process.exit(1)
        }
      )
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}).catch((e) => {
  console.error('[server] failed to ensure schema', e)
  process.exit(1)
})
