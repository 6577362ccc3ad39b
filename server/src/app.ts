import express from 'express'
import cors from 'cors'
import type { ErrorRequestHandler, Request, Response } from 'express'

import { errorMessage, errorStatus } from './errors.js'
import { exportJsonlHandler } from './export-route.js'
import type { RecordSource } from './export/source.js'

export type AppDeps = {
  source: RecordSource
  exportFilename: string
  ping: () => Promise<void>
}

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) return next(err)
  const status = errorStatus(err)
  if (status >= 500) {
    console.error('[server] request failed:', errorMessage(err))
    res.status(status).json({ error: 'internal error' })
    return
  }
  res.status(status).json({ error: errorMessage(err) })
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  app.use(cors({ exposedHeaders: ['Content-Type', 'Content-Disposition'] }))

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      await deps.ping()
      res.json({ ok: true, ts: new Date().toISOString() })
    } catch (e) {
      res.status(500).json({ ok: false, error: errorMessage(e) })
    }
  })

  app.get('/api/v1/export.jsonl', exportJsonlHandler({ source: deps.source, filename: deps.exportFilename }))

  app.use(errorHandler)
  return app
}
