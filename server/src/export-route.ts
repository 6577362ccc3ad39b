import type { NextFunction, Request, RequestHandler, Response } from 'express'

import { errorMessage } from './errors.js'
import type { ExportOptions } from './models.js'
import { parseExportQuery } from './export/options.js'
import { planExport, runExport } from './export/stream-export.js'
import type { ExportPlan } from './export/stream-export.js'
import type { RecordSource } from './export/source.js'

export type ExportRouteDeps = {
  source: RecordSource
  filename: string
}

/**
 * GET /api/v1/export.jsonl. Bad parameters are answered as JSON before the
 * stream starts; once bytes are out, a failure can only cut the stream.
 */
export function exportJsonlHandler({ source, filename }: ExportRouteDeps): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now()
    let options: ExportOptions
    let plan: ExportPlan
    try {
      options = parseExportQuery(req.query)
      plan = await planExport(source, options)
    } catch (e) {
      return next(e)
    }

    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort()
    })

    res.status(200)
    res.setHeader('Content-Type', 'application/x-ndjson')
    res.setHeader('Content-Disposition', `attachment; filename=${filename}`)

    try {
      const stats = await runExport(plan, source, options, res, controller.signal)
      console.log(
        `[export] ${stats.mode} dataset=${options.datasetId} lines=${stats.written} aborted=${stats.aborted} ms=${Date.now() - startedAt}`
      )
      if (!stats.aborted) res.end()
    } catch (e) {
      console.error(`[export] ${plan.mode} failed:`, errorMessage(e))
      if (!res.headersSent) {
        res.removeHeader('Content-Type')
        res.removeHeader('Content-Disposition')
        return next(e)
      }
      res.destroy(e instanceof Error ? e : new Error(errorMessage(e)))
    }
  }
}
