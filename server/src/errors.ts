export class HttpError extends Error {
  readonly status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'HttpError'
    this.status = status
  }
}

/** Illegal export request, raised before any byte is streamed. */
export class ExportConfigError extends HttpError {
  constructor(message: string, status = 400) {
    super(message, status)
    this.name = 'ExportConfigError'
  }
}

/** The consumer went away (signal aborted or sink closed). */
export class ExportAbortedError extends Error {
  constructor(message = 'export aborted') {
    super(message)
    this.name = 'ExportAbortedError'
  }
}

export function errorStatus(err: unknown): number {
  return err instanceof HttpError ? err.status : 500
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ExportAbortedError()
}
