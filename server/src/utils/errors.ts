/**
 * Error taxonomy for the customer pipeline.
 *
 * Every pipeline error carries the HTTP status a route should answer with, a
 * stable machine-readable code, and the severity the dashboard shows it at.
 * Errors never outlive the request that raised them.
 */

export type NoticeLevel = 'error' | 'warning' | 'info'

export interface PipelineNotice {
  level: NoticeLevel
  code: string
  message: string
}

export class PipelineError extends Error {
  readonly status: number
  readonly code: string
  readonly level: NoticeLevel

  constructor(message: string, status: number, code: string, level: NoticeLevel = 'error') {
    super(message)
    this.name = new.target.name
    this.status = status
    this.code = code
    this.level = level
  }

  toNotice(): PipelineNotice {
    return { level: this.level, code: this.code, message: this.message }
  }
}

// Unparseable upload or one without the required columns
export class FormatError extends PipelineError {
  constructor(message: string) {
    super(message, 400, 'FORMAT_ERROR')
  }
}

// Zero usable rows; the pipeline stops before aggregating
export class EmptyInputError extends PipelineError {
  constructor(message: string) {
    super(message, 422, 'EMPTY_INPUT', 'warning')
  }
}

// Filters matched nothing. Reported alongside an empty view, never thrown.
export class NoMatchError extends PipelineError {
  constructor(message: string = 'No customer found') {
    super(message, 200, 'NO_MATCH', 'info')
  }
}

export class SessionNotFoundError extends PipelineError {
  constructor(sessionId: string) {
    super(`Session '${sessionId}' not found`, 404, 'SESSION_NOT_FOUND')
  }
}

export class InvalidRequestError extends PipelineError {
  constructor(message: string) {
    super(message, 400, 'INVALID_REQUEST')
  }
}

export const isPipelineError = (error: unknown): error is PipelineError =>
  error instanceof PipelineError

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
