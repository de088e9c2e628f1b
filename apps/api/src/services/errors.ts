/**
 * Typed failures raised by the study services.
 *
 * Routes never build error responses for these by hand: the app-level
 * `onError` handler maps `StudyError.status` + `code` onto the standard
 * `{ success: false, error }` envelope.
 */

export type StudyErrorStatus = 400 | 404

export class StudyError extends Error {
  readonly code: string
  readonly status: StudyErrorStatus
  readonly details?: Record<string, unknown>

  constructor(
    status: StudyErrorStatus,
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'StudyError'
    this.code = code
    this.status = status
    this.details = details
  }
}

/** Assignment, assessment, case or block does not exist for this reader. */
export class NotFoundError extends StudyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(404, code, message, details)
    this.name = 'NotFoundError'
  }
}

/** Submission breaks a business rule; the reader must fix and resubmit. */
export class ValidationError extends StudyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(400, code, message, details)
    this.name = 'ValidationError'
  }
}

export function isStudyError(error: unknown): error is StudyError {
  return error instanceof StudyError
}
