/**
 * Errors raised outside the analysis core (CLI, HTTP API, saved analyses).
 * The pipeline itself never throws; see `processDocument`.
 */

export type ErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'UNKNOWN_CATEGORY_SET' | 'INTERNAL_ERROR'

export interface ErrorDetail {
  field?: string
  message: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = new.target.name
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details })
    }
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid input', details?: ErrorDetail[]) {
    super('VALIDATION_ERROR', message, 400, details)
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super('NOT_FOUND', message, 404)
  }
}

export class UnknownCategorySetError extends AppError {
  constructor(name: string) {
    super('UNKNOWN_CATEGORY_SET', `Unknown category set: ${name}`, 400)
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
