import type { ZodError } from 'zod'

/**
 * A caller-supplied value was rejected: duplicate name, missing parent,
 * unknown rule type, a regex that does not compile, a malformed payload.
 * Storage faults are not wrapped; the SqliteError from better-sqlite3
 * reaches the caller as is.
 */
class ValidationError extends Error {
  field: string | null

  constructor(message: string, field: string | null = null) {
    super(message)
    this.name = 'ValidationError'
    this.field = field
  }
}

function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}

/** "path: message; path: message" for every issue of a failed parse. */
function formatIssues(error: ZodError): string {
  return error.issues.map((iss) => `${iss.path.join('.') || '(root)'}: ${iss.message}`).join('; ')
}

export { formatIssues, isValidationError, ValidationError }
