/**
 * Defines error handling for relation operations
 */

/**
 * Extension of {@link ErrorOptions} for relation operations
 */
export interface RelationErrorOptions extends ErrorOptions {
  /** The field that was being read */
  field?: string
  /** The row position involved */
  offset?: number
}

/**
 * Represents an error that occurred while reading or transforming a relation
 */
export class RelationError extends Error {
  readonly options?: RelationErrorOptions

  constructor(message?: string, options?: RelationErrorOptions) {
    super(message, options)
    this.name = "RelationError"
    this.options = options
  }

  get field(): string | undefined {
    return this.options?.field
  }

  get offset(): number | undefined {
    return this.options?.offset
  }
}

/**
 * Type guard for {@link RelationError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link RelationError}
 */
export function isRelationError(error: unknown): error is RelationError {
  return error instanceof RelationError
}
