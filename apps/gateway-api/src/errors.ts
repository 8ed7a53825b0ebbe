export type ExtractionErrorCode = 'request_body_unreadable' | 'request_body_incomplete' | 'request_body_too_large'

export class ExtractionError extends Error {
  public readonly code: ExtractionErrorCode

  public constructor(code: ExtractionErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'ExtractionError'
    this.code = code
  }
}

/** Raised at start-up when a route cannot be registered as written. */
export class RouteDefinitionError extends Error {
  public readonly pattern: string

  public constructor(pattern: string, message: string) {
    super(`Invalid route "${pattern}": ${message}`)
    this.name = 'RouteDefinitionError'
    this.pattern = pattern
  }
}

/** Programming errors in how the dispatcher is wired, never request failures. */
export class DispatcherError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'DispatcherError'
  }
}
