export type ErrorCode =
  | 'NotInitialized'
  | 'NotFound'
  | 'UnsupportedFormat'
  | 'ParseError'
  | 'NoSuitableColumns'
  | 'NotLoaded'
  | 'ReasoningServiceFailure'
  | 'UnknownRequestType'
  | 'MalformedRequest'

export class EngineError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EngineError'
    this.code = code
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
