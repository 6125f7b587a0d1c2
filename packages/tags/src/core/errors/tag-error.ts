import type { ErrorContext, SerializedTagError, TagErrorCode } from "../../ports/error"

export type TagErrorOptions<C extends TagErrorCode = TagErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class TagError<C extends TagErrorCode = TagErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `true` for bad external input (a malformed tag string), `false` when a
   * trusted constructor was handed data that should already have been valid.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: TagErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedTagError {
    return serializeTagError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize a tag error, or anything it was caused by, to a consistent shape.
 */
export function serializeTagError(
  err: unknown,
  options?: SerializeOptions,
): SerializedTagError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof TagError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeTagError(err.cause, options) }),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeTagError(err.cause, options) }),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
