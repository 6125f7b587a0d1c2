export type TagErrorCode = "invalid_tag" | "invalid_id" | "duplicate_kind"

/**
 * Structured metadata attached to tag errors (offending value, expected kind).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedTagError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedTagError
  stack?: string
}>
