import type { TagErrorCode } from "../../ports/error"
import { TagError } from "./tag-error"

/**
 * Type guard for tag errors, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   parseActionTag(input)
 * } catch (err) {
 *   if (isTagError(err, "invalid_tag")) return badRequest(err.message)
 *   throw err
 * }
 * ```
 */
export function isTagError<C extends TagErrorCode>(
  value: unknown,
  code?: C,
): value is TagError<C> {
  if (!(value instanceof TagError)) return false

  return code === undefined || value.code === code
}
