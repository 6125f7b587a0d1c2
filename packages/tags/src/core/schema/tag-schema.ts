import { z } from "zod/mini"
import type { ParseResult } from "../../ports/parse-result"
import type { Tag } from "../../ports/tag"

/**
 * Build a zod/mini schema that accepts a canonical tag string and outputs
 * the parsed tag.
 *
 * @example
 * ```ts
 * const body = z.object({ action: actionTagSchema })
 * const { action } = body.parse({ action: "action-mysql/0_a_3" })
 * action.sequence // 3
 * ```
 */
export function tagSchema<T extends Tag>(
  kind: string,
  safeParse: (value: string) => ParseResult<T>,
) {
  return z.pipe(
    z.string(),
    z.transform((value: string, ctx): T => {
      const result = safeParse(value)
      if (!result.success) {
        ctx.issues.push({ code: "custom", message: `Invalid ${kind} tag`, input: value })
        return z.NEVER
      }
      return result.tag
    }),
  )
}
