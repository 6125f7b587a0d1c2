export type SplitId = {
  readonly ok: true
  readonly prefix: string
  readonly sequence: number
}

export type SplitIdFailure = {
  readonly ok: false
}

export type SplitIdResult = SplitId | SplitIdFailure

// no sign, no leading zero unless the value is exactly "0"
const CANONICAL_SEQUENCE = /^(?:0|[1-9][0-9]*)$/

const FAILED: SplitIdFailure = Object.freeze({ ok: false })

/**
 * Split `<prefix><marker><sequence>` into its parts.
 *
 * Fails unless the marker occurs exactly once and the suffix is a canonical
 * non-negative decimal that fits a safe integer.
 *
 * @example
 * ```ts
 * splitId("mysql/0_a_12", "_a_") // { ok: true, prefix: "mysql/0", sequence: 12 }
 * splitId("mysql/0_a_012", "_a_") // { ok: false }
 * ```
 */
export function splitId(id: string, marker: string): SplitIdResult {
  if (marker === "") return FAILED

  const parts = id.split(marker)
  if (parts.length !== 2) return FAILED

  const [prefix, suffix] = parts
  if (prefix === undefined || suffix === undefined) return FAILED
  if (!CANONICAL_SEQUENCE.test(suffix)) return FAILED

  const sequence = Number(suffix)
  if (!Number.isSafeInteger(sequence)) return FAILED

  return { ok: true, prefix, sequence }
}

/**
 * Inverse of {@link splitId}. The output only splits back when `sequence`
 * is a non-negative safe integer.
 */
export function joinId(prefix: string, marker: string, sequence: number): string {
  return `${prefix}${marker}${sequence}`
}
