import type { Tag } from "./tag"

/**
 * One kind of entity that can own prefix tags (units, services, ...).
 */
export interface OwnerResolver<T extends Tag = Tag> {
  readonly kind: T["kind"]

  /** `true` when the prefix is a legal name for this owner kind */
  matches(prefix: string): boolean

  /** Only called with a prefix for which `matches` holds */
  toTag(prefix: string): T
}

export type OwnerResolution = Readonly<{
  /** Tried in order; the first match wins */
  resolvers: readonly OwnerResolver[]

  /**
   * Parser tried on the raw prefix when no resolver matches.
   * Returns `undefined` when the prefix is not a tag either.
   */
  fallback?: (prefix: string) => Tag | undefined
}>
