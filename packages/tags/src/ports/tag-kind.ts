import type { Tag } from "./tag"

/**
 * Codec for one tag kind, registered with a tag registry.
 *
 * @example
 * ```ts
 * const serviceTagKind: TagKind<ServiceTag> = {
 *   kind: "service",
 *   fromBody: (body) => (isValidService(body) ? new ServiceTag(body) : undefined),
 *   is: (value): value is ServiceTag => value instanceof ServiceTag,
 * }
 * ```
 */
export interface TagKind<T extends Tag = Tag> {
  readonly kind: T["kind"]

  /**
   * Build a tag from the body of a `<kind>-<body>` string.
   * Returns `undefined` when the body is not a valid id for this kind.
   */
  fromBody(body: string): T | undefined

  /** Type guard for tags of this kind */
  is(value: unknown): value is T
}
