/**
 * A typed, serializable identifier for a domain entity.
 *
 * The canonical form returned by `toString()` is `<kind>-<id>`; it is the
 * envelope understood by the tag registry.
 */
export interface Tag<K extends string = string> {
  /** Discriminator naming the entity kind (`"unit"`, `"action"`, ...) */
  readonly kind: K

  /** Kind-scoped identifier */
  readonly id: string

  toString(): string
}

/**
 * A tag whose id is `<owner-prefix><marker><sequence>`.
 *
 * The prefix names the owning entity, the sequence disambiguates tags that
 * share an owner.
 */
export interface PrefixTag<K extends string = string> extends Tag<K> {
  /** Owner part of the id. Empty when the id cannot be split. */
  readonly prefix: string

  /** Numeric suffix of the id. `-1` when the id cannot be split. */
  readonly sequence: number

  /** Tag of the owning entity, if the prefix resolves to one */
  prefixTag(): Tag | undefined
}
