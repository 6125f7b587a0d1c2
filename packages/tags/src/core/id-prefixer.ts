import type { OwnerResolution, OwnerResolver } from "../ports/owner-resolver"
import type { PrefixTag, Tag } from "../ports/tag"
import { formatEnvelope } from "./envelope"
import { isOwnedPrefix, resolveOwner } from "./owner/resolve-owner"
import { splitId } from "./split-id"

export type IdPrefixerFields<K extends string> = Readonly<{
  id: string
  kind: K
  marker: string
  owners: OwnerResolution
}>

/**
 * Shared state and behavior of tags whose id is
 * `<owner-prefix><marker><sequence>`.
 *
 * Concrete kinds hold one of these as a field and delegate to it. An
 * instance only exists for an id that passes {@link isValidIdPrefixTag}.
 */
export class IdPrefixer<K extends string = string> implements PrefixTag<K> {
  readonly id: string
  readonly kind: K
  readonly marker: string
  private readonly owners: OwnerResolution

  private constructor(fields: IdPrefixerFields<K>) {
    this.id = fields.id
    this.kind = fields.kind
    this.marker = fields.marker
    this.owners = fields.owners

    Object.freeze(this)
  }

  /**
   * Returns `undefined` when the id does not split on the marker or its
   * prefix is not a name any owner resolver accepts.
   */
  static tryCreate<K extends string>(fields: IdPrefixerFields<K>): IdPrefixer<K> | undefined {
    if (!isValidIdPrefixTag(fields.id, fields.marker, fields.owners.resolvers)) {
      return undefined
    }
    return new IdPrefixer(fields)
  }

  get prefix(): string {
    const split = splitId(this.id, this.marker)
    return split.ok ? split.prefix : ""
  }

  get sequence(): number {
    const split = splitId(this.id, this.marker)
    return split.ok ? split.sequence : -1
  }

  prefixTag(): Tag | undefined {
    const split = splitId(this.id, this.marker)
    if (!split.ok) return undefined

    return resolveOwner(split.prefix, this.owners)
  }

  toString(): string {
    return formatEnvelope(this.kind, this.id)
  }
}

export function isValidIdPrefixTag(
  id: string,
  marker: string,
  resolvers: readonly OwnerResolver[],
): boolean {
  const split = splitId(id, marker)
  if (!split.ok) return false

  return isOwnedPrefix(split.prefix, resolvers)
}
