import type { OwnerResolution, OwnerResolver } from "../../ports/owner-resolver"
import type { Tag } from "../../ports/tag"

/**
 * Map an id prefix to the tag of the entity that owns it.
 *
 * Resolvers are tried in order. When none matches, the fallback parser gets
 * the prefix as-is, which covers owners already written as `<kind>-<id>`.
 */
export function resolveOwner(prefix: string, owners: OwnerResolution): Tag | undefined {
  const resolver = findResolver(prefix, owners.resolvers)
  if (resolver) return resolver.toTag(prefix)

  return owners.fallback?.(prefix)
}

export function isOwnedPrefix(prefix: string, resolvers: readonly OwnerResolver[]): boolean {
  return findResolver(prefix, resolvers) !== undefined
}

function findResolver(
  prefix: string,
  resolvers: readonly OwnerResolver[],
): OwnerResolver | undefined {
  return resolvers.find((r) => r.matches(prefix))
}
