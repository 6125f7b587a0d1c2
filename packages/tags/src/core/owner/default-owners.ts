import { serviceOwner } from "../../adapters/service/service-tag"
import { unitOwner } from "../../adapters/unit/unit-tag"
import type { OwnerResolution } from "../../ports/owner-resolver"
import { safeParseTag } from "../registry/default-registry"

let defaultOwners: OwnerResolution | undefined

/**
 * Units, then services, then any built-in tag spelled out in full.
 * Built on first use for the same reason as the default registry.
 */
export function getDefaultOwnerResolution(): OwnerResolution {
  defaultOwners ??= Object.freeze({
    resolvers: Object.freeze([unitOwner, serviceOwner]),
    fallback: (prefix: string) => {
      const result = safeParseTag(prefix)
      return result.success ? result.tag : undefined
    },
  })
  return defaultOwners
}
