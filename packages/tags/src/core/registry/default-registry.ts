import { actionResultTagKind } from "../../adapters/action-result/action-result-tag"
import { actionTagKind } from "../../adapters/action/action-tag"
import { serviceTagKind } from "../../adapters/service/service-tag"
import { unitTagKind } from "../../adapters/unit/unit-tag"
import type { Logger } from "../../ports/logger"
import type { ParseResult } from "../../ports/parse-result"
import type { Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"
import type { TagRegistry } from "../../ports/tag-registry"
import { createTagRegistry } from "./tag-registry"

let defaultRegistry: TagRegistry | undefined

export function builtinTagKinds(): readonly TagKind[] {
  return [unitTagKind, serviceTagKind, actionTagKind, actionResultTagKind]
}

export type DefaultTagRegistryOptions = Readonly<{
  /** @default NullLogger */
  logger?: Logger
}>

/**
 * Rebuild the registry behind `parseTag` and the per-kind `parse*Tag`
 * functions, e.g. to route their trace and debug entries to a logger.
 */
export function configureDefaultTagRegistry(
  options: DefaultTagRegistryOptions = {},
): TagRegistry {
  defaultRegistry = createTagRegistry({ kinds: builtinTagKinds(), logger: options.logger })
  return defaultRegistry
}

/**
 * Registry of the built-in kinds, built on first use with a null logger
 * unless {@link configureDefaultTagRegistry} ran first. Kind modules import
 * this one and are imported by it, so nothing here runs at load time.
 */
export function getDefaultTagRegistry(): TagRegistry {
  defaultRegistry ??= createTagRegistry({ kinds: builtinTagKinds() })
  return defaultRegistry
}

/**
 * Parse any built-in tag from its `<kind>-<id>` form.
 * @throws InvalidTagError
 */
export function parseTag(value: string): Tag {
  return getDefaultTagRegistry().parse(value)
}

export function safeParseTag(value: string): ParseResult {
  return getDefaultTagRegistry().safeParse(value)
}
