import { formatEnvelope } from "../../core/envelope"
import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { getDefaultTagRegistry } from "../../core/registry/default-registry"
import { tagSchema } from "../../core/schema/tag-schema"
import type { OwnerResolver } from "../../ports/owner-resolver"
import type { ParseResult } from "../../ports/parse-result"
import type { Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"
import { isValidService } from "./service-name"

export const SERVICE_TAG_KIND = "service"

export class ServiceTag implements Tag<typeof SERVICE_TAG_KIND> {
  readonly kind = SERVICE_TAG_KIND
  readonly id: string

  private constructor(name: string) {
    this.id = name

    Object.freeze(this)
  }

  static tryCreate(name: string): ServiceTag | undefined {
    return isValidService(name) ? new ServiceTag(name) : undefined
  }

  toString(): string {
    return formatEnvelope(this.kind, this.id)
  }
}

/**
 * Returns the tag for the service with the given name.
 * @throws InvalidTagIdError if the name is not a valid service name
 */
export function newServiceTag(name: string): ServiceTag {
  const tag = ServiceTag.tryCreate(name)
  if (!tag) throw InvalidTagIdError.forId(name, "service name", SERVICE_TAG_KIND)
  return tag
}

export const serviceTagKind: TagKind<ServiceTag> = {
  kind: SERVICE_TAG_KIND,
  fromBody: (body) => ServiceTag.tryCreate(body),
  is: (value): value is ServiceTag => value instanceof ServiceTag,
}

export const serviceOwner: OwnerResolver<ServiceTag> = {
  kind: SERVICE_TAG_KIND,
  matches: isValidService,
  toTag: newServiceTag,
}

/**
 * @throws InvalidTagError if the value is not a `service-<name>` tag
 */
export function parseServiceTag(value: string): ServiceTag {
  return getDefaultTagRegistry().parseAs(value, serviceTagKind)
}

export function safeParseServiceTag(value: string): ParseResult<ServiceTag> {
  return getDefaultTagRegistry().safeParseAs(value, serviceTagKind)
}

export const serviceTagSchema = tagSchema(SERVICE_TAG_KIND, safeParseServiceTag)
