import { formatEnvelope } from "../../core/envelope"
import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { getDefaultTagRegistry } from "../../core/registry/default-registry"
import { tagSchema } from "../../core/schema/tag-schema"
import type { OwnerResolver } from "../../ports/owner-resolver"
import type { ParseResult } from "../../ports/parse-result"
import type { Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"
import { isValidUnit, unitNumber, unitService, unitTagBodyToId } from "./unit-name"

export const UNIT_TAG_KIND = "unit"

export class UnitTag implements Tag<typeof UNIT_TAG_KIND> {
  readonly kind = UNIT_TAG_KIND
  readonly id: string

  private constructor(name: string) {
    this.id = name

    Object.freeze(this)
  }

  static tryCreate(name: string): UnitTag | undefined {
    return isValidUnit(name) ? new UnitTag(name) : undefined
  }

  /** Name of the service this unit belongs to */
  get serviceName(): string {
    return unitService(this.id)
  }

  /** Position of this unit within its service */
  get number(): number {
    return unitNumber(this.id)
  }

  toString(): string {
    return formatEnvelope(this.kind, this.id.replaceAll("/", "-"))
  }
}

/**
 * Returns the tag for the unit with the given name (`<service>/<number>`).
 * @throws InvalidTagIdError if the name is not a valid unit name
 */
export function newUnitTag(name: string): UnitTag {
  const tag = UnitTag.tryCreate(name)
  if (!tag) throw InvalidTagIdError.forId(name, "unit name", UNIT_TAG_KIND)
  return tag
}

export const unitTagKind: TagKind<UnitTag> = {
  kind: UNIT_TAG_KIND,
  fromBody: (body) => UnitTag.tryCreate(unitTagBodyToId(body)),
  is: (value): value is UnitTag => value instanceof UnitTag,
}

export const unitOwner: OwnerResolver<UnitTag> = {
  kind: UNIT_TAG_KIND,
  matches: isValidUnit,
  toTag: newUnitTag,
}

/**
 * @throws InvalidTagError if the value is not a `unit-<service>-<number>` tag
 */
export function parseUnitTag(value: string): UnitTag {
  return getDefaultTagRegistry().parseAs(value, unitTagKind)
}

export function safeParseUnitTag(value: string): ParseResult<UnitTag> {
  return getDefaultTagRegistry().safeParseAs(value, unitTagKind)
}

export const unitTagSchema = tagSchema(UNIT_TAG_KIND, safeParseUnitTag)
