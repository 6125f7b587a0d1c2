import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { IdPrefixer, isValidIdPrefixTag } from "../../core/id-prefixer"
import { getDefaultOwnerResolution } from "../../core/owner/default-owners"
import { getDefaultTagRegistry } from "../../core/registry/default-registry"
import { tagSchema } from "../../core/schema/tag-schema"
import { joinId } from "../../core/split-id"
import type { ParseResult } from "../../ports/parse-result"
import type { PrefixTag, Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"

export const ACTION_TAG_KIND = "action"

/** Joins the filterable prefix of an action id to its unique suffix */
export const ACTION_MARKER = "_a_"

/**
 * Tag for an action: a record of work queued for a unit or service.
 * The id reads `<unit or service name>_a_<sequence>`.
 */
export class ActionTag implements PrefixTag<typeof ACTION_TAG_KIND> {
  private readonly prefixer: IdPrefixer<typeof ACTION_TAG_KIND>

  private constructor(prefixer: IdPrefixer<typeof ACTION_TAG_KIND>) {
    this.prefixer = prefixer

    Object.freeze(this)
  }

  static tryCreate(id: string): ActionTag | undefined {
    const prefixer = IdPrefixer.tryCreate({
      id,
      kind: ACTION_TAG_KIND,
      marker: ACTION_MARKER,
      owners: getDefaultOwnerResolution(),
    })
    return prefixer && new ActionTag(prefixer)
  }

  get kind(): typeof ACTION_TAG_KIND {
    return this.prefixer.kind
  }

  get id(): string {
    return this.prefixer.id
  }

  get prefix(): string {
    return this.prefixer.prefix
  }

  get sequence(): number {
    return this.prefixer.sequence
  }

  prefixTag(): Tag | undefined {
    return this.prefixer.prefixTag()
  }

  toString(): string {
    return this.prefixer.toString()
  }
}

/**
 * Valid action ids contain the action marker exactly once. It separates a
 * prefix usable for filtering, which must be a unit or service name, from a
 * unique sequence number.
 */
export function isValidAction(id: string): boolean {
  return isValidIdPrefixTag(id, ACTION_MARKER, getDefaultOwnerResolution().resolvers)
}

/**
 * Returns the tag for the action with the given id.
 *
 * Only for ids that are already known to be valid; use {@link parseActionTag}
 * for input from outside the process.
 *
 * @throws InvalidTagIdError if the id is not a valid action id
 */
export function newActionTag(id: string): ActionTag {
  const tag = ActionTag.tryCreate(id)
  if (!tag) throw InvalidTagIdError.forId(id, "action id", ACTION_TAG_KIND)
  return tag
}

/**
 * Rebuilds an action tag from its prefix and sequence.
 * @throws InvalidTagIdError if the prefix or sequence is invalid
 */
export function joinActionTag(prefix: string, sequence: number): ActionTag {
  const tag = ActionTag.tryCreate(joinId(prefix, ACTION_MARKER, sequence))
  if (!tag) {
    throw new InvalidTagIdError("bad prefix or sequence", {
      prefix,
      sequence,
      kind: ACTION_TAG_KIND,
    })
  }
  return tag
}

export const actionTagKind: TagKind<ActionTag> = {
  kind: ACTION_TAG_KIND,
  fromBody: (body) => ActionTag.tryCreate(body),
  is: (value): value is ActionTag => value instanceof ActionTag,
}

/**
 * Parses an `action-<id>` string.
 * @throws InvalidTagError naming the `action` kind on any failure
 */
export function parseActionTag(value: string): ActionTag {
  return getDefaultTagRegistry().parseAs(value, actionTagKind)
}

export function safeParseActionTag(value: string): ParseResult<ActionTag> {
  return getDefaultTagRegistry().safeParseAs(value, actionTagKind)
}

export const actionTagSchema = tagSchema(ACTION_TAG_KIND, safeParseActionTag)
