import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { IdPrefixer, isValidIdPrefixTag } from "../../core/id-prefixer"
import { getDefaultOwnerResolution } from "../../core/owner/default-owners"
import { getDefaultTagRegistry } from "../../core/registry/default-registry"
import { tagSchema } from "../../core/schema/tag-schema"
import type { ParseResult } from "../../ports/parse-result"
import type { PrefixTag, Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"

export const ACTION_RESULT_TAG_KIND = "actionresult"

export const ACTION_RESULT_MARKER = "_ar_"

type ActionResultKind = typeof ACTION_RESULT_TAG_KIND

/** Tag for the recorded outcome of an action */
export class ActionResultTag implements PrefixTag<ActionResultKind> {
  private readonly prefixer: IdPrefixer<ActionResultKind>

  private constructor(prefixer: IdPrefixer<ActionResultKind>) {
    this.prefixer = prefixer

    Object.freeze(this)
  }

  static tryCreate(id: string): ActionResultTag | undefined {
    const prefixer = IdPrefixer.tryCreate({
      id,
      kind: ACTION_RESULT_TAG_KIND,
      marker: ACTION_RESULT_MARKER,
      owners: getDefaultOwnerResolution(),
    })
    return prefixer && new ActionResultTag(prefixer)
  }

  get kind(): ActionResultKind {
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

export function isValidActionResult(id: string): boolean {
  return isValidIdPrefixTag(id, ACTION_RESULT_MARKER, getDefaultOwnerResolution().resolvers)
}

/**
 * Returns the tag for the action result with the given id.
 * @throws InvalidTagIdError if the id is not a valid action result id
 */
export function newActionResultTag(id: string): ActionResultTag {
  const tag = ActionResultTag.tryCreate(id)
  if (!tag) throw InvalidTagIdError.forId(id, "action result id", ACTION_RESULT_TAG_KIND)
  return tag
}

export const actionResultTagKind: TagKind<ActionResultTag> = {
  kind: ACTION_RESULT_TAG_KIND,
  fromBody: (body) => ActionResultTag.tryCreate(body),
  is: (value): value is ActionResultTag => value instanceof ActionResultTag,
}

/**
 * @throws InvalidTagError naming the `actionresult` kind on any failure
 */
export function parseActionResultTag(value: string): ActionResultTag {
  return getDefaultTagRegistry().parseAs(value, actionResultTagKind)
}

export function safeParseActionResultTag(value: string): ParseResult<ActionResultTag> {
  return getDefaultTagRegistry().safeParseAs(value, actionResultTagKind)
}

export const actionResultTagSchema = tagSchema(ACTION_RESULT_TAG_KIND, safeParseActionResultTag)
