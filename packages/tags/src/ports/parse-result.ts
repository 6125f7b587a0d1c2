import type { InvalidTagError } from "../core/errors/tag-errors"
import type { Tag } from "./tag"

export type ParsedTag<T extends Tag> = {
  readonly success: true
  readonly tag: T
}

export type RejectedTag = {
  readonly success: false
  readonly error: InvalidTagError
}

export type ParseResult<T extends Tag = Tag> = ParsedTag<T> | RejectedTag
