import type { Logger } from "./logger"
import type { ParseResult } from "./parse-result"
import type { Tag } from "./tag"
import type { TagKind } from "./tag-kind"

/**
 * Dispatches `<kind>-<body>` strings to the codec registered for `<kind>`.
 */
export interface TagRegistry {
  /**
   * Parse any registered tag.
   * @throws InvalidTagError if the kind is unknown or the body is invalid
   */
  parse(value: string): Tag

  safeParse(value: string): ParseResult

  /**
   * Parse a tag and check that it is of the given kind.
   * @throws InvalidTagError naming `kind.kind` on any failure
   */
  parseAs<T extends Tag>(value: string, kind: TagKind<T>): T

  safeParseAs<T extends Tag>(value: string, kind: TagKind<T>): ParseResult<T>

  /** Registered kind names, in registration order */
  kinds(): string[]
}

export type TagRegistryOptions = Readonly<{
  /** Codecs to dispatch to. Kind names must be unique. */
  kinds: readonly TagKind[]

  /**
   * Receives `trace` entries for parsed tags and `debug` entries for rejected ones.
   * @default NullLogger
   */
  logger?: Logger
}>
