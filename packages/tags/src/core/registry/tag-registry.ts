import { NullLogger } from "../../adapters/null/null-logger"
import type { Logger } from "../../ports/logger"
import type { ParseResult, RejectedTag } from "../../ports/parse-result"
import type { Tag } from "../../ports/tag"
import type { TagKind } from "../../ports/tag-kind"
import type { TagRegistry, TagRegistryOptions } from "../../ports/tag-registry"
import { splitEnvelope } from "../envelope"
import { DuplicateTagKindError, InvalidTagError } from "../errors/tag-errors"

type Dispatched = { readonly tag: Tag } | { readonly tag?: undefined; readonly kind?: string }

class KindTagRegistry implements TagRegistry {
  private readonly byKind: ReadonlyMap<string, TagKind>
  private readonly logger: Logger

  constructor(kinds: readonly TagKind[], logger: Logger) {
    const byKind = new Map<string, TagKind>()
    for (const k of kinds) {
      if (byKind.has(k.kind)) throw new DuplicateTagKindError(k.kind)
      byKind.set(k.kind, k)
    }

    this.byKind = byKind
    this.logger = logger.child({ module: "tag-registry" })
  }

  parse(value: string): Tag {
    const result = this.safeParse(value)
    if (!result.success) throw result.error
    return result.tag
  }

  safeParse(value: string): ParseResult {
    const dispatched = this.dispatch(value)
    if (!dispatched.tag) {
      return this.reject(value, new InvalidTagError(value, dispatched.kind))
    }

    return this.accept(value, dispatched.tag)
  }

  parseAs<T extends Tag>(value: string, kind: TagKind<T>): T {
    const result = this.safeParseAs(value, kind)
    if (!result.success) throw result.error
    return result.tag
  }

  safeParseAs<T extends Tag>(value: string, kind: TagKind<T>): ParseResult<T> {
    const dispatched = this.dispatch(value)

    if (!dispatched.tag) {
      const cause =
        dispatched.kind === kind.kind ? undefined : new InvalidTagError(value, dispatched.kind)
      return this.reject(value, new InvalidTagError(value, kind.kind, { cause }))
    }

    const { tag } = dispatched
    if (!kind.is(tag)) {
      return this.reject(value, new InvalidTagError(value, kind.kind))
    }

    return this.accept(value, tag)
  }

  kinds(): string[] {
    return [...this.byKind.keys()]
  }

  /**
   * Route the body to the codec named by the envelope. A failed dispatch
   * carries the kind only when the envelope named a registered one.
   */
  private dispatch(value: string): Dispatched {
    const envelope = splitEnvelope(value)
    if (!envelope) return {}

    const codec = this.byKind.get(envelope.kind)
    if (!codec) return {}

    const tag = codec.fromBody(envelope.body)
    return tag ? { tag } : { kind: codec.kind }
  }

  private accept<T extends Tag>(value: string, tag: T): ParseResult<T> {
    this.logger.trace("tag parsed", { tag: value, kind: tag.kind })

    return { success: true, tag }
  }

  private reject(value: string, error: InvalidTagError): RejectedTag {
    this.logger.debug("tag rejected", { tag: value, err: error })

    return { success: false, error }
  }
}

export function createTagRegistry(options: TagRegistryOptions): TagRegistry {
  return new KindTagRegistry(options.kinds, options.logger ?? new NullLogger())
}
