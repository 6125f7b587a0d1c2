import { TagError } from "./tag-error"

const quote = (value: string): string => JSON.stringify(value)

/**
 * A tag string from outside the process is malformed, or is not of the
 * expected kind.
 */
export class InvalidTagError extends TagError<"invalid_tag"> {
  constructor(tag: string, kind?: string, options?: Readonly<{ cause?: unknown }>) {
    const message = kind
      ? `${quote(tag)} is not a valid ${kind} tag`
      : `${quote(tag)} is not a valid tag`

    super(message, {
      code: "invalid_tag",
      context: kind ? { tag, kind } : { tag },
      cause: options?.cause,
      isOperational: true,
    })
  }
}

/**
 * A trusted constructor received an id that is not valid for its kind.
 * Indicates a bug or corrupted data, never a user input problem.
 */
export class InvalidTagIdError extends TagError<"invalid_id"> {
  constructor(message: string, context: Readonly<Record<string, unknown>>) {
    super(message, { code: "invalid_id", context, isOperational: false })
  }

  static forId(id: string, noun: string, kind: string): InvalidTagIdError {
    return new InvalidTagIdError(`${quote(id)} is not a valid ${noun}`, { id, kind })
  }
}

export class DuplicateTagKindError extends TagError<"duplicate_kind"> {
  constructor(kind: string) {
    super(`tag kind ${quote(kind)} is already registered`, {
      code: "duplicate_kind",
      context: { kind },
      isOperational: false,
    })
  }
}
