import type { Tag } from "../../ports/tag"

export function tagsEqual(a: Tag, b: Tag): boolean {
  return a.kind === b.kind && a.id === b.id
}
