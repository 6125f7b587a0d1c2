/** A lowercase word, optionally followed by hyphenated words that are not all digits. */
export const SERVICE_SNIPPET = "(?:[a-z][a-z0-9]*(?:-[a-z0-9]*[a-z][a-z0-9]*)*)"

const VALID_SERVICE = new RegExp(`^${SERVICE_SNIPPET}$`)

export function isValidService(name: string): boolean {
  return VALID_SERVICE.test(name)
}
