export type Envelope = Readonly<{
  kind: string
  body: string
}>

/**
 * Split a `<kind>-<body>` string on its first hyphen.
 * The body keeps any further hyphens (`unit-mysql-db-0` → `unit` / `mysql-db-0`).
 */
export function splitEnvelope(value: string): Envelope | undefined {
  const i = value.indexOf("-")
  if (i < 0) return undefined

  return { kind: value.slice(0, i), body: value.slice(i + 1) }
}

export function formatEnvelope(kind: string, body: string): string {
  return `${kind}-${body}`
}
