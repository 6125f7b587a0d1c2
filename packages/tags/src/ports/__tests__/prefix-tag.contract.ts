import type { PrefixTag } from "../tag"

export type PrefixTagFixture<K extends string> = {
  kind: K
  marker: string
  create: (id: string) => PrefixTag<K>
  /** A valid id whose prefix is a unit name */
  unitOwned: { id: string; prefix: string; sequence: number }
  /** A valid id whose prefix is a service name */
  serviceOwned: { id: string; prefix: string; sequence: number }
  invalidIds: readonly string[]
}

export function describePrefixTagContract<K extends string>(
  name: string,
  fixture: PrefixTagFixture<K>,
) {
  describe(`PrefixTag contract: ${name}`, () => {
    const { kind, marker, create, unitOwned, serviceOwned } = fixture

    it("reports its kind", () => {
      expect(create(unitOwned.id).kind).toBe(kind)
    })

    it("keeps the id verbatim", () => {
      expect(create(unitOwned.id).id).toBe(unitOwned.id)
    })

    it("renders <kind>-<id>", () => {
      expect(create(serviceOwned.id).toString()).toBe(`${kind}-${serviceOwned.id}`)
    })

    it("splits a unit-owned id", () => {
      const tag = create(unitOwned.id)

      expect(tag.prefix).toBe(unitOwned.prefix)
      expect(tag.sequence).toBe(unitOwned.sequence)
    })

    it("splits a service-owned id", () => {
      const tag = create(serviceOwned.id)

      expect(tag.prefix).toBe(serviceOwned.prefix)
      expect(tag.sequence).toBe(serviceOwned.sequence)
    })

    it("contains the marker exactly once", () => {
      expect(create(unitOwned.id).id.split(marker)).toHaveLength(2)
    })

    it("resolves a unit owner", () => {
      const owner = create(unitOwned.id).prefixTag()

      expect(owner?.kind).toBe("unit")
      expect(owner?.id).toBe(unitOwned.prefix)
    })

    it("resolves a service owner", () => {
      const owner = create(serviceOwned.id).prefixTag()

      expect(owner?.kind).toBe("service")
      expect(owner?.id).toBe(serviceOwned.prefix)
    })

    it("is immutable", () => {
      expect(Object.isFrozen(create(unitOwned.id))).toBe(true)
    })

    it.each(fixture.invalidIds)("rejects %j", (id) => {
      expect(() => create(id)).toThrow()
    })
  })
}
