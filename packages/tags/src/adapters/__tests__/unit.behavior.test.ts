import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { isValidUnit, unitNumber, unitService, unitTagBodyToId } from "../unit/unit-name"
import {
  newUnitTag,
  parseUnitTag,
  safeParseUnitTag,
  unitOwner,
  unitTagKind,
  unitTagSchema,
} from "../unit/unit-tag"

describe("isValidUnit", () => {
  it.each([
    ["mysql/0", true],
    ["mysql-db/12", true],
    ["a1-b2/3", true],
    ["mysql/01", false],
    ["mysql", false],
    ["mysql/", false],
    ["Mysql/0", false],
    ["mysql-1/0", false],
    ["mysql/0/1", false],
  ])("%j -> %s", (name, expected) => {
    expect(isValidUnit(name)).toBe(expected)
  })

  it("bounds the unit number to the safe integer range", () => {
    expect(isValidUnit("mysql/9007199254740991")).toBe(true)
    expect(isValidUnit("mysql/9007199254740992")).toBe(false)
  })
})

describe("unitService", () => {
  it("returns the service part", () => {
    expect(unitService("mysql-db/3")).toBe("mysql-db")
  })

  it("throws for an invalid unit name", () => {
    expect(() => unitService("mysql")).toThrow(InvalidTagIdError)
  })
})

describe("unitNumber", () => {
  it("returns the number part", () => {
    expect(unitNumber("mysql-db/12")).toBe(12)
  })

  it("throws for an invalid unit name", () => {
    expect(() => unitNumber("mysql/01")).toThrow('"mysql/01" is not a valid unit name')
  })
})

describe("unitTagBodyToId", () => {
  it("turns the last hyphen into a slash", () => {
    expect(unitTagBodyToId("foo-bar-1")).toBe("foo-bar/1")
  })

  it("leaves a body without an inner hyphen alone", () => {
    expect(unitTagBodyToId("foo")).toBe("foo")
    expect(unitTagBodyToId("-1")).toBe("-1")
  })
})

describe("UnitTag", () => {
  it("renders slashes as hyphens", () => {
    expect(newUnitTag("mysql-db/3").toString()).toBe("unit-mysql-db-3")
  })

  it("exposes its service and number", () => {
    const tag = newUnitTag("mysql-db/3")

    expect(tag.serviceName).toBe("mysql-db")
    expect(tag.number).toBe(3)
  })

  it("keeps the largest safe unit number exact", () => {
    expect(newUnitTag("mysql/9007199254740991").number).toBe(Number.MAX_SAFE_INTEGER)
  })

  it("throws for an invalid name", () => {
    expect(() => newUnitTag("mysql-db")).toThrow('"mysql-db" is not a valid unit name')
    expect(() => newUnitTag("mysql/9007199254740993")).toThrow(InvalidTagIdError)
  })
})

describe("parseUnitTag", () => {
  it("restores the unit id from the envelope", () => {
    expect(parseUnitTag("unit-foo-bar-1").id).toBe("foo-bar/1")
  })

  it("rejects a unit tag without a number", () => {
    const result = safeParseUnitTag("unit-foo")

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.message).toBe('"unit-foo" is not a valid unit tag')
  })

  it("accepts the slash spelling", () => {
    expect(safeParseUnitTag("unit-foo/1").success).toBe(true)
  })
})

describe("unitTagKind", () => {
  it("recognises unit tags", () => {
    expect(unitTagKind.is(newUnitTag("foo/1"))).toBe(true)
    expect(unitTagKind.is("unit-foo-1")).toBe(false)
  })
})

describe("unitOwner", () => {
  it("matches unit names", () => {
    expect(unitOwner.matches("foo/1")).toBe(true)
    expect(unitOwner.matches("foo")).toBe(false)
    expect(unitOwner.toTag("foo/1")).toEqual(newUnitTag("foo/1"))
  })
})

describe("unitTagSchema", () => {
  it("outputs the parsed tag", () => {
    expect(unitTagSchema.parse("unit-foo-2").number).toBe(2)
  })
})
