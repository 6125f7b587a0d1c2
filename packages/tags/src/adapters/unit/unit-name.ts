import { InvalidTagIdError } from "../../core/errors/tag-errors"
import { SERVICE_SNIPPET } from "../service/service-name"

const NUMBER_SNIPPET = "(?:0|[1-9][0-9]*)"

const VALID_UNIT = new RegExp(`^(${SERVICE_SNIPPET})/(${NUMBER_SNIPPET})$`)

type UnitNameParts = Readonly<{ service: string; number: number }>

function splitUnitName(name: string): UnitNameParts | undefined {
  const match = VALID_UNIT.exec(name)
  const service = match?.[1]
  const digits = match?.[2]
  if (service === undefined || digits === undefined) return undefined

  const number = Number(digits)
  if (!Number.isSafeInteger(number)) return undefined

  return { service, number }
}

/** A service name and a unit number that fits a safe integer, joined by `/` */
export function isValidUnit(name: string): boolean {
  return splitUnitName(name) !== undefined
}

/**
 * Returns the number of a unit within its service.
 * @throws InvalidTagIdError if the name is not a valid unit name
 */
export function unitNumber(unitName: string): number {
  const parts = splitUnitName(unitName)
  if (!parts) throw InvalidTagIdError.forId(unitName, "unit name", "unit")
  return parts.number
}

/**
 * Returns the name of the service a unit belongs to.
 * @throws InvalidTagIdError if the name is not a valid unit name
 */
export function unitService(unitName: string): string {
  const parts = splitUnitName(unitName)
  if (!parts) throw InvalidTagIdError.forId(unitName, "unit name", "unit")
  return parts.service
}

/**
 * Unit ids carry a `/` that the tag body spells as `-`. Service names may
 * contain hyphens themselves, so only the last one is turned back.
 */
export function unitTagBodyToId(body: string): string {
  const i = body.lastIndexOf("-")
  if (i <= 0) return body
  return `${body.slice(0, i)}/${body.slice(i + 1)}`
}
