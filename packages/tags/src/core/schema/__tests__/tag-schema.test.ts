import { z } from "zod/mini"
import { PinoLogger } from "../../../adapters/pino/pino-logger"
import { newServiceTag, type ServiceTag } from "../../../adapters/service/service-tag"
import { unitTagKind } from "../../../adapters/unit/unit-tag"
import { makeLineDestination } from "../../../tests/utils/line-destination"
import { createTagRegistry } from "../../registry/tag-registry"
import { InvalidTagError } from "../../errors/tag-errors"
import type { ParseResult } from "../../../ports/parse-result"
import { tagSchema } from "../tag-schema"

const safeParse = (value: string): ParseResult<ServiceTag> =>
  value.startsWith("service-")
    ? { success: true, tag: newServiceTag(value.slice("service-".length)) }
    : { success: false, error: new InvalidTagError(value, "service") }

describe("tagSchema", () => {
  const schema = tagSchema("service", safeParse)

  it("outputs the parsed tag", () => {
    expect(schema.parse("service-mysql")).toEqual(newServiceTag("mysql"))
  })

  it("uses the kind in the issue message", () => {
    const result = schema.safeParse("unit-mysql-0")

    expect(result.success).toBe(false)
    expect(result.error?.issues).toHaveLength(1)
    expect(result.error?.issues[0]?.message).toBe("Invalid service tag")
  })

  it("composes into object schemas", () => {
    const body = z.object({ owner: schema, note: z.string() })

    const parsed = body.parse({ owner: "service-wordpress", note: "n" })

    expect(parsed.owner.id).toBe("wordpress")
  })

  it("parses each value once", () => {
    const spy = vi.fn(safeParse)
    const counted = tagSchema("service", spy)

    counted.parse("service-mysql")
    counted.safeParse("unit-mysql-0")

    expect(spy).toHaveBeenCalledTimes(2)
  })

  it("logs one entry per parsed value through a logged registry", () => {
    const { destination, payloads } = makeLineDestination()
    const registry = createTagRegistry({
      kinds: [unitTagKind],
      logger: new PinoLogger({ destination }, { level: "trace" }),
    })
    const unitSchema = tagSchema("unit", (value) => registry.safeParseAs(value, unitTagKind))

    unitSchema.parse("unit-mysql-0")

    expect(payloads()).toHaveLength(1)
    expect(payloads()[0]).toMatchObject({ msg: "tag parsed", tag: "unit-mysql-0" })
  })
})
