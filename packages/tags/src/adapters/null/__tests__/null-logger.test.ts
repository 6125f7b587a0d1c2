import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output", () => {
    const write = vi.spyOn(process.stdout, "write")
    const logger = createNullLogger()

    logger.trace("t", { tag: "unit-mysql-0" })
    logger.debug("d")
    logger.info("i")
    logger.warn("w")
    logger.error("e", { err: new Error("boom") })
    logger.fatal("f")

    expect(write).not.toHaveBeenCalled()
  })

  it("returns a null child", () => {
    expect(createNullLogger().child({ module: "tag-registry" })).toBeInstanceOf(NullLogger)
  })
})
