import { joinId, splitId } from "../split-id"

describe("splitId", () => {
  it("splits prefix and sequence on the marker", () => {
    expect(splitId("mysql/0_a_12", "_a_")).toEqual({
      ok: true,
      prefix: "mysql/0",
      sequence: 12,
    })
  })

  it("accepts a sequence of exactly 0", () => {
    expect(splitId("p_a_0", "_a_")).toEqual({ ok: true, prefix: "p", sequence: 0 })
  })

  it("keeps an empty prefix for the caller to reject", () => {
    expect(splitId("_a_5", "_a_")).toEqual({ ok: true, prefix: "", sequence: 5 })
  })

  describe("marker count", () => {
    it("fails when the marker is missing", () => {
      expect(splitId("nomarkerhere", "_a_")).toEqual({ ok: false })
    })

    it("fails when the marker occurs twice", () => {
      expect(splitId("a_a_b_a_1", "_a_")).toEqual({ ok: false })
    })

    it("fails on an empty marker", () => {
      expect(splitId("p_a_1", "")).toEqual({ ok: false })
    })
  })

  describe("sequence format", () => {
    it.each(["01", "00", "", "+5", "-5", "1.5", " 5", "5 ", "1e3", "0x1f", "five"])(
      "rejects %j",
      (suffix) => {
        expect(splitId(`p_a_${suffix}`, "_a_").ok).toBe(false)
      },
    )

    it("accepts the largest safe integer", () => {
      expect(splitId("p_a_9007199254740991", "_a_")).toEqual({
        ok: true,
        prefix: "p",
        sequence: Number.MAX_SAFE_INTEGER,
      })
    })

    it("rejects values past the safe integer range", () => {
      expect(splitId("p_a_9007199254740992", "_a_").ok).toBe(false)
    })
  })
})

describe("joinId", () => {
  it("renders the sequence in plain decimal", () => {
    expect(joinId("mysql/0", "_ar_", 40)).toBe("mysql/0_ar_40")
  })

  it("round-trips through splitId", () => {
    for (const [prefix, sequence] of [
      ["mysql/0", 0],
      ["wordpress", 7],
      ["mysql-db/12", 123456],
    ] as const) {
      expect(splitId(joinId(prefix, "_a_", sequence), "_a_")).toEqual({
        ok: true,
        prefix,
        sequence,
      })
    }
  })

  it("produces an id that does not split for a negative sequence", () => {
    expect(splitId(joinId("mysql/0", "_a_", -1), "_a_").ok).toBe(false)
  })
})
