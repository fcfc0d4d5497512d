import {
  WadParseError,
  absWad,
  compareWadDesc,
  divWad,
  formatWad,
  mulWad,
  sumWad,
  toWad,
  wadFromInt,
} from "../wad"

describe("wad", () => {
  it("should parse decimal strings at 18 decimals", () => {
    expect(toWad("10.2")).toBe(10_200_000_000_000_000_000n)
    expect(toWad(" -0.5 ")).toBe(-500_000_000_000_000_000n)
    expect(toWad(".25")).toBe(250_000_000_000_000_000n)
  })

  it("should reject text that is not a plain decimal", () => {
    expect(() => toWad("1e5")).toThrow(WadParseError)
    expect(() => toWad("abc")).toThrow('Not a decimal number: "abc"')
    expect(() => toWad("")).toThrow(WadParseError)
  })

  it("should lift integer counts and refuse fractions", () => {
    expect(formatWad(wadFromInt(150_000))).toBe("150000")
    expect(() => wadFromInt(1.5)).toThrow(WadParseError)
  })

  it("should format without trailing zeros", () => {
    expect(formatWad(toWad("30000.0"))).toBe("30000")
    expect(formatWad(toWad("-200"))).toBe("-200")
    expect(formatWad(toWad("0.0005"))).toBe("0.0005")
  })

  it("should multiply and divide in fixed point", () => {
    expect(formatWad(mulWad(toWad("1.5"), toWad("4")))).toBe("6")
    expect(formatWad(divWad(toWad("1"), toWad("8")))).toBe("0.125")
    expect(divWad(toWad("1"), 0n)).toBe(0n)
  })

  it("should sum, take absolute values and sort descending", () => {
    expect(formatWad(sumWad([toWad("1.1"), toWad("2.2")]))).toBe("3.3")
    expect(absWad(toWad("-3"))).toBe(toWad("3"))
    expect([toWad("1"), toWad("3"), toWad("2")].sort(compareWadDesc).map(formatWad)).toEqual([
      "3",
      "2",
      "1",
    ])
  })
})
