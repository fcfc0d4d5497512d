// agent/core/wad.ts
//
// 18-decimal fixed-point amounts. Every token amount, threshold, price impact
// and score in the engine is a Wad so ratios never touch binary floats.

import { formatUnits, parseUnits } from "viem"

export type Wad = bigint

export const WAD_DECIMALS = 18
export const WAD: Wad = 10n ** 18n
export const ZERO: Wad = 0n

const DECIMAL_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)$/

export class WadParseError extends Error {
  constructor(public readonly input: string) {
    super(`Not a decimal number: "${input}"`)
    this.name = "WadParseError"
  }
}

export function toWad(value: string): Wad {
  const trimmed = value.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) throw new WadParseError(value)
  return parseUnits(trimmed, WAD_DECIMALS)
}

/** Lifts an integer count (gas units, swap counts) into the Wad domain. */
export function wadFromInt(n: number | bigint): Wad {
  if (typeof n === "number" && !Number.isInteger(n)) {
    throw new WadParseError(String(n))
  }
  return BigInt(n) * WAD
}

export function formatWad(value: Wad): string {
  return formatUnits(value, WAD_DECIMALS)
}

export function mulWad(a: Wad, b: Wad): Wad {
  return (a * b) / WAD
}

// x / 0 is defined as 0 throughout the analyzer
export function divWad(a: Wad, b: Wad): Wad {
  if (b === 0n) return ZERO
  return (a * WAD) / b
}

export function absWad(a: Wad): Wad {
  return a < 0n ? -a : a
}

export function sumWad(values: Iterable<Wad>): Wad {
  let total = ZERO
  for (const v of values) total += v
  return total
}

export function minWad(a: Wad, b: Wad): Wad {
  return a < b ? a : b
}

export function maxWad(a: Wad, b: Wad): Wad {
  return a > b ? a : b
}

export function compareWadDesc(a: Wad, b: Wad): number {
  if (a === b) return 0
  return a > b ? -1 : 1
}

export function compareWadAsc(a: Wad, b: Wad): number {
  return compareWadDesc(b, a)
}
