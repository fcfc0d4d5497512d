// agent/api/swapPayload.ts
//
// Request bodies arrive as JSON: amounts are decimal strings, timestamps are
// ISO strings or unix seconds.

import { isAddress } from "viem"
import { SwapEvent, TokenInfo } from "../perception/sandwich/types"
import { SwapRange, blockRangeOf } from "../perception/sandwich/analyzer"
import { Wad, WadParseError, toWad } from "../core/wad"

export class SwapPayloadError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`${path}: ${message}`)
    this.name = "SwapPayloadError"
  }
}

export interface DetectRequest {
  swaps: SwapEvent[]
  range: SwapRange | null
}

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function readString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key]
  if (typeof value !== "string" || value.length === 0) {
    throw new SwapPayloadError(`${path}.${key}`, "expected a non-empty string")
  }
  return value
}

function readInt(obj: JsonObject, key: string, path: string): number {
  const value = obj[key]
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new SwapPayloadError(`${path}.${key}`, "expected a non-negative integer")
  }
  return value
}

function readAddress(obj: JsonObject, key: string, path: string): string {
  const value = readString(obj, key, path)
  if (!isAddress(value, { strict: false })) {
    throw new SwapPayloadError(`${path}.${key}`, "expected a 0x-prefixed 20-byte address")
  }
  return value
}

function readWad(obj: JsonObject, key: string, path: string): Wad {
  const value = readString(obj, key, path)
  try {
    return toWad(value)
  } catch (err) {
    if (err instanceof WadParseError) {
      throw new SwapPayloadError(`${path}.${key}`, "expected a decimal string")
    }
    throw err
  }
}

function readTimestamp(value: unknown, path: string): Date {
  const date =
    typeof value === "number"
      ? new Date(value * 1000)
      : typeof value === "string"
        ? new Date(value)
        : null
  if (!date || Number.isNaN(date.getTime())) {
    throw new SwapPayloadError(path, "expected an ISO date string or unix seconds")
  }
  return date
}

function parseToken(value: unknown, path: string): TokenInfo {
  if (!isObject(value)) throw new SwapPayloadError(path, "expected a token object")
  const token: TokenInfo = {
    address: readAddress(value, "address", path),
    symbol: readString(value, "symbol", path),
    decimals: readInt(value, "decimals", path),
  }
  if (value.name !== undefined) token.name = readString(value, "name", path)
  return token
}

export function parseSwap(value: unknown, path: string = "swap"): SwapEvent {
  if (!isObject(value)) throw new SwapPayloadError(path, "expected a swap object")

  const swap: SwapEvent = {
    txHash: readString(value, "txHash", path),
    blockNumber: readInt(value, "blockNumber", path),
    logIndex: readInt(value, "logIndex", path),
    dexProtocol: readString(value, "dexProtocol", path),
    poolAddress: readAddress(value, "poolAddress", path),
    trader: readAddress(value, "trader", path),
    tokenIn: parseToken(value.tokenIn, `${path}.tokenIn`),
    tokenOut: parseToken(value.tokenOut, `${path}.tokenOut`),
    amountIn: readWad(value, "amountIn", path),
    amountOut: readWad(value, "amountOut", path),
  }

  if (value.priceImpact !== undefined) swap.priceImpact = readWad(value, "priceImpact", path)
  if (value.gasUsed !== undefined) swap.gasUsed = readInt(value, "gasUsed", path)
  if (value.timestamp !== undefined) {
    swap.timestamp = readTimestamp(value.timestamp, `${path}.timestamp`)
  }

  return swap
}

/**
 * Parses a detection request body. Blocks holding more than
 * maxSwapsPerBlock swaps are rejected before any detection runs.
 */
export function parseDetectRequest(body: unknown, maxSwapsPerBlock: number): DetectRequest {
  if (!isObject(body)) throw new SwapPayloadError("body", "expected a JSON object")
  if (!Array.isArray(body.swaps)) throw new SwapPayloadError("body.swaps", "expected an array")

  const swaps = body.swaps.map((s: unknown, i: number) => parseSwap(s, `body.swaps[${i}]`))

  const perBlock = new Map<number, number>()
  for (const swap of swaps) {
    const count = (perBlock.get(swap.blockNumber) || 0) + 1
    if (count > maxSwapsPerBlock) {
      throw new SwapPayloadError(
        "body.swaps",
        `block ${swap.blockNumber} has more than ${maxSwapsPerBlock} swaps`
      )
    }
    perBlock.set(swap.blockNumber, count)
  }

  const observed = blockRangeOf(swaps)
  if (!observed) return { swaps, range: null }

  const range: SwapRange = {
    fromBlock: body.fromBlock === undefined ? observed.fromBlock : readInt(body, "fromBlock", "body"),
    toBlock: body.toBlock === undefined ? observed.toBlock : readInt(body, "toBlock", "body"),
  }
  if (range.fromBlock > range.toBlock) {
    throw new SwapPayloadError("body.fromBlock", "must not exceed toBlock")
  }

  return { swaps, range }
}
