// agent/perception/sandwich/pairing.ts

import { SwapEvent } from "./types"
import { isSameTokenPair } from "./ordering"
import { Wad, ZERO } from "../../core/wad"

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

export function isSameDirection(a: SwapEvent, b: SwapEvent): boolean {
  return (
    sameAddress(a.tokenIn.address, b.tokenIn.address) &&
    sameAddress(a.tokenOut.address, b.tokenOut.address)
  )
}

export function isOppositeDirection(a: SwapEvent, b: SwapEvent): boolean {
  return (
    sameAddress(a.tokenIn.address, b.tokenOut.address) &&
    sameAddress(a.tokenOut.address, b.tokenIn.address)
  )
}

export function couldBeSandwichPair(
  frontrun: SwapEvent,
  backrun: SwapEvent,
  maxBlockDistance: number
): boolean {
  if (!sameAddress(frontrun.trader, backrun.trader)) return false
  if (!isOppositeDirection(frontrun, backrun)) return false
  if (!isSameTokenPair(frontrun, backrun)) return false
  return Math.abs(backrun.blockNumber - frontrun.blockNumber) <= maxBlockDistance
}

export function isPotentialVictim(
  frontrun: SwapEvent,
  candidate: SwapEvent,
  backrun: SwapEvent
): boolean {
  // Can't sandwich yourself
  if (sameAddress(candidate.trader, frontrun.trader)) return false
  if (!isSameTokenPair(candidate, frontrun)) return false
  return isSameDirection(candidate, frontrun) || isSameDirection(candidate, backrun)
}

/**
 * Net amount of the intermediate token kept across both legs:
 * frontrun.amountOut - backrun.amountIn. Gas is not deducted here.
 */
export function estimateSandwichProfit(frontrun: SwapEvent, backrun: SwapEvent): Wad {
  if (!isOppositeDirection(frontrun, backrun)) return ZERO
  if (!sameAddress(frontrun.tokenOut.address, backrun.tokenIn.address)) return ZERO
  return frontrun.amountOut - backrun.amountIn
}
