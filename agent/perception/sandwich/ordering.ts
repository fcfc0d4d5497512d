// agent/perception/sandwich/ordering.ts

import { SwapEvent, TokenPair } from "./types"
import { Wad, ZERO, absWad, divWad, mulWad, wadFromInt } from "../../core/wad"

const HUNDRED = wadFromInt(100)

export function sortByBlockPosition(swaps: readonly SwapEvent[]): SwapEvent[] {
  // Array.prototype.sort is stable, so equal (block, logIndex) keys keep input order
  return [...swaps].sort(
    (a, b) => a.blockNumber - b.blockNumber || a.logIndex - b.logIndex
  )
}

export function groupByPool(swaps: readonly SwapEvent[]): Map<string, SwapEvent[]> {
  const byPool = new Map<string, SwapEvent[]>()
  for (const swap of swaps) {
    const key = swap.poolAddress.toLowerCase()
    const list = byPool.get(key) || []
    list.push(swap)
    byPool.set(key, list)
  }
  return byPool
}

/** Lower-cased (tokenIn, tokenOut) sorted so both trade directions share a key. */
export function normalizeTokenPair(swap: SwapEvent): TokenPair {
  const tokenIn = swap.tokenIn.address.toLowerCase()
  const tokenOut = swap.tokenOut.address.toLowerCase()
  return tokenIn < tokenOut ? [tokenIn, tokenOut] : [tokenOut, tokenIn]
}

export function tokenPairKey(pair: TokenPair): string {
  return `${pair[0]}:${pair[1]}`
}

export function isSameTokenPair(a: SwapEvent, b: SwapEvent): boolean {
  return tokenPairKey(normalizeTokenPair(a)) === tokenPairKey(normalizeTokenPair(b))
}

export function groupByTokenPair(swaps: readonly SwapEvent[]): Map<string, SwapEvent[]> {
  const byPair = new Map<string, SwapEvent[]>()
  for (const swap of swaps) {
    const key = tokenPairKey(normalizeTokenPair(swap))
    const list = byPair.get(key) || []
    list.push(swap)
    byPair.set(key, list)
  }
  return byPair
}

/**
 * Percent price impact of a swap against constant-product reserves
 * taken before the swap executed.
 */
export function calculatePriceImpact(
  swap: SwapEvent,
  reservesBefore: readonly [Wad, Wad]
): Wad {
  if (swap.amountIn === ZERO || swap.amountOut === ZERO) return ZERO

  const [reserveIn, reserveOut] = reservesBefore
  const priceBefore = reserveIn > ZERO ? divWad(reserveOut, reserveIn) : ZERO

  const newReserveIn = reserveIn + swap.amountIn
  const newReserveOut = reserveOut - swap.amountOut
  const priceAfter = newReserveIn > ZERO ? divWad(newReserveOut, newReserveIn) : ZERO

  if (priceBefore <= ZERO) return ZERO
  return mulWad(absWad(divWad(priceAfter - priceBefore, priceBefore)), HUNDRED)
}

// Percent change between successive execution prices (amountOut / amountIn)
export function calculatePriceMovement(swaps: readonly SwapEvent[]): Wad[] {
  if (swaps.length < 2) return []

  const prices = swaps
    .filter((s) => s.amountIn > ZERO)
    .map((s) => divWad(s.amountOut, s.amountIn))

  const movements: Wad[] = []
  for (let i = 1; i < prices.length; i++) {
    const prev = prices[i - 1]
    if (prev > ZERO) {
      movements.push(mulWad(divWad(prices[i] - prev, prev), HUNDRED))
    }
  }
  return movements
}

/** Traders appearing at least minFrequency times; frequent swappers are likely bots. */
export function detectPotentialMevAddresses(
  swaps: readonly SwapEvent[],
  minFrequency: number = 3
): Set<string> {
  const counts = new Map<string, number>()
  for (const swap of swaps) {
    const trader = swap.trader.toLowerCase()
    counts.set(trader, (counts.get(trader) || 0) + 1)
  }

  const result = new Set<string>()
  for (const [trader, count] of counts) {
    if (count >= minFrequency) result.add(trader)
  }
  return result
}
