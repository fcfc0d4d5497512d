// agent/perception/sandwich/sandwichDetector.ts

import { randomUUID } from "crypto"
import {
  SandwichAttack,
  SandwichCandidate,
  SandwichRole,
  SandwichTransaction,
  SandwichType,
  SwapEvent,
} from "./types"
import {
  calculatePriceMovement,
  groupByPool,
  normalizeTokenPair,
  sortByBlockPosition,
} from "./ordering"
import { couldBeSandwichPair, estimateSandwichProfit, isPotentialVictim } from "./pairing"
import { Wad, ZERO, minWad, sumWad, toWad, wadFromInt } from "../../core/wad"

export interface CandidateErrorContext {
  poolAddress: string
  frontrunTx: string
  backrunTx: string
}

export interface SandwichDetectorConfig {
  minPriceImpact: Wad // percent
  minProfitThreshold: Wad // intermediate-token units
  maxBlockDistance: number
  confidenceThreshold: Wad
  // Called when building a candidate throws; the candidate is dropped either way
  onCandidateError?: (error: unknown, context: CandidateErrorContext) => void
}

export const DEFAULT_DETECTOR_CONFIG: Readonly<SandwichDetectorConfig> = {
  minPriceImpact: toWad("1.0"),
  minProfitThreshold: toWad("0.01"),
  maxBlockDistance: 1,
  confidenceThreshold: toWad("0.7"),
}

const CONFIDENCE = {
  BASE: toWad("0.5"),
  MULTI_VICTIM: toWad("0.1"),
  PRICE_IMPACT: toWad("0.2"),
  LARGE_PROFIT: toWad("0.1"),
  SAME_BLOCK: toWad("0.1"),
  MAX: toWad("1.0"),
} as const

const MIN_SANDWICH_LEGS = 3

interface PairWindow {
  frontrunIndex: number
  victimIndices: number[]
  backrunIndex: number
}

/**
 * Finds frontrun / victim / backrun triples in decoded swap sequences.
 *
 * Thresholds are fixed for the lifetime of an instance and are not range
 * checked: a confidence threshold above 1 simply rejects everything.
 * Per pool the search is an exhaustive O(n^3) scan over index windows
 * i < k < j, and overlapping windows can yield overlapping attacks.
 * Callers bound the cost by capping swaps per block.
 */
export class SandwichDetector {
  readonly config: Readonly<SandwichDetectorConfig>

  constructor(config: Partial<SandwichDetectorConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_DETECTOR_CONFIG, ...config })
  }

  detectInBlock(blockNumber: number, swaps: readonly SwapEvent[]): SandwichAttack[] {
    if (swaps.length < MIN_SANDWICH_LEGS) return []

    const attacks: SandwichAttack[] = []
    const pools = groupByPool(sortByBlockPosition(swaps))

    for (const [poolAddress, poolSwaps] of pools) {
      if (poolSwaps.length < MIN_SANDWICH_LEGS) continue
      for (const attack of this.detectInPool(poolAddress, poolSwaps)) attacks.push(attack)
    }

    return attacks
  }

  detectInRange(
    fromBlock: number,
    toBlock: number,
    swaps: readonly SwapEvent[]
  ): SandwichAttack[] {
    const byBlock = new Map<number, SwapEvent[]>()
    for (const swap of swaps) {
      if (swap.blockNumber < fromBlock || swap.blockNumber > toBlock) continue
      const list = byBlock.get(swap.blockNumber) || []
      list.push(swap)
      byBlock.set(swap.blockNumber, list)
    }

    const attacks: SandwichAttack[] = []
    const blocks = [...byBlock.keys()].sort((a, b) => a - b)
    for (const blockNumber of blocks) {
      const blockSwaps = byBlock.get(blockNumber) || []
      for (const attack of this.detectInBlock(blockNumber, blockSwaps)) attacks.push(attack)
    }
    return attacks
  }

  /**
   * Every frontrun/backrun window with at least one victim, before the
   * profit and confidence filters are applied.
   */
  findCandidates(swaps: readonly SwapEvent[]): SandwichCandidate[] {
    const candidates: SandwichCandidate[] = []
    const pools = groupByPool(sortByBlockPosition(swaps))

    for (const [poolAddress, poolSwaps] of pools) {
      for (const window of this.scanPairs(poolSwaps)) {
        const frontrun = poolSwaps[window.frontrunIndex]
        const backrun = poolSwaps[window.backrunIndex]
        const victims = window.victimIndices.map((k) => poolSwaps[k])
        const transactions = poolSwaps.slice(window.frontrunIndex, window.backrunIndex + 1)

        try {
          candidates.push({
            blockNumber: frontrun.blockNumber,
            poolAddress,
            tokenPair: normalizeTokenPair(frontrun),
            transactions,
            priceMovements: calculatePriceMovement(transactions),
            potentialFrontrunIndices: [window.frontrunIndex],
            potentialVictimIndices: window.victimIndices,
            potentialBackrunIndices: [window.backrunIndex],
            confidenceScore: this.scoreConfidence(frontrun, victims, backrun),
          })
        } catch (error) {
          // Malformed window: reported and skipped, like in detection
          this.config.onCandidateError?.(error, {
            poolAddress,
            frontrunTx: frontrun.txHash,
            backrunTx: backrun.txHash,
          })
        }
      }
    }

    return candidates
  }

  /**
   * Builds the attack record for one window, or null when it is not
   * profitable enough or its inputs are malformed.
   */
  tryBuildAttack(
    poolAddress: string,
    frontrun: SwapEvent,
    victims: readonly SwapEvent[],
    backrun: SwapEvent
  ): SandwichAttack | null {
    try {
      const profit = estimateSandwichProfit(frontrun, backrun)
      if (profit < this.config.minProfitThreshold) return null

      const atomic = frontrun.blockNumber === backrun.blockNumber
      let sandwichType: SandwichType = atomic ? SandwichType.ATOMIC : SandwichType.FRONT_BACK
      if (victims.length > 1) sandwichType = SandwichType.MULTI_VICTIM

      // Gas units, summed into the profit domain as-is
      const gasCost = wadFromInt((frontrun.gasUsed ?? 0) + (backrun.gasUsed ?? 0))

      return {
        attackId: randomUUID(),
        sandwichType,
        blockNumber: frontrun.blockNumber,
        blockTimestamp: frontrun.timestamp ?? new Date(),
        poolAddress,
        tokenPair: normalizeTokenPair(frontrun),
        frontrunTxs: [toSandwichTx(frontrun, "frontrun")],
        victimTxs: victims.map((v) => toSandwichTx(v, "victim")),
        backrunTxs: [toSandwichTx(backrun, "backrun")],
        attackerAddress: frontrun.trader,
        profitAmount: profit,
        profitToken: frontrun.tokenOut.address,
        victimLossAmount: sumWad(victims.map((v) => v.priceImpact ?? ZERO)),
        gasCost,
        netProfit: profit - gasCost,
        detectionConfidence: this.scoreConfidence(frontrun, victims, backrun),
        priceManipulationPct: (frontrun.priceImpact ?? ZERO) + (backrun.priceImpact ?? ZERO),
        totalVolumeManipulated: frontrun.amountIn + backrun.amountIn,
      }
    } catch (error) {
      this.config.onCandidateError?.(error, {
        poolAddress,
        frontrunTx: frontrun.txHash,
        backrunTx: backrun.txHash,
      })
      return null
    }
  }

  /**
   * Heuristic weighted sum, not a calibrated probability:
   * 0.5 base, +0.1 multiple victims, +0.2 combined leg impact above
   * minPriceImpact, +0.1 profit above 10x minProfitThreshold,
   * +0.1 both legs in one block. Capped at 1.0.
   */
  scoreConfidence(
    frontrun: SwapEvent,
    victims: readonly SwapEvent[],
    backrun: SwapEvent
  ): Wad {
    let score = CONFIDENCE.BASE

    if (victims.length > 1) score += CONFIDENCE.MULTI_VICTIM

    const totalImpact = (frontrun.priceImpact ?? ZERO) + (backrun.priceImpact ?? ZERO)
    if (totalImpact > this.config.minPriceImpact) score += CONFIDENCE.PRICE_IMPACT

    const profit = estimateSandwichProfit(frontrun, backrun)
    if (profit > this.config.minProfitThreshold * 10n) score += CONFIDENCE.LARGE_PROFIT

    if (frontrun.blockNumber === backrun.blockNumber) score += CONFIDENCE.SAME_BLOCK

    return minWad(score, CONFIDENCE.MAX)
  }

  private detectInPool(poolAddress: string, swaps: SwapEvent[]): SandwichAttack[] {
    const attacks: SandwichAttack[] = []

    for (const window of this.scanPairs(swaps)) {
      const attack = this.tryBuildAttack(
        poolAddress,
        swaps[window.frontrunIndex],
        window.victimIndices.map((k) => swaps[k]),
        swaps[window.backrunIndex]
      )
      if (attack && attack.detectionConfidence >= this.config.confidenceThreshold) {
        attacks.push(attack)
      }
    }

    return attacks
  }

  // All (i, j) pairs are tested; no pruning once a pair is accepted
  private scanPairs(swaps: SwapEvent[]): PairWindow[] {
    const windows: PairWindow[] = []
    if (swaps.length < MIN_SANDWICH_LEGS) return windows

    for (let i = 0; i < swaps.length - 2; i++) {
      for (let j = i + 2; j < swaps.length; j++) {
        const frontrun = swaps[i]
        const backrun = swaps[j]
        if (!couldBeSandwichPair(frontrun, backrun, this.config.maxBlockDistance)) continue

        const victimIndices: number[] = []
        for (let k = i + 1; k < j; k++) {
          if (isPotentialVictim(frontrun, swaps[k], backrun)) victimIndices.push(k)
        }

        if (victimIndices.length > 0) {
          windows.push({ frontrunIndex: i, victimIndices, backrunIndex: j })
        }
      }
    }

    return windows
  }
}

function toSandwichTx(swap: SwapEvent, role: SandwichRole): SandwichTransaction {
  return {
    swapEvent: swap,
    role,
    priceBefore: ZERO,
    priceAfter: ZERO,
    priceImpact: swap.priceImpact ?? ZERO,
  }
}
