// agent/perception/sandwich/analyzer.ts

import {
  AttackCluster,
  AttackEfficiency,
  AttackPatternReport,
  SandwichAttack,
  SandwichStatistics,
  SophisticatedAttacker,
  SwapEvent,
} from "./types"
import { SandwichDetector } from "./sandwichDetector"
import { analyzeAttackPatterns, analyzeAttacks, calculateAttackEfficiency } from "./sandwichAnalyzer"
import { identifySophisticatedAttackers } from "./attackerProfiler"
import { detectAttackClusters } from "./clusterDetector"
import { Wad } from "../../core/wad"

/** Stateless facade over the attack aggregations. */
export class SandwichAnalyzer {
  analyzeAttacks(attacks: readonly SandwichAttack[]): SandwichStatistics {
    return analyzeAttacks(attacks)
  }

  analyzeAttackPatterns(attacks: readonly SandwichAttack[]): AttackPatternReport {
    return analyzeAttackPatterns(attacks)
  }

  calculateAttackEfficiency(attack: SandwichAttack): AttackEfficiency {
    return calculateAttackEfficiency(attack)
  }

  identifySophisticatedAttackers(
    attacks: readonly SandwichAttack[],
    minAttacks?: number,
    minTotalProfit?: Wad
  ): SophisticatedAttacker[] {
    return identifySophisticatedAttackers(attacks, minAttacks, minTotalProfit)
  }

  detectAttackClusters(attacks: readonly SandwichAttack[], blockWindow?: number): AttackCluster[] {
    return detectAttackClusters(attacks, blockWindow)
  }
}

export interface SwapRange {
  fromBlock: number
  toBlock: number
}

export interface SandwichReport {
  attacks: SandwichAttack[]
  statistics: SandwichStatistics
  patterns: AttackPatternReport
  sophisticatedAttackers: SophisticatedAttacker[]
  clusters: AttackCluster[]
}

export function blockRangeOf(swaps: readonly SwapEvent[]): SwapRange | null {
  if (swaps.length === 0) return null
  let fromBlock = swaps[0].blockNumber
  let toBlock = fromBlock
  for (const swap of swaps) {
    if (swap.blockNumber < fromBlock) fromBlock = swap.blockNumber
    if (swap.blockNumber > toBlock) toBlock = swap.blockNumber
  }
  return { fromBlock, toBlock }
}

export function detectSandwiches(
  detector: SandwichDetector,
  swaps: readonly SwapEvent[],
  range: SwapRange | null = blockRangeOf(swaps)
): SandwichAttack[] {
  if (!range) return []
  return detector.detectInRange(range.fromBlock, range.toBlock, swaps)
}

export function analyzeSwaps(
  detector: SandwichDetector,
  swaps: readonly SwapEvent[],
  range: SwapRange | null = blockRangeOf(swaps)
): SandwichReport {
  // 1. Detect per block
  const attacks = detectSandwiches(detector, swaps, range)

  // 2. Aggregate
  const analyzer = new SandwichAnalyzer()

  return {
    attacks,
    statistics: analyzer.analyzeAttacks(attacks),
    patterns: analyzer.analyzeAttackPatterns(attacks),
    sophisticatedAttackers: analyzer.identifySophisticatedAttackers(attacks),
    clusters: analyzer.detectAttackClusters(attacks),
  }
}
