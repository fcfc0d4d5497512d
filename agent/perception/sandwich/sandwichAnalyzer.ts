// agent/perception/sandwich/sandwichAnalyzer.ts

import {
  AttackEfficiency,
  AttackPatternReport,
  PoolAttackCount,
  SandwichAttack,
  SandwichStatistics,
  SandwichType,
} from "./types"
import { Wad, ZERO, compareWadAsc, compareWadDesc, divWad, sumWad, wadFromInt } from "../../core/wad"

const TOP_N = 10

function average(total: Wad, count: number): Wad {
  return count > 0 ? divWad(total, wadFromInt(count)) : ZERO
}

export function emptyStatistics(): SandwichStatistics {
  return {
    fromBlock: 0,
    toBlock: 0,
    totalAttacks: 0,
    totalProfit: ZERO,
    totalVictimLoss: ZERO,
    averageProfitPerAttack: ZERO,
    mostProfitableAttack: null,
    topAttackers: [],
    mostTargetedPools: [],
  }
}

export function analyzeAttacks(attacks: readonly SandwichAttack[]): SandwichStatistics {
  if (attacks.length === 0) return emptyStatistics()

  const totalProfit = sumWad(attacks.map((a) => a.profitAmount))
  const blocks = attacks.map((a) => a.blockNumber)

  // Strict > keeps the first attack on ties
  let mostProfitable = attacks[0]
  for (const attack of attacks) {
    if (attack.profitAmount > mostProfitable.profitAmount) mostProfitable = attack
  }

  // Keyed by address exactly as given
  const attackerProfits = new Map<string, Wad>()
  const poolCounts = new Map<string, number>()
  for (const attack of attacks) {
    const addr = attack.attackerAddress
    attackerProfits.set(addr, (attackerProfits.get(addr) ?? ZERO) + attack.profitAmount)
    poolCounts.set(attack.poolAddress, (poolCounts.get(attack.poolAddress) ?? 0) + 1)
  }

  const topAttackers = Array.from(attackerProfits, ([address, totalProfit]) => ({
    address,
    totalProfit,
  }))
    .sort((a, b) => compareWadDesc(a.totalProfit, b.totalProfit))
    .slice(0, TOP_N)

  const mostTargetedPools: PoolAttackCount[] = Array.from(
    poolCounts,
    ([poolAddress, attackCount]) => ({ poolAddress, attackCount })
  )
    .sort((a, b) => b.attackCount - a.attackCount)
    .slice(0, TOP_N)

  return {
    fromBlock: blocks.reduce((min, b) => (b < min ? b : min)),
    toBlock: blocks.reduce((max, b) => (b > max ? b : max)),
    totalAttacks: attacks.length,
    totalProfit,
    totalVictimLoss: sumWad(attacks.map((a) => a.victimLossAmount)),
    averageProfitPerAttack: average(totalProfit, attacks.length),
    mostProfitableAttack: mostProfitable,
    topAttackers,
    mostTargetedPools,
  }
}

function emptyPatternReport(): AttackPatternReport {
  return {
    attackTypes: {},
    temporalPatterns: { uniqueBlocks: 0, maxAttacksPerBlock: 0, avgAttacksPerBlock: ZERO },
    profitAnalysis: { minProfit: ZERO, maxProfit: ZERO, avgProfit: ZERO, medianProfit: ZERO },
    gasAnalysis: { avgGasCost: ZERO, totalGasSpent: ZERO },
    tokenPairs: {},
    victimPatterns: {},
  }
}

function shortAddress(address: string): string {
  return `${address.slice(0, 8)}...`
}

export function analyzeAttackPatterns(attacks: readonly SandwichAttack[]): AttackPatternReport {
  if (attacks.length === 0) return emptyPatternReport()

  const attackTypes: Partial<Record<SandwichType, number>> = {}
  const perBlock = new Map<number, number>()
  const pairCounts = new Map<string, number>()
  const victimPatterns: Record<number, number> = {}

  for (const attack of attacks) {
    attackTypes[attack.sandwichType] = (attackTypes[attack.sandwichType] ?? 0) + 1
    perBlock.set(attack.blockNumber, (perBlock.get(attack.blockNumber) ?? 0) + 1)

    const pair = `${shortAddress(attack.tokenPair[0])}/${shortAddress(attack.tokenPair[1])}`
    pairCounts.set(pair, (pairCounts.get(pair) ?? 0) + 1)

    const victims = attack.victimTxs.length
    victimPatterns[victims] = (victimPatterns[victims] ?? 0) + 1
  }

  const attacksPerBlock = [...perBlock.values()]
  const profits = attacks.map((a) => a.profitAmount).sort(compareWadAsc)
  const totalProfit = sumWad(profits)
  const gasCosts = attacks.map((a) => a.gasCost).filter((g) => g > ZERO)
  const totalGas = sumWad(gasCosts)

  const tokenPairs: Record<string, number> = {}
  for (const [pair, count] of [...pairCounts].sort((a, b) => b[1] - a[1]).slice(0, TOP_N)) {
    tokenPairs[pair] = count
  }

  return {
    attackTypes,
    temporalPatterns: {
      uniqueBlocks: perBlock.size,
      maxAttacksPerBlock: attacksPerBlock.reduce((max, n) => (n > max ? n : max)),
      avgAttacksPerBlock: average(wadFromInt(attacks.length), attacksPerBlock.length),
    },
    profitAnalysis: {
      minProfit: profits[0],
      maxProfit: profits[profits.length - 1],
      avgProfit: average(totalProfit, profits.length),
      // Middle index, no interpolation for even counts
      medianProfit: profits[Math.floor(profits.length / 2)],
    },
    gasAnalysis: {
      avgGasCost: average(totalGas, gasCosts.length),
      totalGasSpent: totalGas,
    },
    tokenPairs,
    victimPatterns,
  }
}

export function calculateAttackEfficiency(attack: SandwichAttack): AttackEfficiency {
  const profit = attack.profitAmount
  return {
    profitPerGas: attack.gasCost > ZERO ? divWad(profit, attack.gasCost) : ZERO,
    profitPerVictim: average(profit, attack.victimTxs.length),
    profitPerPriceImpact:
      attack.priceManipulationPct > ZERO ? divWad(profit, attack.priceManipulationPct) : ZERO,
    profitPerVolume:
      attack.totalVolumeManipulated > ZERO
        ? divWad(profit, attack.totalVolumeManipulated)
        : ZERO,
  }
}
