// agent/perception/sandwich/attackerProfiler.ts

import { SandwichAttack, SandwichType, SophisticatedAttacker } from "./types"
import { calculateAttackEfficiency } from "./sandwichAnalyzer"
import { Wad, ZERO, compareWadDesc, divWad, sumWad, toWad, wadFromInt } from "../../core/wad"

interface AttackerAccumulator {
  attacks: SandwichAttack[]
  totalProfit: Wad
  totalGas: Wad
  victimCount: number
  pools: Set<string>
  attackTypes: Partial<Record<SandwichType, number>>
}

export const DEFAULT_MIN_ATTACKS = 5
export const DEFAULT_MIN_TOTAL_PROFIT = toWad("1.0")

/**
 * Repeat attackers that clear both thresholds, richest first.
 * Addresses are lower-cased before grouping.
 */
export function identifySophisticatedAttackers(
  attacks: readonly SandwichAttack[],
  minAttacks: number = DEFAULT_MIN_ATTACKS,
  minTotalProfit: Wad = DEFAULT_MIN_TOTAL_PROFIT
): SophisticatedAttacker[] {
  const map = new Map<string, AttackerAccumulator>()

  for (const attack of attacks) {
    const addr = attack.attackerAddress.toLowerCase()
    const existing = map.get(addr) ?? {
      attacks: [],
      totalProfit: ZERO,
      totalGas: ZERO,
      victimCount: 0,
      pools: new Set<string>(),
      attackTypes: {},
    }

    existing.attacks.push(attack)
    existing.totalProfit += attack.profitAmount
    existing.totalGas += attack.gasCost
    existing.victimCount += attack.victimTxs.length
    existing.pools.add(attack.poolAddress)
    existing.attackTypes[attack.sandwichType] = (existing.attackTypes[attack.sandwichType] ?? 0) + 1
    map.set(addr, existing)
  }

  const profiles: SophisticatedAttacker[] = []
  for (const [address, acc] of map) {
    if (acc.attacks.length < minAttacks || acc.totalProfit < minTotalProfit) continue

    const count = wadFromInt(acc.attacks.length)
    const efficiencySum = sumWad(acc.attacks.map((a) => calculateAttackEfficiency(a).profitPerGas))

    profiles.push({
      address,
      attackCount: acc.attacks.length,
      totalProfit: acc.totalProfit,
      averageProfit: divWad(acc.totalProfit, count),
      poolsTargeted: acc.pools.size,
      totalVictims: acc.victimCount,
      attackTypes: acc.attackTypes,
      averageEfficiency: divWad(efficiencySum, count),
      totalGasSpent: acc.totalGas,
    })
  }

  return profiles.sort((a, b) => compareWadDesc(a.totalProfit, b.totalProfit))
}
