// agent/api/serialize.ts

import {
  AttackCluster,
  AttackPatternReport,
  SandwichAttack,
  SandwichStatistics,
  SandwichTransaction,
  SophisticatedAttacker,
} from "../perception/sandwich/types"
import { SandwichReport } from "../perception/sandwich/analyzer"
import { Wad, formatWad } from "../core/wad"

// Histograms keyed by sandwich type or victim count
function formatCounts(counts: object): Record<string, number> {
  const out: Record<string, number> = {}
  for (const [key, value] of Object.entries(counts)) {
    if (typeof value === "number") out[key] = value
  }
  return out
}

function serializeLeg(tx: SandwichTransaction) {
  const swap = tx.swapEvent
  return {
    role: tx.role,
    txHash: swap.txHash,
    blockNumber: swap.blockNumber,
    logIndex: swap.logIndex,
    trader: swap.trader,
    tokenIn: swap.tokenIn.address,
    tokenOut: swap.tokenOut.address,
    amountIn: formatWad(swap.amountIn),
    amountOut: formatWad(swap.amountOut),
    priceBefore: formatWad(tx.priceBefore),
    priceAfter: formatWad(tx.priceAfter),
    priceImpact: formatWad(tx.priceImpact),
  }
}

export function serializeAttack(attack: SandwichAttack) {
  return {
    attackId: attack.attackId,
    sandwichType: attack.sandwichType,
    blockNumber: attack.blockNumber,
    blockTimestamp: attack.blockTimestamp.toISOString(),
    poolAddress: attack.poolAddress,
    tokenPair: [...attack.tokenPair],
    frontrunTxs: attack.frontrunTxs.map(serializeLeg),
    victimTxs: attack.victimTxs.map(serializeLeg),
    backrunTxs: attack.backrunTxs.map(serializeLeg),
    attackerAddress: attack.attackerAddress,
    profitAmount: formatWad(attack.profitAmount),
    profitToken: attack.profitToken,
    victimLossAmount: formatWad(attack.victimLossAmount),
    gasCost: formatWad(attack.gasCost),
    netProfit: formatWad(attack.netProfit),
    detectionConfidence: formatWad(attack.detectionConfidence),
    priceManipulationPct: formatWad(attack.priceManipulationPct),
    totalVolumeManipulated: formatWad(attack.totalVolumeManipulated),
  }
}

export type SerializedAttack = ReturnType<typeof serializeAttack>

export function serializeStatistics(stats: SandwichStatistics) {
  return {
    fromBlock: stats.fromBlock,
    toBlock: stats.toBlock,
    totalAttacks: stats.totalAttacks,
    totalProfit: formatWad(stats.totalProfit),
    totalVictimLoss: formatWad(stats.totalVictimLoss),
    averageProfitPerAttack: formatWad(stats.averageProfitPerAttack),
    mostProfitableAttackId: stats.mostProfitableAttack?.attackId ?? null,
    topAttackers: stats.topAttackers.map((a) => ({
      address: a.address,
      totalProfit: formatWad(a.totalProfit),
    })),
    mostTargetedPools: stats.mostTargetedPools,
  }
}

export function serializePatterns(report: AttackPatternReport) {
  const { temporalPatterns, profitAnalysis, gasAnalysis } = report
  const wads = (values: Record<string, Wad>) =>
    Object.fromEntries(Object.entries(values).map(([k, v]) => [k, formatWad(v)]))

  return {
    attackTypes: formatCounts(report.attackTypes),
    temporalPatterns: {
      uniqueBlocks: temporalPatterns.uniqueBlocks,
      maxAttacksPerBlock: temporalPatterns.maxAttacksPerBlock,
      avgAttacksPerBlock: formatWad(temporalPatterns.avgAttacksPerBlock),
    },
    profitAnalysis: wads(profitAnalysis),
    gasAnalysis: wads(gasAnalysis),
    tokenPairs: report.tokenPairs,
    victimPatterns: formatCounts(report.victimPatterns),
  }
}

export function serializeAttacker(profile: SophisticatedAttacker) {
  return {
    address: profile.address,
    attackCount: profile.attackCount,
    totalProfit: formatWad(profile.totalProfit),
    averageProfit: formatWad(profile.averageProfit),
    poolsTargeted: profile.poolsTargeted,
    totalVictims: profile.totalVictims,
    attackTypes: formatCounts(profile.attackTypes),
    averageEfficiency: formatWad(profile.averageEfficiency),
    totalGasSpent: formatWad(profile.totalGasSpent),
  }
}

export function serializeCluster(cluster: AttackCluster) {
  return {
    attackCount: cluster.attackCount,
    blockRange: [...cluster.blockRange],
    blockSpan: cluster.blockSpan,
    uniqueAttackers: cluster.uniqueAttackers,
    uniquePools: cluster.uniquePools,
    attackDensity: formatWad(cluster.attackDensity),
    totalProfit: formatWad(cluster.totalProfit),
    attackers: cluster.attackers,
    pools: cluster.pools,
  }
}

export function serializeReport(report: SandwichReport) {
  return {
    attacks: report.attacks.map(serializeAttack),
    statistics: serializeStatistics(report.statistics),
    patterns: serializePatterns(report.patterns),
    sophisticatedAttackers: report.sophisticatedAttackers.map(serializeAttacker),
    clusters: report.clusters.map(serializeCluster),
  }
}
