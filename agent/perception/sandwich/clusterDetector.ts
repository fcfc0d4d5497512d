// agent/perception/sandwich/clusterDetector.ts

import { AttackCluster, SandwichAttack } from "./types"
import { divWad, sumWad, wadFromInt } from "../../core/wad"

export const DEFAULT_BLOCK_WINDOW = 100

// Greedy: an attack joins the running cluster when it lands within
// blockWindow blocks of the previous one. Singletons are not clusters.
export function detectAttackClusters(
  attacks: readonly SandwichAttack[],
  blockWindow: number = DEFAULT_BLOCK_WINDOW
): AttackCluster[] {
  if (attacks.length === 0) return []

  const sorted = [...attacks].sort((a, b) => a.blockNumber - b.blockNumber)
  const clusters: AttackCluster[] = []
  let current: SandwichAttack[] = [sorted[0]]

  for (let i = 1; i < sorted.length; i++) {
    const attack = sorted[i]
    if (attack.blockNumber - sorted[i - 1].blockNumber <= blockWindow) {
      current.push(attack)
      continue
    }
    if (current.length > 1) clusters.push(summarizeCluster(current))
    current = [attack]
  }
  if (current.length > 1) clusters.push(summarizeCluster(current))

  return clusters
}

function summarizeCluster(attacks: SandwichAttack[]): AttackCluster {
  // Callers pass attacks already sorted by block
  const fromBlock = attacks[0].blockNumber
  const toBlock = attacks[attacks.length - 1].blockNumber
  const blockSpan = toBlock - fromBlock + 1

  const attackers = new Set(attacks.map((a) => a.attackerAddress))
  const pools = new Set(attacks.map((a) => a.poolAddress))

  return {
    attackCount: attacks.length,
    blockRange: [fromBlock, toBlock],
    blockSpan,
    uniqueAttackers: attackers.size,
    uniquePools: pools.size,
    attackDensity: divWad(wadFromInt(attacks.length), wadFromInt(blockSpan)),
    totalProfit: sumWad(attacks.map((a) => a.profitAmount)),
    attackers: [...attackers],
    pools: [...pools],
  }
}
