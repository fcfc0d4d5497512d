// agent/perception/sandwich/types.ts

import { Wad } from "../../core/wad"

export interface TokenInfo {
  address: string
  symbol: string
  decimals: number
  name?: string
}

// Decoded upstream; (blockNumber, logIndex) orders swaps within a block
export interface SwapEvent {
  txHash: string
  blockNumber: number
  logIndex: number
  dexProtocol: string
  poolAddress: string
  trader: string
  tokenIn: TokenInfo
  tokenOut: TokenInfo
  amountIn: Wad
  amountOut: Wad
  priceImpact?: Wad // percent
  gasUsed?: number
  timestamp?: Date
}

export type TokenPair = readonly [string, string]

export type SandwichRole = "frontrun" | "victim" | "backrun"

export const SandwichType = {
  FRONT_BACK: "front_back",
  MULTI_VICTIM: "multi_victim",
  ATOMIC: "atomic",
} as const

export type SandwichType = (typeof SandwichType)[keyof typeof SandwichType]

export interface SandwichTransaction {
  readonly swapEvent: SwapEvent
  readonly role: SandwichRole
  // Placeholders until pool state is wired in; always 0 from the detector
  readonly priceBefore: Wad
  readonly priceAfter: Wad
  readonly priceImpact: Wad
}

export interface SandwichCandidate {
  blockNumber: number
  poolAddress: string
  tokenPair: TokenPair
  transactions: SwapEvent[]
  priceMovements: Wad[]
  potentialFrontrunIndices: number[]
  potentialVictimIndices: number[]
  potentialBackrunIndices: number[]
  confidenceScore: Wad
}

export interface SandwichAttack {
  readonly attackId: string
  readonly sandwichType: SandwichType
  readonly blockNumber: number
  readonly blockTimestamp: Date
  readonly poolAddress: string
  readonly tokenPair: TokenPair

  readonly frontrunTxs: readonly SandwichTransaction[]
  readonly victimTxs: readonly SandwichTransaction[]
  readonly backrunTxs: readonly SandwichTransaction[]

  readonly attackerAddress: string
  readonly profitAmount: Wad
  readonly profitToken: string
  readonly victimLossAmount: Wad
  // Raw gas units, not a token amount. netProfit mixes the two domains.
  readonly gasCost: Wad
  readonly netProfit: Wad

  readonly detectionConfidence: Wad
  readonly priceManipulationPct: Wad
  readonly totalVolumeManipulated: Wad
}

export interface AttackerProfit {
  address: string
  totalProfit: Wad
}

export interface PoolAttackCount {
  poolAddress: string
  attackCount: number
}

export interface SandwichStatistics {
  fromBlock: number
  toBlock: number
  totalAttacks: number
  totalProfit: Wad
  totalVictimLoss: Wad
  averageProfitPerAttack: Wad
  mostProfitableAttack: SandwichAttack | null
  topAttackers: AttackerProfit[]
  mostTargetedPools: PoolAttackCount[]
}

export interface AttackEfficiency {
  profitPerGas: Wad
  profitPerVictim: Wad
  profitPerPriceImpact: Wad
  profitPerVolume: Wad
}

export interface AttackPatternReport {
  attackTypes: Partial<Record<SandwichType, number>>
  temporalPatterns: {
    uniqueBlocks: number
    maxAttacksPerBlock: number
    avgAttacksPerBlock: Wad
  }
  profitAnalysis: {
    minProfit: Wad
    maxProfit: Wad
    avgProfit: Wad
    medianProfit: Wad
  }
  gasAnalysis: {
    avgGasCost: Wad
    totalGasSpent: Wad
  }
  tokenPairs: Record<string, number>
  victimPatterns: Record<number, number>
}

export interface SophisticatedAttacker {
  address: string
  attackCount: number
  totalProfit: Wad
  averageProfit: Wad
  poolsTargeted: number
  totalVictims: number
  attackTypes: Partial<Record<SandwichType, number>>
  averageEfficiency: Wad
  totalGasSpent: Wad
}

export interface AttackCluster {
  attackCount: number
  blockRange: readonly [number, number]
  blockSpan: number
  uniqueAttackers: number
  uniquePools: number
  attackDensity: Wad
  totalProfit: Wad
  attackers: string[]
  pools: string[]
}
