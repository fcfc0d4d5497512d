import { getAddress } from "viem"
import { SandwichDetector } from "../perception/sandwich/sandwichDetector"
import { SandwichAnalyzer } from "../perception/sandwich/analyzer"
import { SwapEvent, TokenInfo } from "../perception/sandwich/types"
import { formatWad, toWad } from "../core/wad"

// -------------------- CONSTANTS --------------------

const PAIR = getAddress("0xB4e16d0168e52d35CaCD2c6185b44281Ec28C9Dc") // WETH/USDC
const WETH: TokenInfo = {
  address: getAddress("0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2"),
  symbol: "WETH",
  decimals: 18,
}
const USDC: TokenInfo = {
  address: getAddress("0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48"),
  symbol: "USDC",
  decimals: 6,
}

const ATTACKER = "0x00000000000000000000000000000000000a77ac"
const VICTIM = "0x0000000000000000000000000000000000000b0b"
const BLOCK = 18_000_000

// -------------------- SYNTHETIC SWAPS --------------------

function demoSwap(
  txHash: string,
  trader: string,
  tokenIn: TokenInfo,
  tokenOut: TokenInfo,
  amountIn: string,
  amountOut: string,
  logIndex: number
): SwapEvent {
  return {
    txHash,
    blockNumber: BLOCK,
    logIndex,
    dexProtocol: "uniswap_v2",
    poolAddress: PAIR,
    trader,
    tokenIn,
    tokenOut,
    amountIn: toWad(amountIn),
    amountOut: toWad(amountOut),
    priceImpact: toWad("2.5"),
    gasUsed: 150_000,
    timestamp: new Date(),
  }
}

// -------------------- MAIN --------------------

function main() {
  console.log("🥪 Sandwich Attack Detection Demo")
  console.log("=".repeat(50))

  console.log("\n1. Building synthetic block...")

  // Attacker buys USDC ahead of the victim, then sells back less USDC than it received
  const frontrun = demoSwap("0xf1", ATTACKER, WETH, USDC, "10.0", "30000.0", 0)
  const victim = demoSwap("0xf2", VICTIM, WETH, USDC, "5.0", "14500.0", 1)
  const backrun = demoSwap("0xf3", ATTACKER, USDC, WETH, "29800.0", "10.2", 2)

  console.log(`   Frontrun: ${frontrun.trader.slice(0, 10)}... swaps ${formatWad(frontrun.amountIn)} WETH`)
  console.log(`   Victim:   ${victim.trader.slice(0, 10)}... swaps ${formatWad(victim.amountIn)} WETH (worse rate)`)
  console.log(`   Backrun:  ${backrun.trader.slice(0, 10)}... receives ${formatWad(backrun.amountOut)} WETH`)

  console.log("\n2. Running detector...")
  const detector = new SandwichDetector({
    minPriceImpact: toWad("1.0"),
    minProfitThreshold: toWad("0.1"),
    confidenceThreshold: toWad("0.7"),
  })
  const attacks = detector.detectInBlock(BLOCK, [frontrun, victim, backrun])
  console.log(`   Found ${attacks.length} potential sandwich attack(s)`)

  if (attacks.length === 0) {
    console.log("   No sandwich attacks detected with current parameters")
    return
  }

  const attack = attacks[0]
  console.log("\n3. Attack details:")
  console.log(`   ID:                 ${attack.attackId}`)
  console.log(`   Type:               ${attack.sandwichType}`)
  console.log(`   Attacker:           ${attack.attackerAddress}`)
  console.log(`   Profit:             ${formatWad(attack.profitAmount)} (${attack.profitToken.slice(0, 10)}...)`)
  console.log(`   Victim loss:        ${formatWad(attack.victimLossAmount)}`)
  console.log(`   Confidence:         ${formatWad(attack.detectionConfidence)}`)
  console.log(`   Price manipulation: ${formatWad(attack.priceManipulationPct)}%`)

  const analyzer = new SandwichAnalyzer()
  const efficiency = analyzer.calculateAttackEfficiency(attack)
  console.log("\n4. Efficiency:")
  console.log(`   Profit per gas:    ${formatWad(efficiency.profitPerGas)}`)
  console.log(`   Profit per victim: ${formatWad(efficiency.profitPerVictim)}`)

  const stats = analyzer.analyzeAttacks(attacks)
  console.log("\n5. Statistics:")
  console.log(`   Total attacks:  ${stats.totalAttacks}`)
  console.log(`   Total profit:   ${formatWad(stats.totalProfit)}`)
  console.log(`   Average profit: ${formatWad(stats.averageProfitPerAttack)}`)

  console.log("\n✅ Demo completed!")
}

main()
