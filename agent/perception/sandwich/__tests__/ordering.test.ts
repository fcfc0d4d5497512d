import {
  calculatePriceImpact,
  calculatePriceMovement,
  detectPotentialMevAddresses,
  groupByPool,
  groupByTokenPair,
  normalizeTokenPair,
  sortByBlockPosition,
} from "../ordering"
import { formatWad, toWad } from "../../../core/wad"
import { ATTACKER, DAI, OTHER_POOL, POOL, USDC, VICTIM, WETH, createSwap } from "./factories"

describe("ordering", () => {
  describe("sortByBlockPosition", () => {
    it("should order by block then log index", () => {
      const swaps = [
        createSwap({ txHash: "0xc", blockNumber: 2, logIndex: 0 }),
        createSwap({ txHash: "0xb", blockNumber: 1, logIndex: 4 }),
        createSwap({ txHash: "0xa", blockNumber: 1, logIndex: 1 }),
      ]
      expect(sortByBlockPosition(swaps).map((s) => s.txHash)).toEqual(["0xa", "0xb", "0xc"])
    })

    it("should keep input order for equal positions", () => {
      const swaps = [
        createSwap({ txHash: "0x2", logIndex: 3 }),
        createSwap({ txHash: "0x1", logIndex: 3 }),
        createSwap({ txHash: "0x0", logIndex: 0 }),
      ]
      expect(sortByBlockPosition(swaps).map((s) => s.txHash)).toEqual(["0x0", "0x2", "0x1"])
    })

    it("should be idempotent and leave the input untouched", () => {
      const swaps = [createSwap({ txHash: "0xb", logIndex: 2 }), createSwap({ txHash: "0xa", logIndex: 1 })]
      const once = sortByBlockPosition(swaps)
      expect(sortByBlockPosition(once)).toEqual(once)
      expect(swaps.map((s) => s.txHash)).toEqual(["0xb", "0xa"])
    })
  })

  describe("groupByPool", () => {
    it("should key by lower-cased pool and keep order within a pool", () => {
      const swaps = [
        createSwap({ txHash: "0x1", poolAddress: POOL.toUpperCase().replace("0X", "0x") }),
        createSwap({ txHash: "0x2", poolAddress: OTHER_POOL }),
        createSwap({ txHash: "0x3", poolAddress: POOL }),
      ]
      const groups = groupByPool(swaps)
      expect([...groups.keys()].sort()).toEqual([OTHER_POOL, POOL].sort())
      expect(groups.get(POOL)?.map((s) => s.txHash)).toEqual(["0x1", "0x3"])
    })
  })

  describe("token pairs", () => {
    it("should give a swap and its reverse the same key", () => {
      const buy = createSwap()
      const sell = createSwap({ tokenIn: USDC, tokenOut: WETH })
      expect(normalizeTokenPair(buy)).toEqual([USDC.address, WETH.address])
      expect(normalizeTokenPair(sell)).toEqual(normalizeTokenPair(buy))
    })

    it("should group swaps by pair", () => {
      const groups = groupByTokenPair([
        createSwap({ txHash: "0x1" }),
        createSwap({ txHash: "0x2", tokenOut: DAI }),
        createSwap({ txHash: "0x3", tokenIn: USDC, tokenOut: WETH }),
      ])
      expect(groups.get(`${USDC.address}:${WETH.address}`)?.map((s) => s.txHash)).toEqual(["0x1", "0x3"])
      expect(groups.get(`${DAI.address}:${WETH.address}`)?.map((s) => s.txHash)).toEqual(["0x2"])
    })
  })

  describe("calculatePriceImpact", () => {
    it("should measure the move in constant-product price", () => {
      const swap = createSwap({ amountIn: toWad("100"), amountOut: toWad("100") })
      // 200/100 = 2 before, 100/200 = 0.5 after
      expect(formatWad(calculatePriceImpact(swap, [toWad("100"), toWad("200")]))).toBe("75")
    })

    it("should be zero for empty swaps or empty reserves", () => {
      expect(calculatePriceImpact(createSwap({ amountOut: 0n }), [toWad("1"), toWad("1")])).toBe(0n)
      expect(calculatePriceImpact(createSwap(), [0n, toWad("1")])).toBe(0n)
    })
  })

  describe("calculatePriceMovement", () => {
    it("should give percent change between execution prices", () => {
      const swaps = [
        createSwap({ amountIn: toWad("10"), amountOut: toWad("20") }),
        createSwap({ amountIn: 0n, amountOut: toWad("5") }),
        createSwap({ amountIn: toWad("10"), amountOut: toWad("25") }),
      ]
      expect(calculatePriceMovement(swaps).map(formatWad)).toEqual(["25"])
    })

    it("should be empty for a single swap", () => {
      expect(calculatePriceMovement([createSwap()])).toEqual([])
    })
  })

  describe("detectPotentialMevAddresses", () => {
    it("should flag traders at or above the frequency threshold", () => {
      const swaps = [
        createSwap({ trader: ATTACKER }),
        createSwap({ trader: "0x" + ATTACKER.slice(2).toUpperCase() }),
        createSwap({ trader: ATTACKER }),
        createSwap({ trader: VICTIM }),
      ]
      expect([...detectPotentialMevAddresses(swaps)]).toEqual([ATTACKER])
      expect(detectPotentialMevAddresses(swaps, 1).size).toBe(2)
    })
  })
})
