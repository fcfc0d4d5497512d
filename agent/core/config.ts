import { SandwichDetectorConfig, DEFAULT_DETECTOR_CONFIG } from "../perception/sandwich/sandwichDetector"
import { Wad, WadParseError, toWad } from "./wad"

type Env = Record<string, string | undefined>

export class ConfigError extends Error {
  constructor(public readonly variable: string, value: string) {
    super(`Invalid value for ${variable}: "${value}"`)
    this.name = "ConfigError"
  }
}

export interface ServerConfig {
  port: number
  // Per-block cap; detection is O(n^3) in swaps per pool
  maxSwapsPerBlock: number
}

function readWad(env: Env, key: string, fallback: Wad): Wad {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  try {
    return toWad(raw)
  } catch (err) {
    if (err instanceof WadParseError) throw new ConfigError(key, raw)
    throw err
  }
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  if (!/^\d+$/.test(raw.trim())) throw new ConfigError(key, raw)
  return parseInt(raw, 10)
}

// Thresholds are taken as given; out-of-range values only make detection stricter or looser
export function loadDetectorConfig(env: Env = process.env): SandwichDetectorConfig {
  return {
    minPriceImpact: readWad(env, "SANDWICH_MIN_PRICE_IMPACT", DEFAULT_DETECTOR_CONFIG.minPriceImpact),
    minProfitThreshold: readWad(env, "SANDWICH_MIN_PROFIT", DEFAULT_DETECTOR_CONFIG.minProfitThreshold),
    maxBlockDistance: readInt(env, "SANDWICH_MAX_BLOCK_DISTANCE", DEFAULT_DETECTOR_CONFIG.maxBlockDistance),
    confidenceThreshold: readWad(
      env,
      "SANDWICH_CONFIDENCE_THRESHOLD",
      DEFAULT_DETECTOR_CONFIG.confidenceThreshold
    ),
  }
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readInt(env, "PORT", 3001),
    maxSwapsPerBlock: readInt(env, "MAX_SWAPS_PER_BLOCK", 500),
  }
}
