export * from "./types"
export * from "./ordering"
export * from "./pairing"
export * from "./sandwichDetector"
export * from "./sandwichAnalyzer"
export * from "./attackerProfiler"
export * from "./clusterDetector"
export * from "./analyzer"
