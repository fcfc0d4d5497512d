import "dotenv/config"
import { startServer } from "./api/server"

console.log("🥪 Sandwich Scope - DEX sandwich attack detection")
console.log("═══════════════════════════════════════════════════════════")
console.log("Endpoints:")
console.log("  • POST /sandwich/detect   frontrun / victim / backrun triples per block")
console.log("  • POST /sandwich/analyze  statistics, patterns, repeat attackers, clusters")
console.log("═══════════════════════════════════════════════════════════\n")

startServer()
