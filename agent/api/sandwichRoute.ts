/**
 * Sandwich Detection Endpoints
 *
 * POST /sandwich/detect   { swaps: [...], fromBlock?, toBlock? }
 * POST /sandwich/analyze  { swaps: [...], fromBlock?, toBlock? }
 *
 * Swaps are decoded upstream. `detect` returns the attacks found per block;
 * `analyze` adds statistics, pattern, attacker and cluster reports.
 */

import { Express, Request, Response, Router } from "express"
import { SandwichDetector } from "../perception/sandwich/sandwichDetector"
import { analyzeSwaps, detectSandwiches } from "../perception/sandwich/analyzer"
import { ServerConfig } from "../core/config"
import { SwapPayloadError, parseDetectRequest } from "./swapPayload"
import { serializeAttack, serializeReport } from "./serialize"

export function createSandwichRouter(detector: SandwichDetector, config: ServerConfig): Router {
  const router = Router()

  router.post("/sandwich/detect", (req: Request, res: Response) =>
    handle(res, () => {
      const { swaps, range } = parseDetectRequest(req.body, config.maxSwapsPerBlock)
      const attacks = detectSandwiches(detector, swaps, range)
      return { attacks: attacks.map(serializeAttack) }
    })
  )

  router.post("/sandwich/analyze", (req: Request, res: Response) =>
    handle(res, () => {
      const { swaps, range } = parseDetectRequest(req.body, config.maxSwapsPerBlock)
      return serializeReport(analyzeSwaps(detector, swaps, range))
    })
  )

  return router
}

function handle(res: Response, run: () => object) {
  try {
    return res.json(run())
  } catch (err) {
    if (err instanceof SwapPayloadError) {
      return res.status(400).json({ error: "Invalid request body", details: err.message })
    }
    const message = err instanceof Error ? err.message : String(err)
    console.error("[SandwichRoute] Error:", message)
    return res.status(500).json({ error: message })
  }
}

/** Helper to register on an existing Express app */
export function registerSandwichRoutes(
  app: Express,
  detector: SandwichDetector,
  config: ServerConfig
): void {
  app.use(createSandwichRouter(detector, config))
}
