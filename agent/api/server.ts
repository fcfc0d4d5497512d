import express from "express"
import { SandwichDetector } from "../perception/sandwich/sandwichDetector"
import { loadDetectorConfig, loadServerConfig } from "../core/config"
import { registerSandwichRoutes } from "./sandwichRoute"

export function createApp() {
  const app = express()
  const serverConfig = loadServerConfig()

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*")
    res.setHeader("Access-Control-Allow-Headers", "*")
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS")
    if (req.method === "OPTIONS") return res.status(200).end()
    next()
  })

  app.use(express.json({ limit: "5mb" }))

  const detector = new SandwichDetector({
    ...loadDetectorConfig(),
    onCandidateError: (error, ctx) => {
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[Detector] Dropped candidate ${ctx.frontrunTx} -> ${ctx.backrunTx} in ${ctx.poolAddress}: ${message}`)
    },
  })

  registerSandwichRoutes(app, detector, serverConfig)

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  return { app, serverConfig }
}

export function startServer() {
  const { app, serverConfig } = createApp()
  app.listen(serverConfig.port, () => console.log(`🚀 Sandwich API on :${serverConfig.port}`))
}
