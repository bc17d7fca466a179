import { serve } from "@hono/node-server"
import { createRequestHandler, createServerContext } from "./app"
import { loadConfig } from "./config"
import { createLoggers } from "./logger"

const config = loadConfig()
const loggers = createLoggers(config)
const ctx = createServerContext(config, loggers)

const server = serve(
  {
    fetch: createRequestHandler(ctx),
    hostname: config.host,
    port: config.port,
  },
  (info) => {
    loggers.app.info(
      {
        host: info.address,
        port: info.port,
        llmProvider: config.llm.provider,
        llmEnabled: ctx.llm.enabled,
        searchStrategy: config.search.strategy,
        searchPrimary: config.search.primary,
        agentTimeoutMs: config.runner.agentTimeoutMs,
        platforms: ctx.analysisService.router.list().map((platform) => platform.platform),
      },
      "shopwarden started",
    )
    console.log(`shopwarden listening on http://${info.address}:${info.port}`)
  },
)

function shutdown(signal: NodeJS.Signals): void {
  loggers.app.info({ signal }, "shutting down")
  server.close((error) => {
    if (error) {
      loggers.app.error({ error }, "server close failed")
      process.exitCode = 1
    }
    process.exit()
  })
}

process.once("SIGTERM", shutdown)
process.once("SIGINT", shutdown)
