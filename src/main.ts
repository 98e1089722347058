/**
 * Entry point.
 *
 * Loads site content, starts the gateway and shuts it down on SIGINT/SIGTERM.
 * All request handling lives in src/gateway/server.ts.
 */

import config from "./config.js"
import { GatewayServer } from "./gateway/server.js"
import { closeLogStream, createLogger } from "./logger.js"
import { PostStore } from "./site/post-store.js"

const log = createLogger("main")

async function main(): Promise<void> {
  const posts = await PostStore.load(config.CONTENT_FILE)
  const gateway = new GatewayServer({ posts })

  let stopping = false
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return
    }
    stopping = true
    log.info("shutting down", { signal })
    try {
      await gateway.stop()
    } finally {
      closeLogStream()
    }
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error("shutdown failed", error)
        process.exitCode = 1
      })
    })
  }

  await gateway.start()
}

main().catch((error: unknown) => {
  log.error("fatal startup error", error)
  process.exit(1)
})
