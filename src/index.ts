#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import fs from "fs"
import { BackendClient } from "./backend.js"
import { MCP_CONFIG_DIR, PORT, loadConfig } from "./config.js"
import { createStatelessServer } from "./http/stateless.js"
import { logger } from "./logger.js"
import { createServer } from "./server.js"

const main = async () => {
  fs.mkdirSync(MCP_CONFIG_DIR, { recursive: true })

  const config = loadConfig()
  const backend = new BackendClient({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs })

  logger('info', 'Starting server', {
    name: config.serverName,
    version: config.serverVersion,
    apiUrl: config.apiUrl,
    scopes: config.scopes,
    credentialConfigured: Boolean(config.accessToken)
  })

  // Stdio Server
  const stdioServer = createServer({ config, backend })
  const transport = new StdioServerTransport()
  await stdioServer.connect(transport)

  // Streamable HTTP Server
  const { app } = createStatelessServer(
    ({ credential, signal }) => createServer({ config, backend, credential, signal }),
    { name: config.serverName, version: config.serverVersion }
  )
  const httpServer = app.listen(PORT, () => logger('info', 'HTTP transport listening', { port: PORT }))

  const shutdown = async (signal: NodeJS.Signals) => {
    logger('info', 'Shutting down', { signal })
    httpServer.close()
    await stdioServer.close()
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger('error', 'Error during shutdown', { error })
          process.exit(1)
        })
    })
  }
}

main().catch((error: unknown) => {
  logger('error', 'Server failed to start', { error })
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})
