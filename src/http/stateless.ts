import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js"
import type { Server } from "@modelcontextprotocol/sdk/server/index.js"
import type { Request, Response } from "express"
import express from "express"
import { logger } from "../logger.js"

/**
 * Arguments when we create a new instance of the server for a request
 */
export interface CreateServerArg {
	/** Bearer token from the request's Authorization header, if any */
	credential?: string
	/** Aborted once the HTTP response is closed */
	signal: AbortSignal
}

export type CreateServerFn = (arg: CreateServerArg) => Server

export interface StatelessServerOptions {
	name: string
	version: string
}

/**
 * Extracts the token from an `Authorization: Bearer <token>` header.
 */
export function bearerToken(req: Request): string | undefined {
	const header = req.headers.authorization
	if (!header) return undefined

	const match = /^Bearer\s+(\S+)\s*$/i.exec(header)
	return match?.[1]
}

const rpcError = (code: number, message: string) => ({
	jsonrpc: "2.0",
	error: { code, message },
	id: null,
})

/**
 * Creates a stateless server for handling MCP requests
 * In stateless mode, each request creates a new server and transport instance
 * @param createMcpServer Function to create an MCP server
 * @returns Express app
 */
export function createStatelessServer(
	createMcpServer: CreateServerFn,
	options: StatelessServerOptions,
): { app: express.Express } {
	const app = express()
	app.use(express.json())

	app.get("/health", (_req: Request, res: Response) => {
		res.json({
			status: "healthy",
			service: options.name,
			version: options.version,
			timestamp: new Date().toISOString(),
		})
	})

	app.post("/mcp", async (req: Request, res: Response) => {
		// In stateless mode, create a new instance of transport and server for each request
		// to ensure complete isolation. A single instance would cause request ID collisions
		// when multiple clients connect concurrently.
		const controller = new AbortController()

		try {
			const server = createMcpServer({
				credential: bearerToken(req),
				signal: controller.signal,
			})

			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: undefined,
			})

			// Clean up resources when the request ends; a client that disconnects
			// early also cancels whatever backend call is still in flight
			res.on("close", () => {
				controller.abort()
				transport.close().catch((error: unknown) => logger("warn", "Error closing transport", { error }))
				server.close().catch((error: unknown) => logger("warn", "Error closing server", { error }))
			})

			await server.connect(transport)

			await transport.handleRequest(req, res, req.body)
		} catch (error) {
			logger("error", "Error handling MCP request", { error })
			if (!res.headersSent) {
				res.status(500).json(rpcError(-32603, "Internal server error"))
			}
		}
	})

	app.get("/mcp", async (_req: Request, res: Response) => {
		logger("debug", "Received GET MCP request")
		res.status(405).json(rpcError(-32000, "Method not allowed in stateless mode"))
	})

	app.delete("/mcp", async (_req: Request, res: Response) => {
		logger("debug", "Received DELETE MCP request")
		res.status(405).json(rpcError(-32000, "Method not allowed in stateless mode"))
	})

	return { app }
}
