import { Server } from "@modelcontextprotocol/sdk/server/index.js"
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool
} from "@modelcontextprotocol/sdk/types.js"
import { zodToJsonSchema } from "zod-to-json-schema"
import { BackendClient } from "./backend.js"
import type { GatewayConfig } from "./config.js"
import { GatewayError } from "./errors.js"
import { ToolGateway } from "./gateway.js"
import type { ToolDescriptor, ToolResult } from "./types.js"

export interface CreateServerArg {
  config: GatewayConfig
  /** Shared across servers; one is built from the config when omitted. */
  backend?: BackendClient
  /** Bearer credential presented by whoever opened this connection. */
  credential?: string
  /** Aborts every in-flight backend call, e.g. when the HTTP client goes away. */
  signal?: AbortSignal
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const toInputSchema = (tool: ToolDescriptor): Tool['inputSchema'] => {
  const jsonSchema = zodToJsonSchema(tool.params, { $refStrategy: 'none' })
  const properties = 'properties' in jsonSchema && isRecord(jsonSchema.properties) ? jsonSchema.properties : {}
  const required = 'required' in jsonSchema && Array.isArray(jsonSchema.required)
    ? jsonSchema.required.filter((key): key is string => typeof key === 'string')
    : []

  return required.length ? { type: 'object', properties, required } : { type: 'object', properties }
}

const toTool = (tool: ToolDescriptor): Tool => ({
  name: tool.name,
  description: tool.description,
  inputSchema: toInputSchema(tool),
  annotations: {
    readOnlyHint: tool.readOnly,
    destructiveHint: tool.destructive ?? false,
    openWorldHint: tool.kind === 'backend'
  }
})

const formatResponse = (result: ToolResult): CallToolResult => ({
  content: [{ type: 'text', text: result.type === 'text' ? result.text : JSON.stringify(result.body) }]
})

const formatError = (error: GatewayError): CallToolResult => ({
  isError: true,
  content: [{ type: 'text', text: JSON.stringify({ error: error.toJSON() }) }]
})

export function createServer({ config, backend, credential, signal }: CreateServerArg): Server {
  const gateway = new ToolGateway(
    config,
    backend ?? new BackendClient({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs })
  )

  const server = new Server(
    { name: config.serverName, version: config.serverVersion },
    { capabilities: { tools: {} } }
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: gateway.listTools().map(toTool)
  }))

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params
    const callSignal = signal ? AbortSignal.any([signal, extra.signal]) : extra.signal

    try {
      const result = await gateway.invoke(name, args ?? {}, { credential, signal: callSignal })
      return formatResponse(result)
    } catch (error) {
      if (error instanceof GatewayError) return formatError(error)
      throw error
    }
  })

  return server
}
