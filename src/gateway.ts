import type { ZodIssue } from 'zod'
import type { BackendClient, BackendRequest } from './backend.js'
import { gmailTools } from './catalog.js'
import type { GatewayConfig } from './config.js'
import { GatewayError } from './errors.js'
import { logger } from './logger.js'
import { smokeTools } from './smoke.js'
import type { BackendTool, ToolDescriptor, ToolResult } from './types.js'

export interface InvokeOptions {
  /** Per-call bearer credential; takes precedence over the configured one. */
  credential?: string
  signal?: AbortSignal
}

const PLACEHOLDER = /\{(\w+)\}/g

const describeIssues = (issues: ZodIssue[]) => issues
  .map(issue => `${issue.path.length ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
  .join('; ')

const wireValue = (value: unknown): string | undefined => {
  if (value === undefined || value === null || value === false) return undefined
  return String(value)
}

/**
 * Turns validated parameters into the backend request the tool maps to.
 */
export const buildRequest = (tool: BackendTool, args: Record<string, unknown>): BackendRequest => {
  const path = tool.path.replace(PLACEHOLDER, (_match, name: string) => {
    const value = wireValue(args[name])
    if (value === undefined) throw new GatewayError('InvalidParameter', `${name}: is required`)
    return encodeURIComponent(value)
  })

  const request: BackendRequest = { method: tool.method, path }

  const query: Record<string, string> = {}
  for (const [param, wireName] of Object.entries(tool.query)) {
    const value = wireValue(args[param])
    if (value !== undefined) query[wireName] = value
  }
  if (Object.keys(query).length) request.query = query

  const body: Record<string, unknown> = {}
  for (const [param, wireName] of Object.entries(tool.body)) {
    if (args[param] !== undefined) body[wireName] = args[param]
  }
  if (Object.keys(tool.body).length) request.body = body

  return request
}

/**
 * Validates tool invocations against the catalog and forwards them to the
 * backend, one request per call. Holds nothing but read-only configuration.
 */
export class ToolGateway {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>

  constructor(
    private readonly config: GatewayConfig,
    private readonly backend: BackendClient,
    tools: readonly ToolDescriptor[] = [...smokeTools, ...gmailTools]
  ) {
    this.tools = new Map(tools.map(tool => [tool.name, tool]))
  }

  permits(tool: ToolDescriptor): boolean {
    return !tool.scopes.length || tool.scopes.some(scope => this.config.scopes.includes(scope))
  }

  /** Tools the configured scopes allow, in catalog order. */
  listTools(): ToolDescriptor[] {
    return [...this.tools.values()].filter(tool => this.permits(tool))
  }

  async invoke(name: string, args: Record<string, unknown> = {}, options: InvokeOptions = {}): Promise<ToolResult> {
    const tool = this.tools.get(name)
    if (!tool) throw new GatewayError('InvalidParameter', `Unknown tool: ${name}`)

    if (!this.permits(tool)) {
      throw new GatewayError('Unauthorized', `Tool ${name} requires one of the scopes: ${tool.scopes.join(', ')}`)
    }

    const parsed = tool.params.safeParse(args)
    if (!parsed.success) {
      logger('debug', 'Rejected tool arguments', { tool: name, issues: parsed.error.issues.length })
      throw new GatewayError('InvalidParameter', `Invalid arguments for tool ${name}: ${describeIssues(parsed.error.issues)}`)
    }

    if (tool.kind === 'local') {
      const { serverName, serverVersion } = this.config
      return { type: 'text', text: tool.run(parsed.data, { serverName, serverVersion }) }
    }

    const credential = options.credential || this.config.accessToken
    if (!credential) {
      throw new GatewayError('Unauthorized', 'No credential available for the backend; authenticate with LIAM first')
    }

    const request = buildRequest(tool, parsed.data)
    const startedAt = Date.now()
    logger('info', 'Dispatching tool call', { tool: name, method: tool.method, path: tool.path })

    try {
      const body = await this.backend.request(request, credential, options.signal)
      logger('info', 'Tool call completed', { tool: name, durationMs: Date.now() - startedAt })
      return { type: 'json', body }
    } catch (error) {
      if (error instanceof GatewayError) {
        logger('warn', 'Tool call failed', { tool: name, kind: error.kind, status: error.status, durationMs: Date.now() - startedAt })
      }
      throw error
    }
  }
}
