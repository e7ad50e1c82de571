import path from 'path'
import os from 'os'
import { z } from 'zod'

export const MCP_CONFIG_DIR = process.env.MCP_CONFIG_DIR || path.join(os.homedir(), '.gmail-gateway-mcp')
export const LOG_PATH = process.env.LOG_PATH || path.join(MCP_CONFIG_DIR, 'gateway.log')
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info'
export const PORT = Number(process.env.PORT) || 8080

export const SERVER_VERSION = '0.1.0'

export const SCOPES = ['gmail.readonly', 'gmail.labels', 'gmail.compose', 'gmail.modify'] as const
export type Scope = typeof SCOPES[number]

const scopeList = z.string().transform((value, ctx) => {
  const scopes = value.split(',').map(scope => scope.trim()).filter(scope => scope)
  const unknown = scopes.filter(scope => !SCOPES.some(known => known === scope))
  if (unknown.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown scope(s): ${unknown.join(', ')}` })
    return z.NEVER
  }
  return scopes.filter((scope): scope is Scope => SCOPES.some(known => known === scope))
})

const envSchema = z.object({
  LIAM_API_URL: z.string().url().default('https://api-dev.doitliam.com').transform(url => url.replace(/\/+$/, '')),
  LIAM_ACCESS_TOKEN: z.string().trim().optional(),
  LIAM_SCOPES: scopeList.default('gmail.readonly'),
  MCP_SERVER_NAME: z.string().trim().min(1).default('gmail-mcp'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
})

/**
 * Process-wide settings, read once at startup and never mutated.
 */
export type GatewayConfig = Readonly<{
  apiUrl: string
  accessToken?: string
  scopes: readonly Scope[]
  serverName: string
  serverVersion: string
  timeoutMs: number
}>

export const loadConfig = (env: Record<string, string | undefined> = process.env): GatewayConfig => {
  // unset and empty variables both fall back to their defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const { LIAM_API_URL, LIAM_ACCESS_TOKEN, LIAM_SCOPES, MCP_SERVER_NAME, REQUEST_TIMEOUT_MS } = parsed.data

  return Object.freeze({
    apiUrl: LIAM_API_URL,
    ...(LIAM_ACCESS_TOKEN ? { accessToken: LIAM_ACCESS_TOKEN } : {}),
    scopes: Object.freeze([...LIAM_SCOPES]),
    serverName: MCP_SERVER_NAME,
    serverVersion: SERVER_VERSION,
    timeoutMs: REQUEST_TIMEOUT_MS
  })
}
