import type { z } from 'zod'
import type { Scope } from './config.js'
import type { HttpMethod } from './backend.js'

/**
 * Parameter schema of a tool; parsing yields the validated named parameters.
 */
export type ParamSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>

interface ToolBase {
  name: string
  description: string
  params: ParamSchema
  /** Any one of these scopes permits the tool; empty means always permitted. */
  scopes: readonly Scope[]
  readOnly: boolean
  destructive?: boolean
}

/**
 * A tool forwarded 1:1 to a backend endpoint. `path` may hold `{param}`
 * placeholders; `query` and `body` map parameter names to wire names.
 */
export interface BackendTool extends ToolBase {
  kind: 'backend'
  method: HttpMethod
  path: string
  query: Readonly<Record<string, string>>
  body: Readonly<Record<string, string>>
}

export interface LocalTool extends ToolBase {
  kind: 'local'
  run: (args: Record<string, unknown>, info: { serverName: string, serverVersion: string }) => string
}

export type ToolDescriptor = BackendTool | LocalTool

export type ToolResult =
  | { type: 'json', body: unknown }
  | { type: 'text', text: string }
