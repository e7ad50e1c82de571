import type { gmail_v1 } from 'googleapis/build/src/apis/gmail/v1'
import type { FetchLike } from '../src/backend.js'
import type { GatewayConfig } from '../src/config.js'

// Fixture shapes; the backend relays Gmail API resources unchanged
export type Profile = gmail_v1.Schema$Profile
export type Message = gmail_v1.Schema$Message
export type ListMessagesResponse = gmail_v1.Schema$ListMessagesResponse

export type RecordedCall = {
  url: URL
  method: string
  headers: Headers
  body?: unknown
  signal?: AbortSignal | null
}

export const testConfig = (overrides: Partial<GatewayConfig> = {}): GatewayConfig => ({
  apiUrl: 'https://backend.test',
  accessToken: 'test-secret',
  scopes: ['gmail.modify'],
  serverName: 'gmail-mcp',
  serverVersion: '0.1.0',
  timeoutMs: 1_000,
  ...overrides
})

export const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), {
  status,
  headers: { 'Content-Type': 'application/json' }
})

/**
 * Stands in for the backend: records every request and answers with `respond`.
 */
export const fakeBackend = (respond: (call: RecordedCall) => Response | Promise<Response> = () => json({})) => {
  const calls: RecordedCall[] = []

  const fetch: FetchLike = async (input, init) => {
    const call: RecordedCall = {
      url: new URL(input),
      method: init.method ?? 'GET',
      headers: new Headers(init.headers),
      signal: init.signal
    }
    if (typeof init.body === 'string') call.body = JSON.parse(init.body)
    calls.push(call)
    return respond(call)
  }

  return { calls, fetch }
}

/** A fetch that never answers until its signal aborts. */
export const hangingBackend = () => fakeBackend(call => new Promise<Response>((_resolve, reject) => {
  call.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')))
}))
