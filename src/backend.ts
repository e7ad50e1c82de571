/**
 * HTTP client for the LIAM backend.
 *
 * The backend holds the Google OAuth tokens and performs the actual Gmail API
 * calls; this client only forwards a method, path and parameters with the
 * caller's bearer credential and hands back the JSON it gets.
 */

import { GatewayError, backendMessage, errorEnvelope, kindForStatus, redact } from './errors.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export interface BackendRequest {
  method: HttpMethod
  path: string
  query?: Record<string, string>
  body?: Record<string, unknown>
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface BackendClientOptions {
  baseUrl: string
  timeoutMs: number
  /** Defaults to the global fetch. */
  fetch?: FetchLike
}

const parseBody = (text: string): { json: true, value: unknown } | { json: false, value: string } => {
  if (!text.trim()) return { json: true, value: {} }
  try {
    return { json: true, value: JSON.parse(text) }
  } catch {
    return { json: false, value: text }
  }
}

export class BackendClient {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly fetch: FetchLike

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs
    this.fetch = options.fetch ?? fetch
  }

  url(request: BackendRequest): string {
    const url = new URL(`${this.baseUrl}${request.path}`)
    for (const [name, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(name, value)
    }
    return url.toString()
  }

  /**
   * Issues exactly one request. Resolves to the parsed JSON body, or rejects
   * with a {@link GatewayError}; `signal` aborts the in-flight request.
   */
  async request(request: BackendRequest, credential: string, signal?: AbortSignal): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.timeoutMs)
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

    const headers: Record<string, string> = {
      Authorization: `Bearer ${credential}`,
      Accept: 'application/json'
    }
    if (request.body) headers['Content-Type'] = 'application/json'

    let status: number
    let text: string
    try {
      const response = await this.fetch(this.url(request), {
        method: request.method,
        headers,
        body: request.body ? JSON.stringify(request.body) : undefined,
        signal: combined
      })
      status = response.status
      text = await response.text()
    } catch (error) {
      if (signal?.aborted) {
        throw new GatewayError('BackendUnavailable', 'Request to the backend was cancelled', { cause: error })
      }
      if (timeout.aborted) {
        throw new GatewayError('BackendUnavailable', `Backend did not respond within ${this.timeoutMs}ms`, { cause: error })
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new GatewayError('BackendUnavailable', `Backend unreachable: ${redact(reason, [credential])}`, { cause: error })
    }

    const body = parseBody(text)
    const ok = status >= 200 && status < 300

    if (!ok) {
      const message = backendMessage(body.value) ?? `Backend responded with status ${status}`
      throw new GatewayError(kindForStatus(status), redact(message, [credential]), { status })
    }

    if (!body.json) {
      throw new GatewayError('BackendError', 'Backend returned a response that is not JSON', { status })
    }

    const envelope = errorEnvelope(body.value)
    if (envelope) {
      const message = backendMessage(body.value) ?? 'Request failed'
      const kind = envelope.status === undefined ? 'BackendError' : kindForStatus(envelope.status)
      throw new GatewayError(kind, redact(message, [credential]), envelope)
    }

    return body.value
  }
}
