export const ERROR_KINDS = ['InvalidParameter', 'Unauthorized', 'BackendUnavailable', 'BackendError', 'NotFound'] as const

export type GatewayErrorKind = typeof ERROR_KINDS[number]

export type GatewayErrorBody = {
  kind: GatewayErrorKind
  message: string
  status?: number
}

const MAX_MESSAGE_LENGTH = 300
const ENVELOPE_KEYS = ['error', 'success', 'code', 'status', 'message', 'detail']
const REDACTED = '[REDACTED]'

/**
 * The only error shape a caller ever sees. Messages are expected to be
 * redacted before they get here; see {@link redact}.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind
  readonly status?: number

  constructor(kind: GatewayErrorKind, message: string, options: { status?: number, cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'GatewayError'
    this.kind = kind
    if (options.status !== undefined) this.status = options.status
  }

  toJSON(): GatewayErrorBody {
    return this.status === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, status: this.status }
  }
}

export const kindForStatus = (status: number): GatewayErrorKind => {
  if (status === 401 || status === 403) return 'Unauthorized'
  if (status === 404) return 'NotFound'
  return 'BackendError'
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

const truncate = (text: string) => {
  if (text.length <= MAX_MESSAGE_LENGTH) return text

  // never split a surrogate pair
  const last = text.charCodeAt(MAX_MESSAGE_LENGTH - 1)
  const cut = last >= 0xd800 && last <= 0xdbff ? MAX_MESSAGE_LENGTH - 1 : MAX_MESSAGE_LENGTH
  return `${text.slice(0, cut)}...`
}

/**
 * Strips credential material from text that may end up in front of a caller:
 * the given secrets verbatim, bearer tokens, `access_token=...` style pairs,
 * JWTs and Google OAuth token shapes.
 */
export const redact = (text: string, secrets: readonly (string | undefined)[] = []) => {
  let result = text
  for (const secret of secrets) {
    if (secret) result = result.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED)
  }

  result = result
    .replace(/Bearer\s+[^\s"',;]+/gi, `Bearer ${REDACTED}`)
    .replace(/(["']?)((?:access|refresh|id)_?token)\1(\s*[:=]\s*)(["']?)[^\s"',;&}]+/gi, `$1$2$1$3$4${REDACTED}`)
    .replace(/eyJ[\w-]*\.[\w-]+\.[\w-]*/g, REDACTED)
    .replace(/ya29\.[\w.-]+/g, REDACTED)
    .replace(/\b1\/\/[\w-]+/g, REDACTED)

  return truncate(result)
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Pulls a human readable message out of a backend error payload.
 */
export const backendMessage = (body: unknown): string | undefined => {
  if (typeof body === 'string') return body.trim() || undefined
  if (!isRecord(body)) return undefined

  const { error, message, detail } = body
  if (typeof error === 'string' && error) return error
  if (isRecord(error) && typeof error.message === 'string' && error.message) return error.message
  if (typeof message === 'string' && message) return message
  if (typeof detail === 'string' && detail) return detail
  return undefined
}

/**
 * A 2xx body that nonetheless reports failure, e.g. `{ success: false, error: ... }`
 * or `{ error: { code: 404, message: ... } }`. Returns the status it reports,
 * if any, or null when the body is an ordinary result.
 */
export const errorEnvelope = (body: unknown): { status?: number } | null => {
  if (!isRecord(body)) return null

  const onlyError = body.error !== undefined && body.error !== null
    && Object.keys(body).every(key => ENVELOPE_KEYS.includes(key))
  if (body.success !== false && !onlyError) return null

  const { error } = body
  const candidates = [isRecord(error) ? error.code : undefined, isRecord(error) ? error.status : undefined, body.code, body.status]
  const status = candidates.find((value): value is number => typeof value === 'number' && Number.isInteger(value))
  return status === undefined ? {} : { status }
}
