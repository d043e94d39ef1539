/**
 * HTTP Utilities
 *
 * Response shape shared by the transport and its test doubles, and the mapping
 * of HTTP statuses and network errors into backend responses.
 */

import type {
  BackendResponse,
  TransportFailureCause,
  TransportFailureResponse
} from './types'

/**
 * Minimal HTTP response interface the transport works against.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

export interface HttpRequestInit {
  readonly method: string
  readonly headers: Readonly<Record<string, string>>
  readonly body?: string | undefined
  readonly signal: AbortSignal
}

/**
 * Sends one request. The default implementation goes through the pooled
 * undici agent; tests pass their own.
 */
export type HttpSendFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>

/**
 * Error codes node and undici use when nothing is listening or the host is unknown.
 */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
])

export function transportFailure(cause: TransportFailureCause): TransportFailureResponse {
  return { kind: 'transport_failure', cause }
}

/**
 * Parse a Retry-After value given in seconds. HTTP dates are ignored.
 */
export function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value * 1000) : undefined
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined
  }
  const seconds = Number(value.trim())
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined
  }
  return Math.round(seconds * 1000)
}

async function readJson(response: HttpResponse): Promise<unknown> {
  const text = await response.text()
  if (text.trim() === '') {
    return undefined
  }
  return JSON.parse(text) as unknown
}

function retryHintFromBody(body: unknown): number | undefined {
  if (body === null || typeof body !== 'object' || !('retry_after' in body)) {
    return undefined
  }
  return parseRetryAfter(body.retry_after)
}

/**
 * Map an HTTP response into the backend vocabulary.
 *
 * 200 → found, 202 → in progress, 404 → not found, everything else is a
 * transport failure.
 */
export async function toBackendResponse(response: HttpResponse): Promise<BackendResponse> {
  if (response.status === 200) {
    try {
      return { kind: 'found', body: await readJson(response) }
    } catch {
      return transportFailure({
        type: 'invalid_response',
        message: 'Invalid JSON from bond data service',
        status: response.status
      })
    }
  }

  if (response.status === 202) {
    const headerHint = parseRetryAfter(response.headers.get('retry-after'))
    if (headerHint !== undefined) {
      return { kind: 'in_progress', retryAfterMs: headerHint }
    }
    let body: unknown
    try {
      body = await readJson(response)
    } catch {
      body = undefined
    }
    return { kind: 'in_progress', retryAfterMs: retryHintFromBody(body) }
  }

  if (response.status === 404) {
    return { kind: 'not_found' }
  }

  if (response.status === 401 || response.status === 403) {
    return transportFailure({ type: 'auth', message: 'API key required', status: response.status })
  }

  return transportFailure({
    type: 'http_status',
    message: `HTTP ${response.status}`,
    status: response.status
  })
}

function errorCode(error: unknown): string | undefined {
  if (error === null || typeof error !== 'object') {
    return undefined
  }
  const code = (error as { code?: unknown }).code
  if (typeof code === 'string') {
    return code
  }
  return errorCode((error as { cause?: unknown }).cause)
}

/**
 * Map a thrown network error into a transport failure.
 */
export function classifyNetworkError(error: unknown): TransportFailureResponse {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return transportFailure({
      type: 'timeout',
      message: 'Timeout - is the bond data service running?'
    })
  }

  const code = errorCode(error)
  if (code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
    return transportFailure({
      type: 'timeout',
      message: 'Timeout - is the bond data service running?'
    })
  }
  if (code !== undefined && CONNECTION_ERROR_CODES.has(code)) {
    return transportFailure({
      type: 'connection',
      message: 'Cannot connect to the bond data service'
    })
  }

  const name = error instanceof Error ? error.name : typeof error
  return transportFailure({ type: 'network', message: `Network error: ${name}` })
}

/**
 * Strip a `{ data: ... }` envelope when the service sends one.
 */
export function unwrapEnvelope(body: unknown): unknown {
  if (body !== null && typeof body === 'object' && !Array.isArray(body) && 'data' in body) {
    return (body as { data: unknown }).data
  }
  return body
}
