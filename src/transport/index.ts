/**
 * HTTP Transport
 *
 * The only component that performs network I/O. One long-lived undici agent
 * (connection pool) is built on first use and shared by every caller of the
 * transport; its configuration never changes after construction.
 */

import { Agent, request } from 'undici'
import {
  classifyNetworkError,
  type HttpRequestInit,
  type HttpResponse,
  type HttpSendFn,
  toBackendResponse,
  transportFailure
} from '../http'
import { type Logger, silentLogger } from '../logger'
import type { BackendResponse, CallOptions, HttpMethod, QueryParams } from '../types'

const DEFAULT_TIMEOUT_MS = 10_000
const DEFAULT_CONNECTIONS = 10
const KEEP_ALIVE_TIMEOUT_MS = 30_000

export interface BackendTransport {
  call(method: HttpMethod, path: string, options?: CallOptions): Promise<BackendResponse>
  close(): Promise<void>
}

export interface TransportConfig {
  /** Base URL of the bond data service */
  readonly baseUrl: string
  /** Per-call timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number
  /** Maximum pooled connections to the service (default: 10) */
  readonly connections?: number
  /** Custom send function for testing/mocking */
  readonly send?: HttpSendFn
  readonly logger?: Logger
}

function normalizedBaseUrl(baseUrl: string): string {
  if (!baseUrl) {
    throw new Error('baseUrl is required for the bond data transport')
  }
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl
}

/**
 * Build the request URL, dropping undefined and empty query values.
 */
export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = `${baseUrl}${path.startsWith('/') ? path : `/${path}`}`
  if (!params) {
    return url
  }
  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === '') continue
    search.set(key, String(value))
  }
  const query = search.toString()
  return query ? `${url}?${query}` : url
}

function headerValue(value: string | string[] | undefined): string | null {
  if (value === undefined) return null
  return Array.isArray(value) ? (value[0] ?? null) : value
}

/**
 * Send function backed by a pooled undici agent.
 */
export function createAgentSend(agent: Agent): HttpSendFn {
  return async (url: string, init: HttpRequestInit): Promise<HttpResponse> => {
    const method = init.method === 'POST' ? 'POST' : 'GET'
    const response = await request(url, {
      method,
      headers: init.headers,
      body: init.body,
      signal: init.signal,
      dispatcher: agent
    })
    const text = await response.body.text()
    return {
      ok: response.statusCode >= 200 && response.statusCode < 300,
      status: response.statusCode,
      headers: {
        get: (name: string) => headerValue(response.headers[name.toLowerCase()])
      },
      text: async () => text,
      json: async () => JSON.parse(text) as unknown
    }
  }
}

/**
 * Transport over HTTP with a lazily built, process-lifetime connection pool.
 */
export class HttpTransport implements BackendTransport {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly connections: number
  private readonly logger: Logger
  private readonly injectedSend: HttpSendFn | undefined
  private agent: Agent | null = null
  private send: HttpSendFn | null = null
  private closed = false

  constructor(config: TransportConfig) {
    this.baseUrl = normalizedBaseUrl(config.baseUrl)
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.connections = config.connections ?? DEFAULT_CONNECTIONS
    this.logger = config.logger ?? silentLogger
    this.injectedSend = config.send
  }

  /**
   * The first caller builds the pool; everyone after reuses it. Construction
   * is synchronous, so two callers can never both observe an empty slot.
   */
  private getSend(): HttpSendFn {
    if (this.send) {
      return this.send
    }
    if (this.injectedSend) {
      this.send = this.injectedSend
      return this.send
    }
    this.agent = new Agent({
      connections: this.connections,
      keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs
    })
    this.send = createAgentSend(this.agent)
    this.logger.verbose(`HTTP pool opened for ${this.baseUrl}`)
    return this.send
  }

  get initialized(): boolean {
    return this.send !== null
  }

  async call(method: HttpMethod, path: string, options: CallOptions = {}): Promise<BackendResponse> {
    if (this.closed) {
      return transportFailure({ type: 'closed', message: 'Transport is closed' })
    }

    const url = buildUrl(this.baseUrl, path, options.params)
    const headers: Record<string, string> = { Accept: 'application/json', ...options.headers }
    let body: string | undefined
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json'
      body = JSON.stringify(options.body)
    }

    try {
      const response = await this.getSend()(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      const result = await toBackendResponse(response)
      if (result.kind === 'transport_failure') {
        this.logger.verbose(`${method} ${path} failed: ${result.cause.message}`)
      }
      return result
    } catch (error) {
      const failure = classifyNetworkError(error)
      this.logger.verbose(`${method} ${path} failed: ${failure.cause.message}`)
      return failure
    }
  }

  async close(): Promise<void> {
    this.closed = true
    const agent = this.agent
    this.agent = null
    this.send = null
    if (agent) {
      await agent.close()
    }
  }
}
