/**
 * Scripted Transport for Tests
 *
 * In-process stand-in for the bond data service. Responses are queued per
 * path; the last queued response for a path repeats once the queue drains.
 * Every call is recorded.
 *
 * Usage:
 * ```ts
 * const transport = new ScriptedTransport()
 * transport.enqueue('/resolve/AA000000000X', inProgress(), found({ coupon_rate: 4.625 }))
 * ```
 */

import type { BackendTransport } from '../transport'
import type {
  BackendResponse,
  CallOptions,
  HttpMethod,
  TransportFailureCause
} from '../types'

export interface RecordedCall {
  readonly method: HttpMethod
  readonly path: string
  readonly options: CallOptions
}

type Responder = BackendResponse | (() => BackendResponse | Promise<BackendResponse>)

export class ScriptedTransport implements BackendTransport {
  readonly calls: RecordedCall[] = []
  private readonly scripts = new Map<string, Responder[]>()
  closed = false

  enqueue(path: string, ...responses: Responder[]): this {
    const queue = this.scripts.get(path) ?? []
    queue.push(...responses)
    this.scripts.set(path, queue)
    return this
  }

  callsTo(path: string): number {
    return this.calls.filter((c) => c.path === path).length
  }

  async call(method: HttpMethod, path: string, options: CallOptions = {}): Promise<BackendResponse> {
    this.calls.push({ method, path, options })
    const queue = this.scripts.get(path)
    if (!queue || queue.length === 0) {
      return { kind: 'not_found' }
    }
    const responder = queue.length > 1 ? queue.shift() : queue[0]
    if (responder === undefined) {
      return { kind: 'not_found' }
    }
    return typeof responder === 'function' ? responder() : responder
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export function found(body: unknown): BackendResponse {
  return { kind: 'found', body }
}

export function inProgress(retryAfterMs?: number): BackendResponse {
  return { kind: 'in_progress', retryAfterMs }
}

export function notFound(): BackendResponse {
  return { kind: 'not_found' }
}

export function failure(cause: Partial<TransportFailureCause> = {}): BackendResponse {
  return {
    kind: 'transport_failure',
    cause: {
      type: cause.type ?? 'timeout',
      message: cause.message ?? 'Timeout - is the bond data service running?',
      status: cause.status
    }
  }
}

/**
 * A response that stays unresolved until the test releases it.
 */
export function deferred(): {
  readonly responder: () => Promise<BackendResponse>
  readonly release: (response: BackendResponse) => void
} {
  let release: (response: BackendResponse) => void = () => undefined
  const promise = new Promise<BackendResponse>((resolve) => {
    release = resolve
  })
  return { responder: () => promise, release: (response) => release(response) }
}
