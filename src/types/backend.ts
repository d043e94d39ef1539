/**
 * Backend Types
 *
 * The vocabulary every HTTP exchange with the bond data service is mapped into
 * before anything else sees it.
 */

export type TransportFailureType =
  | 'timeout'
  | 'connection'
  | 'network'
  | 'http_status'
  | 'auth'
  | 'invalid_response'
  | 'closed'

export interface TransportFailureCause {
  readonly type: TransportFailureType
  readonly message: string
  readonly status?: number | undefined
}

export interface FoundResponse {
  readonly kind: 'found'
  readonly body: unknown
}

export interface InProgressResponse {
  readonly kind: 'in_progress'
  /** Suggested delay before the next poll, when the service sent one */
  readonly retryAfterMs?: number | undefined
}

export interface NotFoundResponse {
  readonly kind: 'not_found'
}

export interface TransportFailureResponse {
  readonly kind: 'transport_failure'
  readonly cause: TransportFailureCause
}

export type BackendResponse =
  | FoundResponse
  | InProgressResponse
  | NotFoundResponse
  | TransportFailureResponse

export type BackendFailureResponse = Exclude<BackendResponse, FoundResponse>

export type HttpMethod = 'GET' | 'POST'

export type QueryParams = Readonly<Record<string, string | number | boolean | undefined>>

export interface CallOptions {
  readonly params?: QueryParams | undefined
  readonly body?: unknown
  readonly headers?: Readonly<Record<string, string>> | undefined
}
