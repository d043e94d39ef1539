/**
 * Settings Types
 */

export interface ClientSettings {
  /** Base URL of the bond data service */
  readonly baseUrl: string
  /** Sent as X-API-Key on privileged calls */
  readonly apiKey?: string | undefined
  /** TTL of resolved records and list results */
  readonly cacheTtlSeconds: number
  /** TTL of the negative entry written when the service confirms absence */
  readonly notFoundTtlSeconds: number
  /** TTL of the negative entry written when polling runs out of attempts */
  readonly exhaustedTtlSeconds: number
  /** Cache capacity, pending markers included */
  readonly cacheMaxEntries: number
  /** Ceiling on "still searching" answers before a lookup is abandoned */
  readonly maxPollAttempts: number
  /** Timeout of every individual backend call */
  readonly requestTimeoutMs: number
  /** First poll delay; doubles per attempt */
  readonly pollBaseDelayMs: number
  /** Upper bound on any poll delay, service hints included */
  readonly pollMaxDelayMs: number
  /** Interval of the expired-entry sweep while a context is open */
  readonly sweepIntervalMs: number
}
