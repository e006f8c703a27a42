/**
 * Upstream failure taxonomy for the place search layer.
 * None of these reach the caller of a search: the aggregator turns them into fallback data.
 */

export type FallbackReason = 'upstream_unavailable' | 'no_geocode_match' | 'upstream_request_failed'

/**
 * No credential, or the credential was rejected by the upstream API
 */
export class UpstreamUnavailableError extends Error {
  readonly reason = 'upstream_unavailable' as const

  constructor(capability: string, detail?: string) {
    super(detail ? `${capability} is unavailable: ${detail}` : `${capability} is unavailable`)
    this.name = 'UpstreamUnavailableError'
  }
}

/**
 * Network or HTTP failure, or a non-OK status, on a single upstream request
 */
export class UpstreamRequestFailedError extends Error {
  readonly reason = 'upstream_request_failed' as const

  constructor(operation: string, cause?: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause })
    this.name = 'UpstreamRequestFailedError'
  }
}

/**
 * The upstream API answered, but with a non-OK status (quota, invalid request, ...)
 */
export class UpstreamStatusError extends UpstreamRequestFailedError {
  constructor(
    operation: string,
    readonly status: string,
    detail?: string
  ) {
    super(operation, detail ? `${status} ${detail}` : status)
    this.name = 'UpstreamStatusError'
  }
}

export class NoGeocodeMatchError extends Error {
  readonly reason = 'no_geocode_match' as const

  constructor(readonly city: string) {
    super(`Could not find location for city: ${city}`)
    this.name = 'NoGeocodeMatchError'
  }
}

export function fallbackReasonFor(error: unknown): FallbackReason {
  if (
    error instanceof UpstreamUnavailableError ||
    error instanceof UpstreamRequestFailedError ||
    error instanceof NoGeocodeMatchError
  ) {
    return error.reason
  }
  return 'upstream_request_failed'
}

/**
 * Did the upstream API answer before this error? A geocode with no match or a
 * non-OK status counts as reachable; transport failures and rejected keys do not.
 */
export function upstreamAnswered(error: unknown): boolean {
  return error instanceof NoGeocodeMatchError || error instanceof UpstreamStatusError
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}
