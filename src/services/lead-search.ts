import { z } from 'zod'
import type { BusinessSearchAggregator, SearchQuery } from './business-search.js'
import type { BusinessRecord } from './business-record.js'
import type { FallbackReason } from '../errors.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('lead-search')

export const DEFAULT_RADIUS_METERS = 50000
export const DEFAULT_MAX_RESULTS = 500

export const searchRequestSchema = z.object({
  city: z.string().trim().min(1, 'City is required'),
  // Blank means no type: search the whole keyword catalog
  business_type: z
    .string()
    .trim()
    .nullish()
    .transform((value) => value || null),
  radius: z.number().int().positive().default(DEFAULT_RADIUS_METERS),
  min_rating: z.number().min(0).max(5).default(0),
  max_results: z.number().int().min(1).default(DEFAULT_MAX_RESULTS),
  exclude_websites: z.boolean().default(true),
})

export type SearchRequest = z.input<typeof searchRequestSchema>

export interface SearchMetadata {
  city: string
  business_type: string | null
  min_rating: number
  max_results: number
  radius: number
  exclude_websites: boolean
  // True only when the Maps API answered during this call
  api_available: boolean
  data_source: 'live' | 'fallback' | 'none'
  fallback_reason?: FallbackReason
  latency_ms: number
}

export interface SearchResult {
  status: 'success' | 'error'
  message?: string
  totalResults: number
  results: BusinessRecord[]
  searchMetadata: SearchMetadata
}

export function toSearchQuery(request: z.output<typeof searchRequestSchema>): SearchQuery {
  return {
    city: request.city,
    businessType: request.business_type ?? undefined,
    radiusMeters: request.radius,
    minRating: request.min_rating,
    maxResults: request.max_results,
    excludeWebsites: request.exclude_websites,
  }
}

/**
 * Search a city for businesses (by default, ones without a real website)
 * and wrap the outcome with its search metadata
 */
export async function searchBusinesses(
  aggregator: BusinessSearchAggregator,
  request: SearchRequest
): Promise<SearchResult> {
  const start = performance.now()
  const parsed = searchRequestSchema.safeParse(request)

  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ')
    return errorResult(request, message, start)
  }

  try {
    const outcome = await aggregator.search(toSearchQuery(parsed.data))

    return {
      status: 'success',
      totalResults: outcome.records.length,
      results: outcome.records,
      searchMetadata: {
        city: parsed.data.city,
        business_type: parsed.data.business_type ?? null,
        min_rating: parsed.data.min_rating,
        max_results: parsed.data.max_results,
        radius: parsed.data.radius,
        exclude_websites: parsed.data.exclude_websites,
        api_available: outcome.apiAvailable,
        data_source: outcome.source,
        ...(outcome.source === 'fallback' ? { fallback_reason: outcome.reason } : {}),
        latency_ms: Math.round(performance.now() - start),
      },
    }
  } catch (error) {
    logger.error('Business search failed', error)
    return errorResult(request, errorMessage(error), start)
  }
}

function errorResult(request: SearchRequest, message: string, start: number): SearchResult {
  return {
    status: 'error',
    message,
    totalResults: 0,
    results: [],
    searchMetadata: {
      city: request.city,
      business_type: request.business_type || null,
      min_rating: request.min_rating ?? 0,
      max_results: request.max_results ?? DEFAULT_MAX_RESULTS,
      radius: request.radius ?? DEFAULT_RADIUS_METERS,
      exclude_websites: request.exclude_websites ?? true,
      api_available: false,
      data_source: 'none',
      latency_ms: Math.round(performance.now() - start),
    },
  }
}

/**
 * Businesses of one type in the city
 */
export function searchNearby(
  aggregator: BusinessSearchAggregator,
  city: string,
  businessType = 'restaurant'
): Promise<SearchResult> {
  return searchBusinesses(aggregator, { city, business_type: businessType })
}

/**
 * Businesses in the city rated at least `minRating`
 */
export function searchHighRated(
  aggregator: BusinessSearchAggregator,
  city: string,
  minRating = 4.0
): Promise<SearchResult> {
  return searchBusinesses(aggregator, { city, min_rating: minRating })
}
