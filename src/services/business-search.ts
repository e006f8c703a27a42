import type { GeoPoint, PlaceSearchCapability, RawPlace, SearchPage } from '../providers/types.js'
import { loadSearchCatalog, type SearchCatalog } from '../config/catalog.js'
import { evaluateCandidate, type BusinessRecord } from './business-record.js'
import { createFallbackRecords } from './fallback.js'
import {
  NoGeocodeMatchError,
  UpstreamRequestFailedError,
  UpstreamUnavailableError,
  errorMessage,
  fallbackReasonFor,
  upstreamAnswered,
  type FallbackReason,
} from '../errors.js'
import { createLogger, type Logger } from '../utils/logger.js'

export interface SearchQuery {
  city: string
  businessType?: string
  radiusMeters: number
  minRating: number
  maxResults: number
  excludeWebsites: boolean
}

export type AggregationOutcome =
  | { source: 'live'; records: BusinessRecord[]; apiAvailable: true }
  | { source: 'fallback'; reason: FallbackReason; records: BusinessRecord[]; apiAvailable: boolean }

export type WaitPolicy = (ms: number) => Promise<void>

export const sleep: WaitPolicy = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface BusinessSearchOptions {
  // null when the Maps credential is missing
  capability: PlaceSearchCapability | null
  // Awaited before every next-page request
  wait?: WaitPolicy
  pageDelayMs?: number
  catalog?: SearchCatalog
  logger?: Logger
}

// One search (text or nearby) that can be followed page by page
interface PagedSearch {
  label: string
  fetch(pageToken?: string): Promise<SearchPage>
}

/**
 * Business search aggregator
 * Queries a city category by category, merges and deduplicates paginated hits,
 * enriches them with place details and filters them into business records
 */
export class BusinessSearchAggregator {
  private readonly capability: PlaceSearchCapability | null
  private readonly wait: WaitPolicy
  private readonly pageDelayMs: number
  private readonly catalog: SearchCatalog
  private readonly logger: Logger

  constructor(options: BusinessSearchOptions) {
    this.capability = options.capability
    this.wait = options.wait ?? sleep
    this.pageDelayMs = options.pageDelayMs ?? 2000
    this.catalog = options.catalog ?? loadSearchCatalog()
    this.logger = options.logger ?? createLogger('business-search')
  }

  get apiConfigured(): boolean {
    return this.capability !== null
  }

  /**
   * Never throws: returns live records, or sample records when the live search cannot run
   */
  async search(query: SearchQuery): Promise<AggregationOutcome> {
    const capability = this.capability
    if (!capability) {
      this.logger.warn('Maps API not configured, using fallback data')
      return this.fallback(query, new UpstreamUnavailableError('Place search'))
    }

    try {
      const location = await this.resolveLocation(capability, query.city)
      const hits = await this.collectHits(capability, query, location)
      this.logger.info(`Total places found across all searches: ${hits.length}`)

      const records = await this.buildRecords(capability, query, hits)
      this.logger.info(`Found ${records.length} valid businesses in ${query.city}`)

      return { source: 'live', records, apiAvailable: true }
    } catch (error) {
      this.logger.error(`Error searching businesses in ${query.city}`, errorMessage(error))
      return this.fallback(query, error)
    }
  }

  private fallback(query: SearchQuery, cause: unknown): AggregationOutcome {
    const reason = fallbackReasonFor(cause)
    const records = createFallbackRecords(query)
    this.logger.warn(`Returning ${records.length} fallback businesses for ${query.city} (${reason})`)

    return {
      source: 'fallback',
      reason,
      records,
      apiAvailable: upstreamAnswered(cause),
    }
  }

  private async resolveLocation(capability: PlaceSearchCapability, city: string): Promise<GeoPoint> {
    let point: GeoPoint | null
    try {
      point = await capability.geocode(city)
    } catch (error) {
      if (error instanceof UpstreamUnavailableError || error instanceof UpstreamRequestFailedError) {
        throw error
      }
      throw new UpstreamRequestFailedError('geocode', error)
    }

    if (!point) {
      throw new NoGeocodeMatchError(city)
    }
    return point
  }

  private async collectHits(
    capability: PlaceSearchCapability,
    query: SearchQuery,
    location: GeoPoint
  ): Promise<RawPlace[]> {
    const hits: RawPlace[] = []
    const seen = new Set<string>()
    const keywords = query.businessType ? [query.businessType] : this.catalog.keywords

    for (const keyword of keywords) {
      if (hits.length >= query.maxResults) break

      this.logger.info(`Searching for: ${keyword} in ${query.city}`)
      for (const search of this.searchesFor(capability, keyword, query, location)) {
        if (hits.length >= query.maxResults) break
        await this.drain(search, query.maxResults, hits, seen)
      }
    }

    return hits
  }

  /**
   * Text search always; nearby search only when the keyword is a known place type
   */
  private searchesFor(
    capability: PlaceSearchCapability,
    keyword: string,
    query: SearchQuery,
    location: GeoPoint
  ): PagedSearch[] {
    const searches: PagedSearch[] = [
      {
        label: `text "${keyword}"`,
        fetch: (pageToken) =>
          capability.textSearch({
            query: `${keyword} in ${query.city}`,
            location,
            radius: query.radiusMeters,
            pageToken,
          }),
      },
    ]

    if (this.catalog.placeTypes.has(keyword)) {
      searches.push({
        label: `nearby "${keyword}"`,
        fetch: (pageToken) =>
          capability.nearbySearch({
            location,
            radius: query.radiusMeters,
            type: keyword,
            pageToken,
          }),
      })
    }

    return searches
  }

  /**
   * Follow one search through its pages. A failure abandons this search only.
   */
  private async drain(
    search: PagedSearch,
    maxResults: number,
    hits: RawPlace[],
    seen: Set<string>
  ): Promise<void> {
    try {
      let page = await search.fetch()
      this.accept(page.results, hits, seen)

      while (page.nextPageToken && hits.length < maxResults) {
        // The next-page token only becomes valid after a short delay
        await this.wait(this.pageDelayMs)
        page = await search.fetch(page.nextPageToken)
        const added = this.accept(page.results, hits, seen)
        this.logger.debug(`Added ${added} more results from next page for ${search.label}`)
      }
    } catch (error) {
      this.logger.error(`Error in ${search.label} search`, errorMessage(error))
    }
  }

  private accept(results: RawPlace[], hits: RawPlace[], seen: Set<string>): number {
    let added = 0
    for (const place of results) {
      if (!place.id || seen.has(place.id)) continue
      seen.add(place.id)
      hits.push(place)
      added++
    }
    return added
  }

  private async buildRecords(
    capability: PlaceSearchCapability,
    query: SearchQuery,
    hits: RawPlace[]
  ): Promise<BusinessRecord[]> {
    const records: BusinessRecord[] = []

    for (const hit of hits) {
      if (records.length >= query.maxResults) break

      const details = await this.fetchDetails(capability, hit.id)
      if (!details) continue

      const evaluation = evaluateCandidate(hit, details, query)
      if (!evaluation.kept) {
        this.logger.debug(`Skipping ${details.name ?? hit.id}: ${evaluation.reason}`)
        continue
      }

      records.push(evaluation.record)
    }

    return records
  }

  private async fetchDetails(capability: PlaceSearchCapability, id: string): Promise<RawPlace | null> {
    try {
      return await capability.placeDetails(id)
    } catch (error) {
      this.logger.error(`Error getting place details for ${id}`, errorMessage(error))
      return null
    }
  }
}
