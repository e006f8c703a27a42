import { Client, Status } from '@googlemaps/google-maps-services-js'
import { BaseProvider } from './base.js'
import type {
  GeoPoint,
  NearbySearchRequest,
  PlaceSearchCapability,
  RawPlace,
  SearchPage,
  TextSearchRequest,
} from './types.js'
import { UpstreamRequestFailedError, UpstreamStatusError, UpstreamUnavailableError } from '../errors.js'

// Fields of a Google place result we read; search hits carry a subset
interface GooglePlaceFields {
  place_id?: string
  name?: string
  formatted_address?: string
  vicinity?: string
  formatted_phone_number?: string
  website?: string
  rating?: number
  user_ratings_total?: number
  price_level?: number
  types?: readonly string[]
  opening_hours?: { open_now?: boolean }
  geometry?: { location?: { lat: number; lng: number } }
}

export interface GooglePlacesProviderOptions {
  apiKey: string
  client?: Client
  timeout?: number
}

/**
 * Google Places Provider
 * Geocoding, text search, nearby search and place details over the Maps web services
 */
export class GooglePlacesProvider extends BaseProvider {
  private readonly client: Client
  private readonly apiKey: string

  constructor(options: GooglePlacesProviderOptions) {
    super({
      name: 'google',
      timeout: options.timeout ?? 10000,
    })

    this.apiKey = options.apiKey
    this.client = options.client ?? new Client({})
  }

  async geocode(address: string): Promise<GeoPoint | null> {
    const data = await this.request('geocode', () =>
      this.client.geocode({
        params: { address, key: this.apiKey },
        timeout: this.timeout,
      })
    )

    this.assertSearchStatus('geocode', data.status, data.error_message)

    const location = data.results[0]?.geometry.location
    if (!location) return null

    this.log('info', `Found location for ${address}: ${location.lat},${location.lng}`)
    return { lat: location.lat, lng: location.lng }
  }

  async textSearch(request: TextSearchRequest): Promise<SearchPage> {
    const data = await this.request(`text search "${request.query}"`, () =>
      this.client.textSearch({
        params: {
          query: request.query,
          location: request.location,
          radius: request.radius,
          pagetoken: request.pageToken,
          key: this.apiKey,
        },
        timeout: this.timeout,
      })
    )

    this.assertSearchStatus('text search', data.status, data.error_message)
    return this.toPage(data.results, data.next_page_token)
  }

  async nearbySearch(request: NearbySearchRequest): Promise<SearchPage> {
    const data = await this.request(`nearby search ${request.type ?? 'any'}`, () =>
      this.client.placesNearby({
        params: {
          location: request.location,
          radius: request.radius,
          type: request.type,
          pagetoken: request.pageToken,
          key: this.apiKey,
        },
        timeout: this.timeout,
      })
    )

    this.assertSearchStatus('nearby search', data.status, data.error_message)
    return this.toPage(data.results, data.next_page_token)
  }

  /**
   * Get place details by Google Place ID
   */
  async placeDetails(id: string): Promise<RawPlace | null> {
    const data = await this.request(`place details ${id}`, () =>
      this.client.placeDetails({
        params: { place_id: id, key: this.apiKey },
        timeout: this.timeout,
      })
    )

    if (data.status === Status.REQUEST_DENIED) {
      throw new UpstreamUnavailableError('Google Places', data.error_message)
    }
    if (data.status !== Status.OK) {
      this.log('warn', `No details for ${id}: ${data.status}`)
      return null
    }

    return this.transformGooglePlace(data.result)
  }

  /**
   * Run one API call, timing it and wrapping transport errors
   */
  private async request<T>(operation: string, fn: () => Promise<{ data: T }>): Promise<T> {
    try {
      const { result, latency } = await this.measureTime(fn)
      this.log('debug', `${operation} answered in ${latency}ms`)
      return result.data
    } catch (error) {
      this.log('error', `Google ${operation} failed`, error instanceof Error ? error.message : error)
      throw new UpstreamRequestFailedError(`Google ${operation}`, error)
    }
  }

  private assertSearchStatus(operation: string, status: Status, detail?: string): void {
    if (status === Status.OK || status === Status.ZERO_RESULTS) return

    if (status === Status.REQUEST_DENIED) {
      throw new UpstreamUnavailableError('Google Places', detail)
    }
    throw new UpstreamStatusError(`Google ${operation}`, status, detail)
  }

  private toPage(results: readonly GooglePlaceFields[], nextPageToken?: string): SearchPage {
    const places = results.map((place) => this.transformGooglePlace(place))
    return nextPageToken ? { results: places, nextPageToken } : { results: places }
  }

  /**
   * Transform Google Place to our provider-neutral format
   */
  private transformGooglePlace(googlePlace: GooglePlaceFields): RawPlace {
    const location = googlePlace.geometry?.location

    return {
      id: googlePlace.place_id ?? '',
      name: googlePlace.name,
      formattedAddress: googlePlace.formatted_address ?? googlePlace.vicinity,
      phone: googlePlace.formatted_phone_number,
      website: googlePlace.website,
      rating: googlePlace.rating,
      ratingCount: googlePlace.user_ratings_total,
      priceLevel: googlePlace.price_level,
      types: [...(googlePlace.types ?? [])],
      openNow: googlePlace.opening_hours?.open_now,
      location: location ? { lat: location.lat, lng: location.lng } : undefined,
    }
  }
}

/**
 * Resolve the Maps capability once at startup; without a key the search runs on fallback data
 */
export function createPlaceSearchCapability(apiKey: string | undefined): PlaceSearchCapability | null {
  if (!apiKey) {
    return null
  }
  return new GooglePlacesProvider({ apiKey })
}
