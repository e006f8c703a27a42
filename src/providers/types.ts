/**
 * Core type definitions for the place search abstraction layer
 */

export interface GeoPoint {
  lat: number
  lng: number
}

// Provider-neutral search hit or detail record
export interface RawPlace {
  id: string
  name?: string
  formattedAddress?: string
  phone?: string
  website?: string
  rating?: number
  ratingCount?: number
  priceLevel?: number // 0-4
  types: string[]
  openNow?: boolean
  location?: GeoPoint
}

// One page of search results
export interface SearchPage {
  results: RawPlace[]
  nextPageToken?: string // present while more pages exist
}

export interface TextSearchRequest {
  query: string
  location: GeoPoint
  radius: number // meters
  pageToken?: string
}

export interface NearbySearchRequest {
  location: GeoPoint
  radius: number // meters
  type?: string // place-type code
  pageToken?: string
}

// What the business search aggregator needs from a mapping service
export interface PlaceSearchCapability {
  readonly name: string

  geocode(address: string): Promise<GeoPoint | null>
  textSearch(request: TextSearchRequest): Promise<SearchPage>
  nearbySearch(request: NearbySearchRequest): Promise<SearchPage>
  placeDetails(id: string): Promise<RawPlace | null>
  healthCheck(): Promise<boolean>
}

// Provider configuration
export interface ProviderConfig {
  name: string
  timeout: number // Max wait per request in ms
}
