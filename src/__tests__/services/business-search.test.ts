/**
 * Business search aggregator tests
 *
 * - fallback when the Maps API is missing or failing
 * - rating and website filters
 * - pagination, dedup and result caps
 * - per-search and per-place failure isolation
 */

import { describe, it, expect, vi } from 'vitest'
import { BusinessSearchAggregator, type SearchQuery, type WaitPolicy } from '../../services/business-search.js'
import { UpstreamStatusError, UpstreamUnavailableError } from '../../errors.js'
import type { SearchCatalog } from '../../config/catalog.js'
import { FakePlaceSearch, catalog, place, silentLogger } from '../fixtures/fake-place-search.js'

// ===========================================
// Test Helpers
// ===========================================

function query(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return {
    city: 'Springfield',
    radiusMeters: 50000,
    minRating: 0,
    maxResults: 500,
    excludeWebsites: true,
    ...overrides,
  }
}

function aggregator(
  capability: FakePlaceSearch | null,
  searchCatalog: SearchCatalog = catalog(['plumber']),
  wait: WaitPolicy = vi.fn(async () => undefined)
) {
  return new BusinessSearchAggregator({ capability, wait, catalog: searchCatalog, logger: silentLogger })
}

const ids = (records: ReadonlyArray<{ id: string }>) => records.map((record) => record.id)

// ===========================================
// Fallback
// ===========================================

describe('BusinessSearchAggregator fallback', () => {
  it('returns deterministic sample data when no capability is configured', async () => {
    const search = aggregator(null)

    const first = await search.search(query())
    const second = await search.search(query())

    expect(search.apiConfigured).toBe(false)
    expect(first.source).toBe('fallback')
    expect(first.apiAvailable).toBe(false)
    expect(first.records.length).toBeGreaterThanOrEqual(35)
    expect(second.records).toEqual(first.records)
    if (first.source === 'fallback') {
      expect(first.reason).toBe('upstream_unavailable')
    }
  })

  it('reports a geocode with no match as a reachable API', async () => {
    const outcome = await aggregator(new FakePlaceSearch({ geocode: null })).search(query())

    expect(outcome).toMatchObject({ source: 'fallback', reason: 'no_geocode_match', apiAvailable: true })
    expect(outcome.records.length).toBe(38)
  })

  it('falls back with upstream_request_failed when geocoding throws', async () => {
    const outcome = await aggregator(new FakePlaceSearch({ geocode: new Error('socket hang up') })).search(query())

    expect(outcome).toMatchObject({ source: 'fallback', reason: 'upstream_request_failed', apiAvailable: false })
  })

  it('reports the API as reachable when geocoding answers with a non-OK status', async () => {
    const capability = new FakePlaceSearch({ geocode: new UpstreamStatusError('Google geocode', 'OVER_QUERY_LIMIT') })

    const outcome = await aggregator(capability).search(query())

    expect(outcome).toMatchObject({ source: 'fallback', reason: 'upstream_request_failed', apiAvailable: true })
  })

  it('keeps the unavailable reason when the credential is rejected', async () => {
    const capability = new FakePlaceSearch({ geocode: new UpstreamUnavailableError('Google Places', 'key rejected') })

    const outcome = await aggregator(capability).search(query())

    expect(outcome).toMatchObject({ source: 'fallback', reason: 'upstream_unavailable', apiAvailable: false })
  })

  it('applies minRating and maxResults to sample data', async () => {
    const outcome = await aggregator(null).search(query({ minRating: 4.5, maxResults: 3 }))

    expect(ids(outcome.records)).toEqual(['fallback_springfield_1', 'fallback_springfield_2', 'fallback_springfield_5'])
  })
})

// ===========================================
// Filters
// ===========================================

describe('BusinessSearchAggregator filters', () => {
  it('drops places rated below minRating', async () => {
    const capability = new FakePlaceSearch({
      pages: {
        'text:plumber in Springfield': [
          [
            place('a', { rating: 3.9 }),
            place('b', { rating: 4.2 }),
            place('c', { rating: 4.7 }),
            place('d', { rating: 4.9 }),
          ],
        ],
      },
    })

    const outcome = await aggregator(capability).search(query({ minRating: 4.5 }))

    expect(outcome.source).toBe('live')
    expect(ids(outcome.records)).toEqual(['c', 'd'])
    expect(outcome.records.map((record) => record.rating)).toEqual([4.7, 4.9])
  })

  it('excludes places with a real website and keeps placeholder ones', async () => {
    const hits = [
      place('a', { website: 'http://acme-corp.com' }),
      place('b', { website: '' }),
      place('c', { website: 'http://localhost:3000' }),
      place('d', { website: 'placeholder.example.com' }),
    ]
    const capability = new FakePlaceSearch({ pages: { 'text:plumber in Springfield': [hits] } })

    const excluded = await aggregator(capability).search(query())
    const included = await aggregator(capability).search(query({ excludeWebsites: false }))

    expect(ids(excluded.records)).toEqual(['b', 'c', 'd'])
    expect(ids(included.records)).toEqual(['a', 'b', 'c', 'd'])
  })

  it('drops records without a name or an address', async () => {
    const capability = new FakePlaceSearch({
      pages: {
        'text:plumber in Springfield': [
          [place('a', { name: '' }), place('b', { formattedAddress: undefined }), place('c')],
        ],
      },
    })

    const outcome = await aggregator(capability).search(query())

    expect(ids(outcome.records)).toEqual(['c'])
  })
})

// ===========================================
// Pagination and dedup
// ===========================================

describe('BusinessSearchAggregator pagination', () => {
  it('follows next-page tokens until maxResults and waits before each next page', async () => {
    const pages = [0, 1, 2].map((page) =>
      Array.from({ length: 20 }, (_, index) => place(`p${page * 20 + index}`))
    )
    const capability = new FakePlaceSearch({ pages: { 'text:plumber in Springfield': pages } })
    const wait = vi.fn(async () => undefined)

    const outcome = await aggregator(capability, catalog(['plumber']), wait).search(query({ maxResults: 50 }))

    expect(outcome.records).toHaveLength(50)
    expect(outcome.records[0].id).toBe('p0')
    expect(outcome.records[49].id).toBe('p49')
    expect(wait).toHaveBeenCalledTimes(2)
    expect(wait).toHaveBeenCalledWith(2000)
  })

  it('deduplicates places found by several searches', async () => {
    const capability = new FakePlaceSearch({
      pages: {
        'text:restaurant in Springfield': [[place('a'), place('b')]],
        'nearby:restaurant': [[place('b'), place('c')]],
        'text:cafe in Springfield': [[place('c'), place('d')]],
      },
    })

    const outcome = await aggregator(capability, catalog(['restaurant', 'cafe'], ['restaurant'])).search(query())

    expect(ids(outcome.records)).toEqual(['a', 'b', 'c', 'd'])
    expect(capability.calls).toContain('nearby:restaurant#0')
    expect(capability.calls).not.toContain('nearby:cafe#0')
    expect(capability.calls.filter((call) => call === 'details:b')).toHaveLength(1)
  })

  it('stops querying keywords once maxResults hits are collected', async () => {
    const capability = new FakePlaceSearch({
      pages: {
        'text:restaurant in Springfield': [[place('a'), place('b')]],
        'text:cafe in Springfield': [[place('c')]],
      },
    })

    const outcome = await aggregator(capability, catalog(['restaurant', 'cafe'])).search(query({ maxResults: 2 }))

    expect(ids(outcome.records)).toEqual(['a', 'b'])
    expect(capability.calls).not.toContain('text:cafe in Springfield#0')
  })

  it('searches only the requested business type', async () => {
    const capability = new FakePlaceSearch({
      pages: { 'text:bakery in Springfield': [[place('a')]] },
    })

    const outcome = await aggregator(capability, catalog(['restaurant'], ['bakery'])).search(
      query({ businessType: 'bakery' })
    )

    expect(ids(outcome.records)).toEqual(['a'])
    expect(capability.calls).toEqual([
      'geocode:Springfield',
      'text:bakery in Springfield#0',
      'nearby:bakery#0',
      'details:a',
    ])
  })
})

// ===========================================
// Failure isolation
// ===========================================

describe('BusinessSearchAggregator failure isolation', () => {
  it('abandons only the search whose page failed', async () => {
    const capability = new FakePlaceSearch({
      pages: {
        'text:restaurant in Springfield': [[place('a')], [place('b')]],
        'nearby:restaurant': [[place('c')]],
      },
      failingPages: ['text:restaurant in Springfield#1'],
    })

    const outcome = await aggregator(capability, catalog(['restaurant'], ['restaurant'])).search(query())

    expect(outcome.source).toBe('live')
    expect(ids(outcome.records)).toEqual(['a', 'c'])
  })

  it('drops hits whose details are missing or fail', async () => {
    const capability = new FakePlaceSearch({
      pages: { 'text:plumber in Springfield': [[place('a'), place('b'), place('c')]] },
      details: { a: null, b: new Error('timeout') },
    })

    const outcome = await aggregator(capability).search(query())

    expect(outcome.source).toBe('live')
    expect(ids(outcome.records)).toEqual(['c'])
  })
})
