import { describe, it, expect } from 'vitest'
import { BusinessSearchAggregator } from '../../services/business-search.js'
import { saveLeadsForCity } from '../../services/save-leads.js'
import { toLeadRow } from '../../services/lead-store.js'
import type { BusinessRecord } from '../../services/business-record.js'
import { FakePlaceSearch, catalog, place, silentLogger } from '../fixtures/fake-place-search.js'
import { InMemoryLeadRepository } from '../fixtures/in-memory-lead-repository.js'

// ===========================================
// Test Fixtures
// ===========================================

const live = new BusinessSearchAggregator({
  capability: new FakePlaceSearch({ pages: { 'text:plumber in Austin': [[place('a'), place('b')]] } }),
  catalog: catalog(['plumber']),
  wait: async () => undefined,
  logger: silentLogger,
})

const offline = new BusinessSearchAggregator({ capability: null, logger: silentLogger })

// ===========================================
// Tests
// ===========================================

describe('saveLeadsForCity', () => {
  it('stores live leads', async () => {
    const repository = new InMemoryLeadRepository()

    const result = await saveLeadsForCity({ aggregator: live, leadRepository: repository }, 'Austin')

    expect(result).toEqual({ success: true, city: 'Austin', saved: 2, found: 2, data_source: 'live' })
    expect([...repository.rows.keys()]).toEqual(['a', 'b'])
    expect(repository.rows.get('a')?.city).toBe('Austin')
  })

  it('refuses to store sample data', async () => {
    const repository = new InMemoryLeadRepository()

    const result = await saveLeadsForCity({ aggregator: offline, leadRepository: repository }, 'Austin')

    expect(result).toEqual({
      success: false,
      city: 'Austin',
      saved: 0,
      found: 38,
      data_source: 'fallback',
      error: 'Live search is unavailable; sample data is not saved',
    })
    expect(repository.rows.size).toBe(0)
  })

  it('fails without a repository', async () => {
    const result = await saveLeadsForCity({ aggregator: live, leadRepository: null }, 'Austin')

    expect(result.success).toBe(false)
    expect(result.error).toBe('Lead storage is not configured')
  })

  it('reports repository errors', async () => {
    const repository = new InMemoryLeadRepository(new Error('Failed to save leads: permission denied'))

    const result = await saveLeadsForCity({ aggregator: live, leadRepository: repository }, 'Austin')

    expect(result).toEqual({
      success: false,
      city: 'Austin',
      saved: 0,
      found: 2,
      data_source: 'live',
      error: 'Failed to save leads: permission denied',
    })
  })
})

describe('toLeadRow', () => {
  it('maps a record onto the business_leads columns', () => {
    const record: BusinessRecord = {
      id: 'p1',
      name: 'Joe Plumbing',
      address: '1 Pipe Road',
      phone: '+1-555-0199',
      website: '',
      rating: 4.1,
      ratingCount: 12,
      category: 'plumber',
      isOpenNow: false,
    }

    expect(toLeadRow('Austin', record, new Date('2024-05-01T12:00:00.000Z'))).toEqual({
      place_id: 'p1',
      name: 'Joe Plumbing',
      address: '1 Pipe Road',
      phone: '+1-555-0199',
      website: '',
      rating: 4.1,
      total_ratings: 12,
      category: 'plumber',
      price_level: null,
      is_open: false,
      lat: null,
      lng: null,
      city: 'Austin',
      found_at: '2024-05-01T12:00:00.000Z',
    })
  })
})
