import type { SupabaseClient } from '@supabase/supabase-js'
import type { BusinessRecord } from './business-record.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('lead-store')

export const LEADS_TABLE = 'business_leads'

export interface SaveLeadsOutcome {
  saved: number
  table: string
}

/**
 * Where found leads are kept for the lead manager and SDR agents
 */
export interface LeadRepository {
  saveLeads(city: string, records: readonly BusinessRecord[]): Promise<SaveLeadsOutcome>
  healthCheck(): Promise<boolean>
}

// Row shape of the business_leads table
export interface LeadRow {
  place_id: string
  name: string
  address: string
  phone: string
  website: string
  rating: number
  total_ratings: number
  category: string
  price_level: number | null
  is_open: boolean
  lat: number | null
  lng: number | null
  city: string
  found_at: string
}

export function toLeadRow(city: string, record: BusinessRecord, foundAt: Date): LeadRow {
  return {
    place_id: record.id,
    name: record.name,
    address: record.address,
    phone: record.phone,
    website: record.website,
    rating: record.rating,
    total_ratings: record.ratingCount,
    category: record.category,
    price_level: record.priceLevel ?? null,
    is_open: record.isOpenNow,
    lat: record.coordinates?.lat ?? null,
    lng: record.coordinates?.lng ?? null,
    city,
    found_at: foundAt.toISOString(),
  }
}

/**
 * Lead storage in Supabase. Re-saving a place updates its row.
 */
export class SupabaseLeadRepository implements LeadRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = LEADS_TABLE
  ) {}

  async saveLeads(city: string, records: readonly BusinessRecord[]): Promise<SaveLeadsOutcome> {
    if (records.length === 0) {
      return { saved: 0, table: this.table }
    }

    const foundAt = new Date()
    const rows = records.map((record) => toLeadRow(city, record, foundAt))

    const { error } = await this.client.from(this.table).upsert(rows, { onConflict: 'place_id' })

    if (error) {
      logger.error('saveLeads failed:', error)
      throw new Error(`Failed to save leads: ${error.message}`)
    }

    logger.info(`Saved ${rows.length} leads for ${city}`)
    return { saved: rows.length, table: this.table }
  }

  async healthCheck(): Promise<boolean> {
    const { error } = await this.client
      .from(this.table)
      .select('place_id', { head: true }) // returns headers only, no row payload
      .limit(1)

    if (error) {
      logger.error('Lead store connection failed:', error)
      return false
    }
    return true
  }
}
