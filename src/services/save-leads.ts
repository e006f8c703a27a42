import type { BusinessSearchAggregator } from './business-search.js'
import type { LeadRepository } from './lead-store.js'
import { searchBusinesses } from './lead-search.js'
import { errorMessage } from '../errors.js'

export interface SaveLeadsResult {
  success: boolean
  city: string
  saved: number
  found: number
  data_source: 'live' | 'fallback' | 'none'
  error?: string
}

/**
 * Search the city, then store whatever was found
 */
export async function saveLeadsForCity(
  deps: { aggregator: BusinessSearchAggregator; leadRepository: LeadRepository | null },
  city: string,
  businessType?: string
): Promise<SaveLeadsResult> {
  if (!deps.leadRepository) {
    return {
      success: false,
      city,
      saved: 0,
      found: 0,
      data_source: 'none',
      error: 'Lead storage is not configured',
    }
  }

  const search = await searchBusinesses(deps.aggregator, { city, business_type: businessType })
  if (search.status === 'error') {
    return {
      success: false,
      city,
      saved: 0,
      found: 0,
      data_source: 'none',
      error: search.message,
    }
  }

  // Sample data never goes into the lead table
  if (search.searchMetadata.data_source !== 'live') {
    return {
      success: false,
      city,
      saved: 0,
      found: search.totalResults,
      data_source: search.searchMetadata.data_source,
      error: 'Live search is unavailable; sample data is not saved',
    }
  }

  try {
    const { saved } = await deps.leadRepository.saveLeads(city, search.results)
    return { success: true, city, saved, found: search.totalResults, data_source: search.searchMetadata.data_source }
  } catch (error) {
    return {
      success: false,
      city,
      saved: 0,
      found: search.totalResults,
      data_source: search.searchMetadata.data_source,
      error: errorMessage(error),
    }
  }
}
