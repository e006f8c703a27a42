import { tool } from 'ai'
import { z } from 'zod'
import type { BusinessSearchAggregator } from './business-search.js'
import type { LeadRepository } from './lead-store.js'
import { searchBusinesses, searchHighRated, searchNearby } from './lead-search.js'
import { saveLeadsForCity } from './save-leads.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('lead-finder-tools')

export interface LeadFinderToolDeps {
  aggregator: BusinessSearchAggregator
  leadRepository: LeadRepository | null
}

/**
 * Lead finder tool definitions
 * Each tool represents a capability that the LLM can invoke
 */
export function createLeadFinderTools({ aggregator, leadRepository }: LeadFinderToolDeps) {
  /**
   * Search a city for businesses without a real website
   */
  const searchBusinessesTool = tool({
    description:
      'Search for businesses in a city using Google Maps. By default only businesses without a working website are returned, since those are the leads we want.',
    inputSchema: z.object({
      city: z.string().describe('Name of the city to search in'),
      business_type: z.string().optional().describe('Optional business type, e.g. "plumber" or "bakery"'),
      min_rating: z.number().min(0).max(5).optional().describe('Minimum rating (default: 0)'),
      max_results: z.number().int().min(1).optional().describe('Maximum number of results (default: 500)'),
      exclude_websites: z
        .boolean()
        .optional()
        .describe('Only return businesses without websites (default: true)'),
    }),
    execute: async (input) => {
      logger.info(`Tool search_businesses: city=${input.city}, type=${input.business_type ?? 'any'}`)
      return searchBusinesses(aggregator, input)
    },
  })

  const searchNearbyTool = tool({
    description: 'Search for one specific type of business in a city (default: restaurant).',
    inputSchema: z.object({
      city: z.string().describe('Name of the city to search in'),
      business_type: z.string().optional().describe('Business type (default: restaurant)'),
    }),
    execute: async ({ city, business_type }) => {
      logger.info(`Tool search_nearby_businesses: city=${city}, type=${business_type ?? 'restaurant'}`)
      return searchNearby(aggregator, city, business_type)
    },
  })

  const searchHighRatedTool = tool({
    description: 'Search for highly-rated businesses in a city.',
    inputSchema: z.object({
      city: z.string().describe('Name of the city to search in'),
      min_rating: z.number().min(0).max(5).optional().describe('Minimum rating (default: 4.0)'),
    }),
    execute: async ({ city, min_rating }) => {
      logger.info(`Tool search_high_rated_businesses: city=${city}, min_rating=${min_rating ?? 4.0}`)
      return searchHighRated(aggregator, city, min_rating)
    },
  })

  /**
   * Search a city and store the leads for further processing
   */
  const saveLeadsTool = tool({
    description: 'Find the leads in a city and save them to the database for the lead manager.',
    inputSchema: z.object({
      city: z.string().describe('Name of the city whose leads should be saved'),
      business_type: z.string().optional().describe('Optional business type filter'),
    }),
    execute: async ({ city, business_type }) => {
      logger.info(`Tool save_leads: city=${city}`)
      return saveLeadsForCity({ aggregator, leadRepository }, city, business_type)
    },
  })

  return {
    search_businesses: searchBusinessesTool,
    search_nearby_businesses: searchNearbyTool,
    search_high_rated_businesses: searchHighRatedTool,
    save_leads: saveLeadsTool,
  }
}

export type LeadFinderTools = ReturnType<typeof createLeadFinderTools>
