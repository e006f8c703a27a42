import { generateText, stepCountIs, type LanguageModel } from 'ai'
import type { BusinessSearchAggregator } from './business-search.js'
import type { LeadRepository } from './lead-store.js'
import { searchBusinesses, type SearchResult } from './lead-search.js'
import { saveLeadsForCity, type SaveLeadsResult } from './save-leads.js'
import { createLeadFinderTools, type LeadFinderTools } from './tools.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('lead-finder-agent')

export const LEAD_FINDER_INSTRUCTIONS = `You are the Lead Finder agent.
You find small local businesses that have no website presence, because they are prospects for web services.
Use search_businesses to search a city. Use the other search tools when the user asks for one business type or for highly-rated businesses.
Use save_leads only when the user asks to save or store leads.
Answer with a short summary: how many leads were found, in which city, and a few example names with their phone numbers.
If a search result reports data_source "fallback", say that the results are sample data.`

export interface LeadRequest {
  intent: 'search' | 'save'
  city: string | null
}

const CITY_PATTERN = /\b(?:[Ii]n|[Ff]or|[Nn]ear|[Aa]round)\s+([A-Z][\w'.-]*(?:,?\s+[A-Z][\w'.-]*)*)/g
// Capitalized words after "for" or "in" that name what to find, not where
const GENERIC_NOUNS = new Set([
  'Leads',
  'Lead',
  'Businesses',
  'Business',
  'Companies',
  'Company',
  'Shops',
  'Stores',
  'Restaurants',
  'Places',
  'City',
  'Town',
  'Me',
  'Us',
])
const BARE_CITY_PATTERN = /^[A-Z][A-Za-z .'-]*$/
const SAVE_PATTERN = /\b(?:save|store|persist)\b/i

/**
 * Read the intent and the city out of a plain-text request,
 * e.g. "Find leads in San Francisco" or "Save leads found in Austin, TX"
 */
export function parseLeadRequest(text: string): LeadRequest {
  const trimmed = text.trim()
  const intent = SAVE_PATTERN.test(trimmed) ? 'save' : 'search'

  for (const match of trimmed.matchAll(CITY_PATTERN)) {
    const city = match[1].replace(/[.,]+$/, '')
    if (!GENERIC_NOUNS.has(city.split(/[\s,]+/)[0])) {
      return { intent, city }
    }
  }

  if (intent === 'search' && trimmed.split(/\s+/).length <= 3 && BARE_CITY_PATTERN.test(trimmed)) {
    return { intent, city: trimmed }
  }

  return { intent, city: null }
}

export function summarizeSearch(result: SearchResult): string {
  if (result.status === 'error') {
    return `Search failed: ${result.message ?? 'unknown error'}`
  }

  const { city, data_source } = result.searchMetadata
  const summary = `Found ${result.totalResults} potential leads in ${city}.`
  return data_source === 'fallback'
    ? `${summary} The Maps API was unavailable, so these are sample businesses.`
    : summary
}

export interface AgentReply {
  text: string
  data?: SearchResult | SaveLeadsResult
}

export interface LeadFinderAgentOptions {
  aggregator: BusinessSearchAggregator
  leadRepository: LeadRepository | null
  // Without a model the agent answers through the request parser
  model?: LanguageModel | null
  temperature?: number
}

/**
 * Lead finder agent: finds businesses without a website in a city and saves them as leads
 */
export class LeadFinderAgent {
  readonly name = 'lead_finder_agent'
  readonly description =
    'Finds potential leads among the businesses of a city that have no website presence, using Google Maps search.'

  private readonly aggregator: BusinessSearchAggregator
  private readonly leadRepository: LeadRepository | null
  private readonly model: LanguageModel | null
  private readonly temperature: number
  private readonly tools: LeadFinderTools

  constructor(options: LeadFinderAgentOptions) {
    this.aggregator = options.aggregator
    this.leadRepository = options.leadRepository
    this.model = options.model ?? null
    this.temperature = options.temperature ?? 0.2
    this.tools = createLeadFinderTools({
      aggregator: this.aggregator,
      leadRepository: this.leadRepository,
    })
  }

  get usesLanguageModel(): boolean {
    return this.model !== null
  }

  async handle(text: string): Promise<AgentReply> {
    if (this.model) {
      try {
        return await this.runModel(this.model, text)
      } catch (error) {
        logger.error('Language model call failed, answering directly', errorMessage(error))
      }
    }
    return this.runDirect(text)
  }

  private async runModel(model: LanguageModel, text: string): Promise<AgentReply> {
    const result = await generateText({
      model,
      system: LEAD_FINDER_INSTRUCTIONS,
      prompt: text,
      tools: this.tools,
      stopWhen: stepCountIs(5),
      temperature: this.temperature,
    })
    logger.info(`Model answered in ${result.steps.length} steps`)
    return { text: result.text }
  }

  private async runDirect(text: string): Promise<AgentReply> {
    const request = parseLeadRequest(text)
    if (!request.city) {
      return { text: 'Which city should I search? For example: "Find leads in Austin".' }
    }

    if (request.intent === 'save') {
      const saved = await saveLeadsForCity(
        { aggregator: this.aggregator, leadRepository: this.leadRepository },
        request.city
      )
      return {
        text: saved.success
          ? `Saved ${saved.saved} leads found in ${saved.city}.`
          : `Could not save leads for ${saved.city}: ${saved.error ?? 'unknown error'}`,
        data: saved,
      }
    }

    const result = await searchBusinesses(this.aggregator, { city: request.city })
    return { text: summarizeSearch(result), data: result }
  }
}
