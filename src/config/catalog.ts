import { readFileSync } from 'node:fs'
import { z } from 'zod'

/**
 * Static lookup data shipped in the top-level data/ directory.
 * Paths resolve the same way from src/ (tests, tsx) and dist/ (built server).
 */
const dataFile = (name: string) => new URL(`../../data/${name}`, import.meta.url)

const searchCatalogSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  placeTypes: z.array(z.string().min(1)),
})

export interface SearchCatalog {
  // Category keywords queried when no business type is requested
  keywords: readonly string[]
  // Keywords that are also valid place-type codes for the nearby search
  placeTypes: ReadonlySet<string>
}

const fallbackTemplateSchema = z.object({
  name: z.string().min(1),
  street: z.string().min(1),
  phone: z.string(),
  category: z.string().min(1),
  rating: z.number().min(0).max(5),
  ratingCount: z.number().int().nonnegative(),
  priceLevel: z.number().int().min(0).max(4),
  isOpenNow: z.boolean(),
  latOffset: z.number(),
  lngOffset: z.number(),
})

export type FallbackTemplate = z.infer<typeof fallbackTemplateSchema>

const fallbackFileSchema = z.object({
  templates: z.array(fallbackTemplateSchema).min(35),
})

function readJson<T extends z.ZodTypeAny>(name: string, schema: T): z.output<T> {
  const raw: unknown = JSON.parse(readFileSync(dataFile(name), 'utf8'))
  return schema.parse(raw)
}

let searchCatalog: SearchCatalog | undefined
let fallbackTemplates: readonly FallbackTemplate[] | undefined

export function loadSearchCatalog(): SearchCatalog {
  if (!searchCatalog) {
    const { keywords, placeTypes } = readJson('search-categories.json', searchCatalogSchema)
    searchCatalog = {
      keywords: [...new Set(keywords)],
      placeTypes: new Set(placeTypes),
    }
  }
  return searchCatalog
}

export function loadFallbackTemplates(): readonly FallbackTemplate[] {
  if (!fallbackTemplates) {
    fallbackTemplates = readJson('fallback-businesses.json', fallbackFileSchema).templates
  }
  return fallbackTemplates
}
