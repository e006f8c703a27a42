import { z } from 'zod'
import type { RawPlace } from '../providers/types.js'

export const businessRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  address: z.string().min(1),
  phone: z.string(),
  website: z.string(),
  rating: z.number().min(0).max(5),
  ratingCount: z.number().int().nonnegative(),
  category: z.string(),
  priceLevel: z.number().int().min(0).max(4).optional(),
  isOpenNow: z.boolean(),
  coordinates: z
    .object({
      lat: z.number(),
      lng: z.number(),
    })
    .optional(),
})

export type BusinessRecordInput = z.input<typeof businessRecordSchema>
export type BusinessRecord = Readonly<z.output<typeof businessRecordSchema>>

/**
 * Validate and freeze a record. Returns null when a required field (name, address) is empty.
 */
export function createBusinessRecord(input: BusinessRecordInput): BusinessRecord | null {
  const parsed = businessRecordSchema.safeParse(input)
  if (!parsed.success) return null
  return Object.freeze(parsed.data)
}

const BUSINESS_TYPE_HINTS = [
  'restaurant',
  'cafe',
  'bar',
  'store',
  'shop',
  'retail',
  'service',
  'business',
  'establishment',
]

/**
 * First raw type that names a kind of business, else the first raw type
 */
export function derivePrimaryCategory(types: readonly string[]): string {
  const businessType = types.find((type) => {
    const lower = type.toLowerCase()
    return BUSINESS_TYPE_HINTS.some((hint) => lower.includes(hint))
  })
  return businessType ?? types[0] ?? ''
}

const NOT_LIVE_MARKERS = ['placeholder', 'coming-soon', 'under-construction']

/**
 * Heuristic: does this look like a real, working site?
 * String checks only; IP hosts and subdomains of excluded domains are not special-cased.
 */
export function looksLikeRealWebsite(website: string | undefined): boolean {
  if (!website) return false

  const lower = website.toLowerCase()
  return (
    website.length > 5 &&
    website.includes('.') &&
    !website.startsWith('http://localhost') &&
    !website.endsWith('example.com') &&
    !NOT_LIVE_MARKERS.some((marker) => lower.includes(marker))
  )
}

export interface RecordFilters {
  minRating: number
  excludeWebsites: boolean
}

export type SkipReason = 'below_min_rating' | 'has_website' | 'empty_or_invalid_record'

export type CandidateEvaluation =
  | { kept: true; record: BusinessRecord }
  | { kept: false; reason: SkipReason }

/**
 * Apply the inclusion filters to a search hit and its details, in order,
 * and build the record when it passes
 */
export function evaluateCandidate(
  hit: RawPlace,
  details: RawPlace,
  filters: RecordFilters
): CandidateEvaluation {
  const rating = details.rating ?? hit.rating ?? 0
  if (rating < filters.minRating) {
    return { kept: false, reason: 'below_min_rating' }
  }

  const website = details.website ?? ''
  if (filters.excludeWebsites && looksLikeRealWebsite(website)) {
    return { kept: false, reason: 'has_website' }
  }

  const record = createBusinessRecord({
    id: hit.id,
    name: details.name || hit.name || '',
    address: details.formattedAddress || hit.formattedAddress || '',
    phone: details.phone ?? '',
    website,
    rating,
    ratingCount: details.ratingCount ?? 0,
    category: derivePrimaryCategory(details.types.length > 0 ? details.types : hit.types),
    priceLevel: details.priceLevel,
    isOpenNow: details.openNow ?? false,
    coordinates: hit.location ?? details.location,
  })

  return record ? { kept: true, record } : { kept: false, reason: 'empty_or_invalid_record' }
}
