import { loadFallbackTemplates, type FallbackTemplate } from '../config/catalog.js'
import { createBusinessRecord, type BusinessRecord } from './business-record.js'
import type { GeoPoint } from '../providers/types.js'

export interface FallbackQuery {
  city: string
  businessType?: string
  minRating: number
  maxResults: number
}

export function citySlug(city: string): string {
  return city
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

// FNV-1a, 32 bit
function hashCity(city: string): number {
  let hash = 0x811c9dc5
  for (const char of city.trim().toLowerCase()) {
    hash ^= char.codePointAt(0) ?? 0
    hash = Math.imul(hash, 0x01000193) >>> 0
  }
  return hash
}

/**
 * A stable pseudo-location for the city, so sample data for one city always lands in the same place
 */
export function fallbackCenter(city: string): GeoPoint {
  const hash = hashCity(city)
  return {
    lat: (hash % 12000) / 100 - 60,
    lng: (Math.floor(hash / 12000) % 36000) / 100 - 180,
  }
}

const round = (value: number) => Math.round(value * 10000) / 10000

/**
 * Sample businesses for demo and offline use. Same city in, same records out.
 */
export function createFallbackRecords(
  query: FallbackQuery,
  templates: readonly FallbackTemplate[] = loadFallbackTemplates()
): BusinessRecord[] {
  const slug = citySlug(query.city) || 'city'
  const center = fallbackCenter(query.city)
  const city = query.city.trim()

  const records: BusinessRecord[] = []
  for (const [index, template] of templates.entries()) {
    if (records.length >= query.maxResults) break
    if (template.rating < query.minRating) continue

    const record = createBusinessRecord({
      id: `fallback_${slug}_${index + 1}`,
      name: template.name,
      address: `${template.street}, ${city}`,
      phone: template.phone,
      website: '',
      rating: template.rating,
      ratingCount: template.ratingCount,
      category: query.businessType || template.category,
      priceLevel: template.priceLevel,
      isOpenNow: template.isOpenNow,
      coordinates: {
        lat: round(center.lat + template.latOffset),
        lng: round(center.lng + template.lngOffset),
      },
    })

    if (record) records.push(record)
  }

  return records
}
