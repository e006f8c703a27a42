import type {
  PlaceSearchCapability,
  ProviderConfig,
  GeoPoint,
  RawPlace,
  SearchPage,
  TextSearchRequest,
  NearbySearchRequest,
} from './types.js'
import { createLogger, type Logger } from '../utils/logger.js'

/**
 * Abstract base class for all place search providers
 * Provides common functionality and enforces the capability interface
 */
export abstract class BaseProvider implements PlaceSearchCapability {
  public readonly name: string
  public readonly timeout: number
  private readonly logger: Logger

  constructor(config: ProviderConfig) {
    this.name = config.name
    this.timeout = config.timeout
    this.logger = createLogger(config.name)
  }

  abstract geocode(address: string): Promise<GeoPoint | null>

  abstract textSearch(request: TextSearchRequest): Promise<SearchPage>

  abstract nearbySearch(request: NearbySearchRequest): Promise<SearchPage>

  abstract placeDetails(id: string): Promise<RawPlace | null>

  /**
   * Check if the provider is healthy and accessible
   * Can be overridden by concrete providers
   */
  async healthCheck(): Promise<boolean> {
    try {
      // Default implementation: resolve a well-known city
      const point = await this.geocode('San Francisco')
      return point !== null
    } catch (error) {
      this.log('error', 'Health check failed', error)
      return false
    }
  }

  /**
   * Helper to measure execution time
   */
  protected async measureTime<T>(fn: () => Promise<T>): Promise<{ result: T; latency: number }> {
    const start = performance.now()
    const result = await fn()
    const latency = Math.round(performance.now() - start)
    return { result, latency }
  }

  protected log(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: unknown) {
    this.logger[level](message, meta)
  }
}
