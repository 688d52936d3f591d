/**
 * Dependency injection token for the price cache implementation
 */
export const CACHE_TOKENS = {
  PRICE_CACHE: 'PRICE_CACHE'
} as const;

export enum PriceCacheType {
  FILE = 'file',
  MEMORY = 'memory'
}
