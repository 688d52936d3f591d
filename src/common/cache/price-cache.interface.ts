/**
 * Interface for the market data cache
 * Stores serialized upstream responses keyed by market day and data kind
 */

export type PriceCacheKind = 'prices' | 'rate';

export interface PriceCacheKey {
  /** Market day in YYYY-MM-DD form */
  date: string;
  kind: PriceCacheKind;
}

export interface IPriceCache {
  /**
   * Reads a cached entry
   * @returns The stored value, or null when nothing is cached for the key
   */
  read(key: PriceCacheKey): Promise<string | null>;

  /**
   * Stores an entry, replacing any previous value for the key
   */
  write(key: PriceCacheKey, value: string): Promise<void>;

  /**
   * Removes entries older than the given age
   * @returns Number of removed entries
   */
  prune(maxAgeDays: number): Promise<number>;
}

export function cacheEntryName(key: PriceCacheKey): string {
  return `${key.kind}-${key.date}`;
}
