import { Injectable } from '@nestjs/common';
import { IPriceCache, PriceCacheKey, cacheEntryName } from './price-cache.interface';

interface MemoryEntry {
  value: string;
  storedAt: number;
}

/**
 * In-process price cache, lost on restart
 */
@Injectable()
export class MemoryPriceCacheService implements IPriceCache {
  private readonly entries = new Map<string, MemoryEntry>();

  public async read(key: PriceCacheKey): Promise<string | null> {
    return this.entries.get(cacheEntryName(key))?.value ?? null;
  }

  public async write(key: PriceCacheKey, value: string): Promise<void> {
    this.entries.set(cacheEntryName(key), { value, storedAt: Date.now() });
  }

  public async prune(maxAgeDays: number): Promise<number> {
    const cutoff = Date.now() - maxAgeDays * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const [name, entry] of this.entries) {
      if (entry.storedAt < cutoff) {
        this.entries.delete(name);
        removed++;
      }
    }

    return removed;
  }
}
