/**
 * File implementation of the price cache
 * One JSON document per market day and data kind inside the cache directory
 */

import { Inject, Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { IPriceCache, PriceCacheKey, cacheEntryName } from './price-cache.interface';

export const PRICE_CACHE_DIR = 'PRICE_CACHE_DIR';

@Injectable()
export class FilePriceCacheService implements IPriceCache {
  constructor(@Inject(PRICE_CACHE_DIR) private readonly directory: string) {}

  private filePath(key: PriceCacheKey): string {
    return path.join(this.directory, `${cacheEntryName(key)}.json`);
  }

  /**
   * Reads a cached document
   * @param {PriceCacheKey} key - Market day and data kind
   * @returns {Promise<string | null>} File content, or null when the file does not exist
   */
  public async read(key: PriceCacheKey): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath(key), 'utf8');
    } catch (error) {
      if (FilePriceCacheService.isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Writes a document, creating the cache directory on first use
   * @param {PriceCacheKey} key - Market day and data kind
   * @param {string} value - Serialized document
   */
  public async write(key: PriceCacheKey, value: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.filePath(key), value, 'utf8');
  }

  /**
   * Deletes cache documents whose modification time is older than maxAgeDays
   * @param {number} maxAgeDays - Maximum document age in days
   * @returns {Promise<number>} Number of deleted documents
   */
  public async prune(maxAgeDays: number): Promise<number> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (FilePriceCacheService.isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    const cutoff = Date.now() - maxAgeDays * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const file of files) {
      if (!file.endsWith('.json')) {
        continue;
      }
      const filePath = path.join(this.directory, file);
      const stats = await fs.stat(filePath);
      if (stats.mtime.getTime() < cutoff) {
        await fs.unlink(filePath);
        removed++;
      }
    }

    return removed;
  }

  private static isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
  }
}
