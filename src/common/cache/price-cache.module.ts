/**
 * Price cache module
 * Provides the market data cache behind CACHE_TOKENS.PRICE_CACHE, backed by files or memory
 */

import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { Constants } from '../../constants';
import { LoggingService } from '../logging.service';
import { FilePriceCacheService, PRICE_CACHE_DIR } from './file-price-cache.service';
import { MemoryPriceCacheService } from './memory-price-cache.service';
import { PriceCacheMaintenanceService } from './price-cache-maintenance.service';
import { CACHE_TOKENS, PriceCacheType } from './price-cache.constants';

export interface PriceCacheOptions {
  directory?: string;
}

@Global()
@Module({})
export class PriceCacheModule {
  /**
   * Creates a dynamic module for the selected cache type
   * @param {PriceCacheType} cacheType - Storage used for cached market data
   * @param {PriceCacheOptions} options - Storage options
   * @returns {DynamicModule} Configured cache module
   */
  public static forRoot(cacheType: PriceCacheType, options: PriceCacheOptions = {}): DynamicModule {
    const providers: Provider[] = [];

    if (cacheType === PriceCacheType.FILE) {
      providers.push(
        {
          provide: PRICE_CACHE_DIR,
          useValue: options.directory ?? Constants.CACHE.DIR
        },
        {
          provide: CACHE_TOKENS.PRICE_CACHE,
          useClass: FilePriceCacheService
        }
      );
    } else {
      providers.push({
        provide: CACHE_TOKENS.PRICE_CACHE,
        useClass: MemoryPriceCacheService
      });
    }

    return {
      module: PriceCacheModule,
      providers: [...providers, PriceCacheMaintenanceService, LoggingService],
      exports: [CACHE_TOKENS.PRICE_CACHE]
    };
  }

  /**
   * Maps the CACHE_TYPE setting onto a cache type, defaulting to files
   */
  public static typeFromConfig(value: string): PriceCacheType {
    return value === PriceCacheType.MEMORY ? PriceCacheType.MEMORY : PriceCacheType.FILE;
  }
}
