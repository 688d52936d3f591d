import { Inject, Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Constants } from '../../constants';
import { LoggingService } from '../logging.service';
import { CACHE_TOKENS } from './price-cache.constants';
import { IPriceCache } from './price-cache.interface';

/**
 * Drops cached market days older than CACHE_MAX_AGE_DAYS once a day
 */
@Injectable()
export class PriceCacheMaintenanceService {
  private readonly context = PriceCacheMaintenanceService.name;

  @Inject(CACHE_TOKENS.PRICE_CACHE) private readonly cache!: IPriceCache;
  @Inject(LoggingService) private readonly logger!: LoggingService;

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  public async pruneCache(): Promise<void> {
    try {
      const removed = await this.cache.prune(Constants.CACHE.MAX_AGE_DAYS);
      if (removed > 0) {
        this.logger.log(`Pruned ${removed} cached market documents`, this.context);
      }
    } catch (error) {
      this.logger.error('Failed to prune price cache', error, this.context);
    }
  }
}
