import { Module } from '@nestjs/common';
import { LoggingService } from '../common/logging.service';
import { ExchangeRateService } from './exchange-rate.service';
import { SpotMarketService } from './spot-market.service';

/**
 * MarketModule fetches raw day-ahead prices and exchange rates
 *
 * Both services read through the price cache provided by PriceCacheModule.
 */
@Module({
  imports: [],
  providers: [SpotMarketService, ExchangeRateService, LoggingService],
  exports: [SpotMarketService, ExchangeRateService]
})
export class MarketModule {}
