import { Module } from '@nestjs/common';
import { ClockService } from '../common/clock.service';
import { LoggingService } from '../common/logging.service';
import { MarketModule } from '../market/market.module';
import { PricingController } from './pricing.controller';
import { PricingService } from './pricing.service';

/**
 * PricingModule derives fee-loaded price views and cheapest/most expensive rankings
 */
@Module({
  imports: [MarketModule],
  providers: [PricingService, ClockService, LoggingService],
  controllers: [PricingController],
  exports: [PricingService, ClockService]
})
export class PricingModule {}
