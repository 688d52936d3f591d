import { Module } from '@nestjs/common';
import { LoggingService } from '../common/logging.service';
import { PricingModule } from '../pricing/pricing.module';
import { BatteryController } from './battery.controller';
import { BatteryService } from './battery.service';

/**
 * BatteryModule plans home battery charging from today's and tomorrow's prices
 */
@Module({
  imports: [PricingModule],
  providers: [BatteryService, LoggingService],
  controllers: [BatteryController],
  exports: [BatteryService]
})
export class BatteryModule {}
