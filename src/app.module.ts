import { Logger, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { BatteryModule } from './battery/battery.module';
import { PriceCacheType } from './common/cache/price-cache.constants';
import { PriceCacheModule } from './common/cache/price-cache.module';
import { LoggingService } from './common/logging.service';
import { ApiKeyMiddleware } from './common/middleware/api-key.middleware';
import { Constants } from './constants';
import { PricingModule } from './pricing/pricing.module';

const cacheType = PriceCacheModule.typeFromConfig(Constants.CACHE.TYPE);

const logger = new Logger('AppModule');
logger.log(`Price cache: ${cacheType}${cacheType === PriceCacheType.FILE ? ` (${Constants.CACHE.DIR})` : ''}`);
logger.log(`Market timezone: ${Constants.MARKET.TIMEZONE}, currency: ${Constants.MARKET.CURRENCY}`);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true
    }),
    ScheduleModule.forRoot(),
    PriceCacheModule.forRoot(cacheType),
    PricingModule,
    BatteryModule
  ],
  controllers: [AppController],
  providers: [AppService, LoggingService]
})
export class AppModule implements NestModule {
  public configure(consumer: MiddlewareConsumer): void {
    // API key on every route except the health check
    consumer.apply(ApiKeyMiddleware).exclude('health').forRoutes('*');
  }
}
