import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { Constants } from './constants';
import { LoggingService } from './common/logging.service';

export interface ServiceInfo {
  service: string;
  endpoints: string[];
}

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  service: string;
}

@Injectable()
export class AppService implements OnModuleInit {
  private readonly context = AppService.name;

  @Inject(LoggingService) private readonly logger!: LoggingService;

  public onModuleInit(): void {
    this.logger.log(
      `Spot price calculator started (env ${Constants.SERVER.NODE_ENV}, VAT ${Constants.TARIFF.VAT}, ` +
        `battery threshold ${Constants.BATTERY.KWH_PRICE})`,
      this.context
    );
  }

  public getInfo(): ServiceInfo {
    return {
      service: 'Spot market home calculator',
      endpoints: ['/price/day', '/price/day/:date', '/battery/charging', '/health']
    };
  }

  public getHealth(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'Spot market home calculator'
    };
  }
}
