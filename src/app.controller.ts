import { Controller, Get } from '@nestjs/common';
import { AppService, HealthStatus, ServiceInfo } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  public getInfo(): ServiceInfo {
    return this.appService.getInfo();
  }

  @Get('health')
  public getHealth(): HealthStatus {
    return this.appService.getHealth();
  }
}
