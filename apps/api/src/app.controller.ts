import { Controller, Get } from '@nestjs/common';
import { AppService, HealthReport } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  /** GET /api/v1: service name, prefix and the intents the webhook routes. */
  @Get()
  root() {
    return this.appService.root();
  }

  /** GET /api/v1/health: 200 either way; `database` tells whether pg answers. */
  @Get('health')
  health(): Promise<HealthReport> {
    return this.appService.health();
  }
}
