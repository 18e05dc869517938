import { Injectable } from '@nestjs/common';
import { getApiPrefix } from './app.bootstrap';
import { AppLogger } from './common/app-logger';
import { DatabaseService } from './database/database.service';

export const SERVICE_NAME = 'orderbot-api';

export type HealthReport = {
  status: 'ok' | 'degraded';
  database: 'up' | 'down';
  timestamp: string;
};

@Injectable()
export class AppService {
  private readonly logger = new AppLogger(AppService.name);

  constructor(private readonly db: DatabaseService) {}

  root() {
    return {
      service: SERVICE_NAME,
      version: getApiPrefix(),
      intents: ['Welcome', 'PlaceOrder', 'TrackOrder'],
    };
  }

  async health(): Promise<HealthReport> {
    const timestamp = new Date().toISOString();
    try {
      await this.db.ping();
      return { status: 'ok', database: 'up', timestamp };
    } catch (err: unknown) {
      this.logger.warn(
        `database ping failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return { status: 'degraded', database: 'down', timestamp };
    }
  }
}
