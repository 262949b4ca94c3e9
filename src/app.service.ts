import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from './common/utils/error.utils';
import { DatabaseService } from './database/database.service';

export interface HealthStatus {
  status: 'ok' | 'degraded';
  database: 'up' | 'down';
  timestamp: string;
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(private readonly database: DatabaseService) {}

  getHello(): string {
    return 'Welcome to the Tutor API - pick a topic, learn it through chat, then take the quiz';
  }

  getHealth(): HealthStatus {
    let database: HealthStatus['database'] = 'up';
    try {
      this.database.get('SELECT 1 AS ok');
    } catch (error) {
      this.logger.error(`Database health check failed: ${getErrorMessage(error)}`);
      database = 'down';
    }

    return {
      status: database === 'up' ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
    };
  }
}
