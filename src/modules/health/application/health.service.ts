import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../../database/infrastructure/database.service';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  database: 'connected' | 'disconnected';
  uptimeSeconds: number;
  timestamp: string;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async getHealth(now = new Date()): Promise<HealthReport> {
    let database: HealthReport['database'] = 'connected';
    try {
      await this.databaseService.query('SELECT 1');
    } catch (error) {
      this.logger.warn(
        `Health check could not reach the database: ${error instanceof Error ? error.message : String(error)}`,
      );
      database = 'disconnected';
    }

    return {
      status: database === 'connected' ? 'healthy' : 'degraded',
      database,
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: now.toISOString(),
    };
  }
}
