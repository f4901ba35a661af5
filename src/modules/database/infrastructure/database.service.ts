import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { toError } from '../../../common/utils/concurrency';

/** Postgres SQLSTATE raised on unique constraint violations. */
export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    const databaseUrl = this.configService.get<string>('database.url');
    if (!databaseUrl) {
      throw new Error('DATABASE_URL is not configured');
    }

    const isRemoteDb =
      !databaseUrl.includes('localhost') && !databaseUrl.includes('127.0.0.1');

    this.pool = new Pool({
      connectionString: databaseUrl,
      ssl: isRemoteDb ? { rejectUnauthorized: false } : false,
      max: this.configService.get<number>('database.poolSize') ?? 4,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
  }

  /** Run a parameterized statement and return its rows. */
  async query<T>(text: string, values: unknown[] = []): Promise<T[]> {
    const result = await this.pool.query(text, values);
    return result.rows;
  }

  async onModuleInit() {
    try {
      await this.pool.query('SELECT 1');
      this.logger.log('Database connected successfully');
    } catch (error) {
      this.logger.error('Failed to connect to database', toError(error).stack);
      throw error;
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
