import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { DEFAULT_DATABASE_URL } from '@/common/config/env.validation';
import { createLogger } from '@/common/utils/logger';
import { PG_POOL } from '../../application/ports/tokens';

/**
 * Owns the process-wide connection pool. The pool is ended in
 * `onApplicationShutdown`, which Nest runs after the HTTP server has been
 * closed, so in-flight requests keep their connections until they finish.
 */
@Injectable()
export class PgPoolProvider implements OnApplicationShutdown {
  private readonly logger = createLogger(PgPoolProvider.name);
  private closed = false;
  readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    this.pool = new Pool({
      connectionString: this.configService.get<string>('DATABASE_URL') ?? DEFAULT_DATABASE_URL,
      max: this.configService.get<number>('DB_POOL_MAX') ?? 10,
      idleTimeoutMillis: this.configService.get<number>('DB_POOL_IDLE_TIMEOUT_MS') ?? 30_000,
      connectionTimeoutMillis: this.configService.get<number>('DB_POOL_CONNECTION_TIMEOUT_MS') ?? 0,
    });

    this.pool.on('error', (error: Error) => {
      this.logger.error('pg_pool_idle_client_error', error, { event: 'pg_pool_idle_client_error' });
    });
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.pool.end();
    this.logger.db('pg_pool_closed', { event: 'pg_pool_closed' });
  }
}

export const pgPoolFactory = {
  provide: PG_POOL,
  useFactory: (provider: PgPoolProvider) => provider.pool,
  inject: [PgPoolProvider],
};
