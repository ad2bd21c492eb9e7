/**
 * Database Service
 *
 * Provides the IPAM database pool with lifecycle management
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createPool, Pool, Queryable, withReadOnlyTransaction } from '@ipam-report/database';

import { AppConfigService } from '../config/app.config';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(config: AppConfigService) {
    const { url, statementTimeoutMs } = config.database;
    this.pool = createPool({ connectionString: url, statementTimeoutMs });
  }

  /**
   * Runs `fn` on one client inside a read-only transaction
   */
  async readOnly<T>(fn: (db: Queryable) => Promise<T>): Promise<T> {
    return withReadOnlyTransaction(this.pool, fn);
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.debug('Database pool closed');
  }
}
