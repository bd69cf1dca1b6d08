import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import * as crypto from 'node:crypto';
import { Pool } from 'pg';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { Logger as DrizzleLogger } from 'drizzle-orm';
import { sql } from 'drizzle-orm';
import { AppConfigService } from '../app/app-config.service';
import { TransactionManager } from './transaction-manager';

/** Either the pooled database or the transaction currently in scope. */
export type Db = PgDatabase<NodePgQueryResultHKT>;

class FingerprintQueryLogger implements DrizzleLogger {
  constructor(private readonly logger: Logger) {}

  logQuery(query: string): void {
    // Never log params (PII). A short fingerprint is enough to group queries.
    const kind = query.trim().split(/\s+/, 1)[0]?.toUpperCase() || 'QUERY';
    const fp = crypto.createHash('sha1').update(query).digest('hex').slice(0, 10);
    this.logger.debug(`[sql] kind=${kind} query=${fp}`);
  }
}

@Injectable()
export class DatabaseService extends TransactionManager implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;
  private readonly db: Db;
  private readonly txScope = new AsyncLocalStorage<Db>();

  constructor(private readonly appConfig: AppConfigService) {
    super();
    this.pool = new Pool({
      connectionString: appConfig.databaseUrl(),
      max: appConfig.dbPoolMax(),
    });
    this.pool.on('error', (err) => {
      this.logger.warn(`Idle pg client error: ${err.message}`);
    });
    this.db = drizzle(this.pool, {
      logger: appConfig.dbLogQueries() ? new FingerprintQueryLogger(this.logger) : false,
    });
  }

  /** The executor repositories should use: the open transaction if any, else the pool. */
  client(): Db {
    return this.txScope.getStore() ?? this.db;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.txScope.getStore()) return await fn();
    return await this.db.transaction(async (tx) => await this.txScope.run(tx, fn));
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }

  async onModuleInit() {
    const retries = this.appConfig.dbConnectRetries();
    const delayMs = this.appConfig.dbConnectRetryDelayMs();

    let lastError: unknown;
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        await this.ping();
        return;
      } catch (err) {
        lastError = err;
        // Give Postgres a moment to come up (docker compose).
        await new Promise((r) => setTimeout(r, delayMs));
      }
    }

    throw new Error(
      `Could not connect to the database after ${retries} attempts. ` +
        `Is Postgres running and is DATABASE_URL correct?\n` +
        `Last error: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
    );
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
