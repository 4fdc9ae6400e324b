import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { setTimeout as delay } from 'timers/promises';

import { errorMessage } from '../common/utils/error-message';
import { readString } from '../common/utils/payload-reader';
import { readNumber } from '../config/config.helpers';

// Admin shutdown, crash recovery, too many connections
const RECOVERABLE_CODES = new Set(['57P01', '57P02', '57P03', '57P04', '53300']);
const MAX_ATTEMPTS = 3;

/**
 * Lazily created pg pool shared by the postgres-backed stores. Queries are
 * retried when the server dropped the connection and bounded by a timeout.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly queryTimeoutMs: number;
  private readonly poolSize: number;
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {
    this.queryTimeoutMs = readNumber(configService, 'DATABASE_QUERY_TIMEOUT_MS', 10000);
    this.poolSize = readNumber(configService, 'DATABASE_POOL_SIZE', 10);
  }

  async runQuery<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    return this.withTimeout(this.withRetry(() => this.getPool().query<T>(text, params)));
  }

  async onModuleDestroy(): Promise<void> {
    await this.discardPool();
  }

  private createPool(): Pool {
    const connectionString = this.configService.get<string>('DATABASE_URL');
    if (!connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    const pool = new Pool({
      connectionString,
      max: this.poolSize,
      idleTimeoutMillis: 10000,
      connectionTimeoutMillis: 5000,
      allowExitOnIdle: true,
    });

    pool.on('error', (error) => {
      this.logger.warn(`Database pool error, pool will be recreated: ${error.message}`);
      if (this.pool === pool) {
        this.pool = null;
      }
    });

    return pool;
  }

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = this.createPool();
    }
    return this.pool;
  }

  private isRecoverableError(error: unknown): boolean {
    const code = readString(error, 'code');
    if (code && RECOVERABLE_CODES.has(code)) {
      return true;
    }
    return /shutdown|termination|connection terminated/i.test(errorMessage(error));
  }

  private async discardPool(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (!pool) {
      return;
    }
    try {
      await pool.end();
    } catch (error) {
      this.logger.debug(`Ignoring error while closing pool: ${errorMessage(error)}`);
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, attempt = 1): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!this.isRecoverableError(error) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }
      await this.discardPool();
      const delayMs = Math.min(200 * attempt, 1000);
      this.logger.debug(
        `Database query failed (attempt ${attempt}/${MAX_ATTEMPTS}), retrying in ${delayMs}ms`,
      );
      await delay(delayMs);
      return this.withRetry(operation, attempt + 1);
    }
  }

  private async withTimeout<T>(operation: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Database query timeout after ${this.queryTimeoutMs}ms`)),
        this.queryTimeoutMs,
      );
    });

    try {
      return await Promise.race([operation, timeout]);
    } catch (error) {
      this.logger.error(`Database query failed or timed out: ${errorMessage(error)}`);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
