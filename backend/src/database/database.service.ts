import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { setTimeout as delay } from 'timers/promises';

import { describeError } from '../common/errors';

const RECOVERABLE_CODES = ['57P01', '57P02', '57P03', '57P04', '53300'];
const MAX_ATTEMPTS = 3;
const OPERATION_TIMEOUT_MS = 30000;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {}

  async runQuery<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    return this.withTimeout(
      this.withRetry(async () => {
        try {
          return await this.getPool().query<T>(text, params);
        } catch (error) {
          if (this.isRecoverableError(error)) {
            this.pool = null;
          }
          throw error;
        }
      }),
      'Database query',
    );
  }

  /**
   * Runs `callback` inside BEGIN/COMMIT on a dedicated client; rolls back on any error.
   */
  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.withTimeout(
      (async () => {
        const client = await this.getPool().connect();
        try {
          await client.query('BEGIN');
          const result = await callback(client);
          await client.query('COMMIT');
          return result;
        } catch (error) {
          await client.query('ROLLBACK').catch((rollbackError: Error) => {
            this.logger.warn(`Rollback failed: ${rollbackError.message}`);
          });
          throw error;
        } finally {
          client.release();
        }
      })(),
      'Database transaction',
    );
  }

  async ping(): Promise<boolean> {
    try {
      await this.runQuery('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Database ping failed: ${describeError(error)}`);
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) {
      return;
    }

    try {
      await this.pool.end();
    } catch (error) {
      // Pool might already be closed
      this.logger.debug(`Pool shutdown warning: ${describeError(error)}`);
    }
    this.pool = null;
  }

  private getPool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const connectionString = this.configService.get<string>('DATABASE_URL');
    if (!connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    const pool = new Pool({
      connectionString,
      max: 10,
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

    this.pool = pool;
    return pool;
  }

  private isRecoverableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
      return false;
    }

    const { code, message } = error as { code?: string; message?: string };
    if (code && RECOVERABLE_CODES.includes(code)) {
      return true;
    }

    const lowered = message?.toLowerCase() ?? '';
    return lowered.includes('shutdown') || lowered.includes('termination');
  }

  private async withRetry<T>(operation: () => Promise<T>, attempt = 1): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!this.isRecoverableError(error) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }

      const delayMs = Math.min(200 * attempt, 1000);
      this.logger.debug(
        `Database operation failed (attempt ${attempt}/${MAX_ATTEMPTS}). Retrying in ${delayMs}ms...`,
      );
      await delay(delayMs);
      return this.withRetry(operation, attempt + 1);
    }
  }

  private async withTimeout<T>(operation: Promise<T>, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${label} timeout after ${OPERATION_TIMEOUT_MS / 1000} seconds`)),
        OPERATION_TIMEOUT_MS,
      );
    });

    try {
      return await Promise.race([operation, timeout]);
    } catch (error) {
      const trace = error instanceof Error ? error.stack : describeError(error);
      this.logger.error(`${label} failed or timed out`, trace);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
