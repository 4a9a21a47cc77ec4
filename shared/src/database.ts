/**
 * PostgreSQL pool wrapper for media-relay plugins
 */

import pg from 'pg';
import { createLogger, errorMessage } from './logger.js';

const { Pool } = pg;
const logger = createLogger('database');

export interface DatabaseOptions {
  connectionString: string;
  maxConnections?: number;
}

/** Host and database name of a connection string, for logs. Never the credentials. */
export function describeDatabaseUrl(connectionString: string): { host?: string; database?: string } {
  if (!URL.canParse(connectionString)) return {};
  const url = new URL(connectionString);
  return { host: url.hostname || undefined, database: url.pathname.replace(/^\//, '') || undefined };
}

export class Database {
  private readonly pool: pg.Pool;
  private readonly target: { host?: string; database?: string };
  private connected = false;

  constructor(options: DatabaseOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.maxConnections ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    this.target = describeDatabaseUrl(options.connectionString);

    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error', { error: err.message });
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
      logger.info('Database connected', this.target);
    } catch (error) {
      logger.error('Failed to connect to database', { ...this.target, error: errorMessage(error) });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
    logger.info('Database disconnected');
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Database ping failed', { error: errorMessage(error) });
      return false;
    }
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Query executed', { duration: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      logger.error('Query failed', { error: errorMessage(error), query: text.substring(0, 100) });
      throw error;
    }
  }

  async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }
}
