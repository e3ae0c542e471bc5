import { Pool, QueryResultRow } from 'pg';
import * as fs from 'fs';
import * as path from 'path';

export interface QueryRows<R> {
  rows: R[];
  rowCount: number | null;
}

/**
 * The slice of a pg client the repository needs
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryRows<R>>;
}

export interface Database extends Queryable {
  transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
}

/**
 * PostgreSQL Database Client
 * Manages the connection pool; a client without a connection string answers
 * every query with no rows.
 */
export class DatabaseClient implements Database {
  private pool: Pool | null = null;

  constructor(connectionString: string | undefined = process.env.DATABASE_URL) {
    if (!connectionString) {
      console.warn('⚠️  No DATABASE_URL found. Running without persistent storage.');
      return;
    }

    this.pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
    });

    this.pool.on('error', (err) => {
      console.error('❌ Unexpected database error:', err.message);
    });
  }

  public isConfigured(): boolean {
    return this.pool !== null;
  }

  public async initialize(): Promise<void> {
    if (!this.pool) {
      console.log('⚠️  Skipping database initialization (no DATABASE_URL)');
      return;
    }

    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf8');
    await this.pool.query(schema);
    console.log('✅ Database schema initialized');
  }

  public async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryRows<R>> {
    if (!this.pool) {
      return { rows: [], rowCount: 0 };
    }

    try {
      return await this.pool.query<R>(text, params);
    } catch (error) {
      console.error('❌ Query error:', error instanceof Error ? error.message : error);
      throw error;
    }
  }

  public async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
    if (!this.pool) {
      throw new Error('Database not configured');
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await callback({
        query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
          client.query<R>(text, params),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  public async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
    }
  }
}
