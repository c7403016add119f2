import { Pool, PoolClient, QueryConfig, QueryResult, QueryResultRow } from 'pg';

import { DatabaseConfig } from './database.config';
import { CustomLoggerService } from '../common/services/logger.service';

/**
 * Process-wide wrapper around a pg `Pool`.
 *
 * Plain reads go through `query`; anything that must see a consistent view or
 * change several rows goes through `transaction`, which checks a client out of
 * the pool for the duration of the callback and always releases it.
 */
export class DatabaseClient {
  private static instance: DatabaseClient | undefined;
  private readonly pool: Pool;
  private readonly logger = new CustomLoggerService();

  private constructor(config: DatabaseConfig) {
    this.logger.setContext('DatabaseClient');
    this.pool = new Pool(config.toPoolConfig());
    this.pool.on('error', (error) => {
      this.logger.logError(error, { source: 'idle_pool_client' });
    });
  }

  static async initialize(config: DatabaseConfig = DatabaseConfig.fromEnv()): Promise<DatabaseClient> {
    if (!DatabaseClient.instance) {
      const client = new DatabaseClient(config);
      await client.verifyConnection();
      DatabaseClient.instance = client;
      client.logger.log('Database connection verified', {
        host: config.host,
        port: config.port,
        database: config.database,
      });
    }

    return DatabaseClient.instance;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>>;
  async query<T extends QueryResultRow = QueryResultRow>(
    queryConfig: QueryConfig,
  ): Promise<QueryResult<T>>;
  async query<T extends QueryResultRow = QueryResultRow>(
    queryTextOrConfig: string | QueryConfig,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>> {
    if (typeof queryTextOrConfig === 'string') {
      const bindings = values ? [...values] : undefined;
      return this.pool.query<T>(queryTextOrConfig, bindings);
    }

    return this.pool.query<T>(queryTextOrConfig);
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    DatabaseClient.instance = undefined;
  }

  private async verifyConnection(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }
}
