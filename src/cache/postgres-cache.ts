import type pg from 'pg';
import type { ResultCache } from '../types.js';
import { CacheError } from '../errors.js';
import { applyCacheSchema } from './schema.js';

export interface PostgresResultCacheConfig {
  pool: pg.Pool;
}

const SQL_GET = `
SELECT body
FROM form_result_cache
WHERE cache_key = $1 AND expires_at > NOW()
`.trim();

const SQL_SET = `
INSERT INTO form_result_cache (cache_key, body, expires_at)
VALUES ($1, $2, NOW() + make_interval(secs => $3))
ON CONFLICT (cache_key) DO UPDATE
  SET body = EXCLUDED.body, expires_at = EXCLUDED.expires_at
`.trim();

const SQL_PURGE = 'DELETE FROM form_result_cache WHERE expires_at <= NOW()';

/**
 * Result cache shared by every process pointed at the same database. Expiry is
 * evaluated by the database clock.
 */
export class PostgresResultCache implements ResultCache {
  private readonly pool: pg.Pool;

  constructor(config: PostgresResultCacheConfig) {
    this.pool = config.pool;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applyCacheSchema(client);
    } finally {
      client.release();
    }
  }

  async get(key: string): Promise<string | undefined> {
    let result: pg.QueryResult<{ body: string }>;
    try {
      result = await this.pool.query<{ body: string }>(SQL_GET, [key]);
    } catch (err) {
      throw new CacheError(`Failed to read cache entry: ${String(err)}`, err);
    }
    return result.rows[0]?.body;
  }

  async set(key: string, body: string, ttlSeconds: number): Promise<void> {
    try {
      await this.pool.query(SQL_SET, [key, body, ttlSeconds]);
    } catch (err) {
      throw new CacheError(`Failed to write cache entry: ${String(err)}`, err);
    }
  }

  /** Deletes expired entries and returns how many were removed. */
  async purgeExpired(): Promise<number> {
    let result: pg.QueryResult;
    try {
      result = await this.pool.query(SQL_PURGE);
    } catch (err) {
      throw new CacheError(`Failed to purge cache: ${String(err)}`, err);
    }
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
