import type pg from 'pg';

export const DDL_CREATE_CACHE_TABLE = `
CREATE TABLE IF NOT EXISTS form_result_cache (
  cache_key   TEXT        PRIMARY KEY,
  body        TEXT        NOT NULL,
  expires_at  TIMESTAMPTZ NOT NULL
)
`.trim();

export const DDL_CREATE_EXPIRY_INDEX = `
CREATE INDEX IF NOT EXISTS idx_form_result_cache_expires_at
  ON form_result_cache (expires_at)
`.trim();

export async function applyCacheSchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_CACHE_TABLE);
  await client.query(DDL_CREATE_EXPIRY_INDEX);
}
