import { describe, it, expect, vi } from 'vitest';
import type pg from 'pg';
import { DDL_CREATE_CACHE_TABLE, DDL_CREATE_EXPIRY_INDEX, applyCacheSchema } from '../../src/cache/schema.js';

describe('DDL_CREATE_CACHE_TABLE', () => {
  it('contains CREATE TABLE IF NOT EXISTS form_result_cache', () => {
    expect(DDL_CREATE_CACHE_TABLE).toContain('CREATE TABLE IF NOT EXISTS form_result_cache');
  });

  it('defines cache_key as TEXT PRIMARY KEY', () => {
    expect(DDL_CREATE_CACHE_TABLE).toMatch(/cache_key\s+TEXT\s+PRIMARY KEY/i);
  });

  it('defines body as TEXT NOT NULL', () => {
    expect(DDL_CREATE_CACHE_TABLE).toMatch(/body\s+TEXT\s+NOT NULL/i);
  });

  it('defines expires_at as TIMESTAMPTZ NOT NULL', () => {
    expect(DDL_CREATE_CACHE_TABLE).toMatch(/expires_at\s+TIMESTAMPTZ\s+NOT NULL/i);
  });
});

describe('DDL_CREATE_EXPIRY_INDEX', () => {
  it('indexes expires_at idempotently', () => {
    expect(DDL_CREATE_EXPIRY_INDEX).toContain('CREATE INDEX IF NOT EXISTS idx_form_result_cache_expires_at');
    expect(DDL_CREATE_EXPIRY_INDEX).toContain('(expires_at)');
  });
});

describe('applyCacheSchema()', () => {
  it('runs the table then the index DDL', async () => {
    const client = { query: vi.fn().mockResolvedValue({}) };
    await applyCacheSchema(client as unknown as pg.ClientBase);
    expect(client.query).toHaveBeenCalledTimes(2);
    expect(client.query.mock.calls[0]?.[0]).toBe(DDL_CREATE_CACHE_TABLE);
    expect(client.query.mock.calls[1]?.[0]).toBe(DDL_CREATE_EXPIRY_INDEX);
  });
});
