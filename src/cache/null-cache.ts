import type { ResultCache } from '../types.js';

/** Installed when caching is disabled: never hits, never stores. */
export class NullCache implements ResultCache {
  async get(_key: string): Promise<string | undefined> {
    return undefined;
  }

  async set(_key: string, _body: string, _ttlSeconds: number): Promise<void> {}
}
