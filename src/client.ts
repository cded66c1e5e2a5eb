import type { CacheOperation, FieldInput, Ref, ResultCache, SubmissionContext, Transport } from './types.js';
import type { FormTemplate } from './forms/template.js';
import { SearchForm } from './forms/search-form.js';
import { FetchTransport } from './transport/fetch-transport.js';
import { LruCache } from './cache/lru-cache.js';
import { NullCache } from './cache/null-cache.js';

export interface FormsClientConfig {
  /** Sent as `access_token` with every search. */
  accessToken?: string;
  /** Defaults to a {@link FetchTransport}. */
  transport?: Transport;
  /** Defaults to an in-process {@link LruCache}; `false` disables caching. */
  cache?: ResultCache | false;
  /** Called when the cache fails; the search itself carries on. */
  onCacheError?: (operation: CacheOperation, key: string, error: unknown) => void;
}

export class FormsClient implements SubmissionContext {
  readonly accessToken: string | undefined;
  readonly transport: Transport;
  readonly cache: ResultCache;
  private readonly onCacheError: (operation: CacheOperation, key: string, error: unknown) => void;

  constructor(config: FormsClientConfig = {}) {
    this.accessToken = config.accessToken;
    this.transport = config.transport ?? new FetchTransport();
    this.cache = config.cache === false ? new NullCache() : config.cache ?? new LruCache();
    this.onCacheError = config.onCacheError ?? ((operation, key, err) => {
      console.error(`[forms] cache ${operation} failed for "${key}":`, err);
    });
  }

  get hasCache(): boolean {
    return !(this.cache instanceof NullCache);
  }

  reportCacheError(operation: CacheOperation, key: string, error: unknown): void {
    try {
      this.onCacheError(operation, key, error);
    } catch {
      // a failing reporter must not fail the search
    }
  }

  /** Starts a search on `template`, seeded with its defaults, then `data`, then `ref`. */
  form(template: FormTemplate, data: Readonly<Record<string, FieldInput>> = {}, ref?: Ref | string): SearchForm {
    return new SearchForm(this, template, data, ref);
  }
}
