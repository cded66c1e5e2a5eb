/**
 * A fixed point in time of the document repository. Every search is executed
 * against one ref, so that the same URL always returns the same results.
 */
export interface Ref {
  id: string;
  /** Opaque token sent as the `ref` parameter. */
  ref: string;
  label: string;
  isMaster: boolean;
  scheduledAt?: Date;
}

/** Values accepted by form setters; `null` and `undefined` leave the field untouched. */
export type FieldInput = string | number | boolean | null | undefined;

/** One accumulated field: a single value, a sequence for repeatable fields, or `null` once cleared. */
export type FieldValue = string | readonly string[] | null;

/** Request parameters handed to a transport. */
export type QueryParams = Readonly<Record<string, string | readonly string[]>>;

export interface TransportResponse {
  status: number;
  body: string;
  /** Header names are lower-cased. */
  headers: Readonly<Record<string, string>>;
}

export interface Transport {
  get(url: string, params: QueryParams, headers: Readonly<Record<string, string>>): Promise<TransportResponse>;
}

/**
 * Key/value store for raw response bodies. Implementations must give atomic
 * get/set per key; no locking happens above this interface.
 */
export interface ResultCache {
  get(key: string): Promise<string | undefined>;
  set(key: string, body: string, ttlSeconds: number): Promise<void>;
}

export type CacheOperation = 'get' | 'set';

/** What a search form needs from its client to submit itself. */
export interface SubmissionContext {
  readonly accessToken: string | undefined;
  readonly transport: Transport;
  readonly cache: ResultCache;
  readonly hasCache: boolean;
  reportCacheError(operation: CacheOperation, key: string, error: unknown): void;
}
