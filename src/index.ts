export { FormsClient } from './client.js';
export type { FormsClientConfig } from './client.js';
export { SearchForm } from './forms/search-form.js';
export { defineForm, parseFormTemplate, FORM_URLENCODED } from './forms/template.js';
export type { FieldSpec, FormTemplate, FormTemplateInit } from './forms/template.js';
export { compilePredicates } from './query/compiler.js';
export { predicates } from './query/predicates.js';
export type { Predicate, PredicateExpression, PredicateValue } from './query/types.js';
export { Document } from './response/document.js';
export type { AlternateLanguage, Fragments } from './response/document.js';
export { SearchResponse } from './response/search-response.js';
export { decodeResponse } from './response/decoder.js';
export { LruCache, systemClock } from './cache/lru-cache.js';
export type { Clock, LruCacheOptions } from './cache/lru-cache.js';
export { NullCache } from './cache/null-cache.js';
export { PostgresResultCache } from './cache/postgres-cache.js';
export type { PostgresResultCacheConfig } from './cache/postgres-cache.js';
export { FetchTransport } from './transport/fetch-transport.js';
export type { FetchTransportOptions } from './transport/fetch-transport.js';
export { LinkResolver, linkResolver } from './link-resolver.js';
export type { DocumentLink, LinkResolverFn } from './link-resolver.js';
export { EXPERIMENTS_COOKIE, PREVIEW_COOKIE } from './constants.js';
export type {
  Ref,
  FieldInput,
  FieldValue,
  QueryParams,
  Transport,
  TransportResponse,
  ResultCache,
  CacheOperation,
} from './types.js';
export {
  FormsError,
  NoRefSetError,
  UnsupportedFormKindError,
  FormSearchError,
  AuthenticationError,
  AuthorizationError,
  RefNotFoundError,
  DecodingError,
  UnknownFieldError,
  CacheError,
} from './errors.js';
