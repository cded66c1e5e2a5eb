import type { QueryParams, SubmissionContext } from '../types.js';
import {
  AuthenticationError,
  AuthorizationError,
  FormSearchError,
  RefNotFoundError,
  UnsupportedFormKindError,
} from '../errors.js';
import { deriveCacheKey } from './cache-key.js';
import { FORM_URLENCODED } from './template.js';

export interface SubmissionRequest {
  method: string;
  enctype: string;
  action: string;
  /** Present fields only, `ref` included. */
  params: QueryParams;
}

const MAX_AGE_PATTERN = /max-age\s*=\s*(\d+)/;

/** Extracts the `max-age` directive in seconds, if any. */
export function parseMaxAge(cacheControl: string | undefined): number | undefined {
  const seconds = MAX_AGE_PATTERN.exec(cacheControl ?? '')?.[1];
  return seconds !== undefined ? Number.parseInt(seconds, 10) : undefined;
}

function headerValue(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const found = Object.keys(headers).find((key) => key.toLowerCase() === name);
  return found !== undefined ? headers[found] : undefined;
}

function parseErrorBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

export function errorForStatus(status: number, rawBody: string): FormSearchError {
  const body = parseErrorBody(rawBody);
  switch (status) {
    case 401:
      return new AuthenticationError(body);
    case 403:
      return new AuthorizationError(body);
    case 404:
      return new RefNotFoundError(body);
    default:
      return new FormSearchError(status, body);
  }
}

async function readCache(context: SubmissionContext, key: string): Promise<string | undefined> {
  if (!context.hasCache) return undefined;
  try {
    return await context.cache.get(key);
  } catch (err) {
    context.reportCacheError('get', key, err);
    return undefined;
  }
}

async function writeCache(context: SubmissionContext, key: string, body: string, ttlSeconds: number): Promise<void> {
  try {
    await context.cache.set(key, body, ttlSeconds);
  } catch (err) {
    context.reportCacheError('set', key, err);
  }
}

/**
 * Runs one form submission: cache lookup, then on a miss the HTTP call,
 * freshness handling and status mapping. Resolves with the raw body.
 */
export async function submitRequest(context: SubmissionContext, request: SubmissionRequest): Promise<string> {
  const cacheKey = deriveCacheKey(request.method, request.action, request.params);

  const cached = await readCache(context, cacheKey);
  if (cached !== undefined) return cached;

  if (request.method !== 'GET' || request.enctype !== FORM_URLENCODED) {
    throw new UnsupportedFormKindError(request.method, request.enctype);
  }

  const params: QueryParams = context.accessToken !== undefined
    ? { ...request.params, access_token: context.accessToken }
    : request.params;

  const response = await context.transport.get(request.action, params, { Accept: 'application/json' });

  if (response.status !== 200) {
    throw errorForStatus(response.status, response.body);
  }

  const ttl = parseMaxAge(headerValue(response.headers, 'cache-control'));
  if (ttl !== undefined && context.hasCache) {
    await writeCache(context, cacheKey, response.body, ttl);
  }
  return response.body;
}
