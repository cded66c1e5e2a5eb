import type { QueryParams } from '../types.js';

/**
 * Produces `METHOD::ACTION?k=v&...`. Keys are sorted so that equivalent
 * queries share a key whatever order their fields were set in; values of a
 * repeatable field keep their order.
 */
export function deriveCacheKey(method: string, action: string, params: QueryParams): string {
  const search = new URLSearchParams();
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value === undefined) continue;
    if (typeof value === 'string') {
      search.append(key, value);
    } else {
      for (const item of value) search.append(key, item);
    }
  }
  return `${method}::${action}?${search.toString()}`;
}
