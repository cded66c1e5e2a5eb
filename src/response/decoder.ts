import { z } from 'zod';
import { DecodingError } from '../errors.js';
import { Document } from './document.js';
import type { AlternateLanguage, Fragments } from './document.js';
import { SearchResponse } from './search-response.js';

const timestampSchema = z
  .string()
  .transform((value) => new Date(value))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' });

const alternateLanguageSchema = z.object({
  id: z.string(),
  uid: z.string().nullish(),
  type: z.string(),
  lang: z.string(),
});

const documentSchema = z.object({
  id: z.string(),
  uid: z.string().nullish(),
  type: z.string(),
  href: z.string(),
  tags: z.array(z.string()),
  slugs: z.array(z.string()),
  first_publication_date: timestampSchema.nullish(),
  last_publication_date: timestampSchema.nullish(),
  lang: z.string(),
  alternate_languages: z.array(alternateLanguageSchema).default([]),
  data: z.record(z.unknown()).default({}),
});

const responseSchema = z
  .object({
    page: z.number().int().positive(),
    results_per_page: z.number().int().nonnegative(),
    results_size: z.number().int().nonnegative(),
    total_results_size: z.number().int().nonnegative(),
    total_pages: z.number().int().nonnegative(),
    next_page: z.string().nullish(),
    prev_page: z.string().nullish(),
    results: z.array(documentSchema),
  })
  .refine((envelope) => envelope.results.length === envelope.results_size, {
    message: 'results_size does not match the number of results',
    path: ['results_size'],
  });

type DocumentJson = z.infer<typeof documentSchema>;

// The service nests fragments under the document type: { data: { [type]: { ... } } }
function extractFragments(doc: DocumentJson): Fragments {
  const nested = doc.data[doc.type];
  if (typeof nested === 'object' && nested !== null && !Array.isArray(nested)) {
    return Object.fromEntries(Object.entries(nested));
  }
  return {};
}

function toAlternateLanguage(alt: z.infer<typeof alternateLanguageSchema>): AlternateLanguage {
  return {
    id: alt.id,
    type: alt.type,
    lang: alt.lang,
    ...(alt.uid != null ? { uid: alt.uid } : {}),
  };
}

function toDocument(doc: DocumentJson): Document {
  return new Document({
    id: doc.id,
    type: doc.type,
    href: doc.href,
    tags: doc.tags,
    slugs: doc.slugs,
    lang: doc.lang,
    alternateLanguages: doc.alternate_languages.map(toAlternateLanguage),
    fragments: extractFragments(doc),
    ...(doc.uid != null ? { uid: doc.uid } : {}),
    ...(doc.first_publication_date != null ? { firstPublicationDate: doc.first_publication_date } : {}),
    ...(doc.last_publication_date != null ? { lastPublicationDate: doc.last_publication_date } : {}),
  });
}

/**
 * Decodes a parsed search response. Either the whole envelope decodes or a
 * {@link DecodingError} is thrown; no partially built document escapes.
 */
export function decodeResponse(json: unknown): SearchResponse {
  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodingError(`Malformed search response: ${parsed.error.message}`, parsed.error);
  }
  const envelope = parsed.data;
  return new SearchResponse({
    page: envelope.page,
    resultsPerPage: envelope.results_per_page,
    resultsSize: envelope.results_size,
    totalResultsSize: envelope.total_results_size,
    totalPages: envelope.total_pages,
    results: envelope.results.map(toDocument),
    ...(envelope.next_page != null ? { nextPage: envelope.next_page } : {}),
    ...(envelope.prev_page != null ? { prevPage: envelope.prev_page } : {}),
  });
}

/** Parses a raw response body and decodes it. */
export function decodeResponseBody(body: string): SearchResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new DecodingError(`Search response is not valid JSON: ${String(err)}`, err);
  }
  return decodeResponse(json);
}
