import { vi } from 'vitest';
import type { TransportResponse, Transport } from '../../src/types.js';
import { defineForm } from '../../src/forms/template.js';
import type { FormTemplate } from '../../src/forms/template.js';

export const ACTION = 'https://repo.example.test/api/v2/documents/search';

export function everythingForm(overrides: Partial<{ method: string; enctype: string }> = {}): FormTemplate {
  return defineForm({
    name: 'everything',
    rel: 'everything',
    action: ACTION,
    ...overrides,
    fields: {
      ref: { type: 'String' },
      q: { type: 'String', repeatable: true },
      page: { type: 'Integer', default: '1' },
      pageSize: { type: 'Integer', default: '20' },
      orderings: { type: 'String' },
      fetch: { type: 'String' },
      fetchLinks: { type: 'String' },
      lang: { type: 'String' },
    },
  });
}

export function makeDocumentJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'WKxlPCUAAIZ10EHU',
    uid: 'hello-world',
    type: 'blog-post',
    href: 'https://repo.example.test/api/v2/documents/search?ref=R1&q=%5B%5B%3Ad+%3D+at%28document.id%2C+%22WKxlPCUAAIZ10EHU%22%29+%5D%5D',
    tags: ['news'],
    slugs: ['hello-world', 'hello'],
    first_publication_date: '2024-01-02T10:00:00Z',
    last_publication_date: '2024-02-03T11:30:00Z',
    lang: 'en-us',
    alternate_languages: [{ id: 'WKxlPCUAAIZ10EHV', uid: 'bonjour-monde', type: 'blog-post', lang: 'fr-fr' }],
    data: { 'blog-post': { title: [{ type: 'heading1', text: 'Hello world' }] } },
    ...overrides,
  };
}

export function makeResponseJson(
  results: Record<string, unknown>[] = [makeDocumentJson()],
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    page: 1,
    results_per_page: 20,
    results_size: results.length,
    total_results_size: results.length,
    total_pages: 1,
    next_page: null,
    prev_page: null,
    results,
    ...overrides,
  };
}

export function okResponse(body: string, headers: Record<string, string> = {}): TransportResponse {
  return { status: 200, body, headers };
}

/** Transport whose get() answers with `responses` in turn, repeating the last one. */
export function makeTransport(...responses: TransportResponse[]) {
  const get = vi.fn<Transport['get']>();
  for (const response of responses) get.mockResolvedValueOnce(response);
  const last = responses[responses.length - 1];
  if (last !== undefined) get.mockResolvedValue(last);
  const transport: Transport = { get };
  return { transport, get };
}
