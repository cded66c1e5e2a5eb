import { vi } from 'vitest';
import { FormsClient } from '../../src/index.js';
import type { Transport, TransportResponse } from '../../src/index.js';
import { buildServer } from '../src/api/server.js';
import { everythingForm } from '../src/forms.js';

export const API_URL = 'https://repo.example.test/api/v2';
export const REF = 'R-master';

export function documentJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'DOC1',
    uid: 'first-post',
    type: 'post',
    href: `${API_URL}/documents/search?ref=${REF}`,
    tags: ['news'],
    slugs: ['first-post'],
    first_publication_date: '2024-05-01T08:00:00Z',
    last_publication_date: '2024-05-02T09:00:00Z',
    lang: 'en-us',
    alternate_languages: [],
    data: { post: { title: 'First post' } },
    ...overrides,
  };
}

export function searchBody(results: Record<string, unknown>[], overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    page: 1,
    results_per_page: 20,
    results_size: results.length,
    total_results_size: results.length,
    total_pages: 1,
    next_page: null,
    prev_page: null,
    results,
    ...overrides,
  });
}

export function buildTestApp(response: TransportResponse) {
  const get = vi.fn<Transport['get']>().mockResolvedValue(response);
  const client = new FormsClient({ transport: { get }, cache: false });
  const app = buildServer(client, { template: everythingForm(API_URL), ref: REF, logger: false });
  return { app, get };
}
