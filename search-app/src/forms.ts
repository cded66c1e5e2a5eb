import { defineForm } from '../../src/index.js';
import type { FormTemplate } from '../../src/index.js';

/** The repository's catch-all search form. */
export function everythingForm(apiUrl: string): FormTemplate {
  return defineForm({
    name: 'everything',
    rel: 'everything',
    action: `${apiUrl}/documents/search`,
    fields: {
      ref: { type: 'String' },
      q: { type: 'String', repeatable: true },
      page: { type: 'Integer', default: '1' },
      pageSize: { type: 'Integer', default: '20' },
      orderings: { type: 'String' },
      lang: { type: 'String' },
      fetch: { type: 'String' },
      fetchLinks: { type: 'String' },
    },
  });
}
