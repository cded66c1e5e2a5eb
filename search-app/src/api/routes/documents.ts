import type { FastifyInstance } from 'fastify';
import { predicates } from '../../../../src/index.js';
import type { Document, FormsClient, FormTemplate, Predicate, SearchResponse } from '../../../../src/index.js';
import { DocumentNotFoundError } from '../../errors.js';

interface DocumentsQuery {
  type?: string;
  tags?: string;
  text?: string;
  page?: number;
  pageSize?: number;
  orderings?: string;
  lang?: string;
}

const documentsQuerySchema = {
  type: 'object',
  properties: {
    type: { type: 'string', minLength: 1 },
    tags: { type: 'string', minLength: 1 },
    text: { type: 'string', minLength: 1 },
    page: { type: 'integer', minimum: 1 },
    pageSize: { type: 'integer', minimum: 1, maximum: 100 },
    orderings: { type: 'string', minLength: 1 },
    lang: { type: 'string', minLength: 1 },
  },
  additionalProperties: false,
} as const;

function presentDocument(doc: Document) {
  return {
    id: doc.id,
    uid: doc.uid ?? null,
    type: doc.type,
    href: doc.href,
    tags: doc.tags,
    slug: doc.slug,
    lang: doc.lang,
    firstPublicationDate: doc.firstPublicationDate?.toISOString() ?? null,
    lastPublicationDate: doc.lastPublicationDate?.toISOString() ?? null,
    alternateLanguages: doc.alternateLanguages,
    fragments: doc.fragments,
  };
}

function presentResponse(response: SearchResponse) {
  return {
    page: response.page,
    resultsPerPage: response.resultsPerPage,
    totalResultsSize: response.totalResultsSize,
    totalPages: response.totalPages,
    hasNextPage: response.nextPage !== undefined,
    results: response.results.map(presentDocument),
  };
}

function documentFilters(query: DocumentsQuery): Predicate[] {
  const filters: Predicate[] = [];
  if (query.type !== undefined) filters.push(predicates.at('document.type', query.type));
  if (query.tags !== undefined) filters.push(predicates.at('document.tags', query.tags.split(',')));
  if (query.text !== undefined) filters.push(predicates.fulltext('document', query.text));
  return filters;
}

export async function registerDocumentRoutes(
  app: FastifyInstance,
  client: FormsClient,
  template: FormTemplate,
  ref: string,
): Promise<void> {
  // GET /documents: search documents
  app.get<{ Querystring: DocumentsQuery }>(
    '/documents',
    { schema: { querystring: documentsQuerySchema } },
    async (request, reply) => {
      const { page, pageSize, orderings, lang } = request.query;
      const form = client.form(template).page(page ?? 1).set('pageSize', pageSize).set('orderings', orderings).set('lang', lang);
      const filters = documentFilters(request.query);
      if (filters.length > 0) form.query(filters);
      const response = await form.submit(ref);
      return reply.status(200).send(presentResponse(response));
    },
  );

  // GET /documents/:id: one document by id
  app.get<{ Params: { id: string } }>('/documents/:id', async (request, reply) => {
    const { id } = request.params;
    const response = await client.form(template).query(predicates.at('document.id', id)).submit(ref);
    const doc = response.get(0);
    if (doc === undefined) {
      throw new DocumentNotFoundError(`Document '${id}' not found`);
    }
    return reply.status(200).send(presentDocument(doc));
  });

  // GET /types/:type/:uid: one document by its custom type and uid
  app.get<{ Params: { type: string; uid: string } }>('/types/:type/:uid', async (request, reply) => {
    const { type, uid } = request.params;
    const response = await client.form(template).query(predicates.at(`my.${type}.uid`, uid)).submit(ref);
    const doc = response.get(0);
    if (doc === undefined) {
      throw new DocumentNotFoundError(`No ${type} document with uid '${uid}'`);
    }
    return reply.status(200).send(presentDocument(doc));
  });
}
