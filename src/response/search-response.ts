import type { Document } from './document.js';

export interface SearchResponseInit {
  page: number;
  resultsPerPage: number;
  resultsSize: number;
  totalResultsSize: number;
  totalPages: number;
  nextPage?: string;
  prevPage?: string;
  results: readonly Document[];
}

/**
 * One page of search results. Only the documents of this page are held;
 * follow `nextPage` (or submit again with another `page`) for the rest.
 */
export class SearchResponse implements Iterable<Document> {
  /** 1-based. */
  readonly page: number;
  readonly resultsPerPage: number;
  readonly resultsSize: number;
  readonly totalResultsSize: number;
  readonly totalPages: number;
  /** Absent on the last page. */
  readonly nextPage: string | undefined;
  /** Absent on the first page. */
  readonly prevPage: string | undefined;
  readonly results: readonly Document[];

  constructor(init: SearchResponseInit) {
    this.page = init.page;
    this.resultsPerPage = init.resultsPerPage;
    this.resultsSize = init.resultsSize;
    this.totalResultsSize = init.totalResultsSize;
    this.totalPages = init.totalPages;
    this.nextPage = init.nextPage;
    this.prevPage = init.prevPage;
    this.results = init.results;
  }

  /** Alias of `page`, for paginators. */
  get currentPage(): number {
    return this.page;
  }

  /** Alias of `resultsPerPage`, for paginators. */
  get limitValue(): number {
    return this.resultsPerPage;
  }

  get length(): number {
    return this.results.length;
  }

  get(index: number): Document | undefined {
    return this.results[index];
  }

  [Symbol.iterator](): Iterator<Document> {
    return this.results[Symbol.iterator]();
  }
}
