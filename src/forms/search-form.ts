import type { FieldInput, FieldValue, QueryParams, Ref, SubmissionContext } from '../types.js';
import type { PredicateExpression } from '../query/types.js';
import type { FieldSpec, FormTemplate } from './template.js';
import type { SearchResponse } from '../response/search-response.js';
import { compilePredicates } from '../query/compiler.js';
import { decodeResponseBody } from '../response/decoder.js';
import { NoRefSetError, UnknownFieldError } from '../errors.js';
import { fieldAccessors } from './template.js';
import { submitRequest } from './submit.js';

// Convenience setters that only forward to set(); a field helper of the same
// name does the same thing, so they do not reserve the name.
const PLAIN_FIELD_SETTERS: ReadonlySet<string> = new Set(['page', 'pageSize', 'orderings', 'fetch', 'fetchLinks', 'lang']);

let reservedNames: ReadonlySet<string> | undefined;

function memberNames(): ReadonlySet<string> {
  reservedNames ??= new Set([
    ...Object.getOwnPropertyNames(SearchForm.prototype).filter((name) => !PLAIN_FIELD_SETTERS.has(name)),
    'accessors',
    'template',
  ]);
  return reservedNames;
}

/**
 * Mutable parameter set for one form of the repository. Setters return the
 * form itself so calls chain; the form can be submitted any number of times.
 *
 * @example
 * const response = await client
 *   .form(everything)
 *   .query(predicates.at('document.type', 'blog-post'))
 *   .pageSize(10)
 *   .submit(masterRef);
 */
export class SearchForm {
  private readonly values = new Map<string, FieldValue>();
  private refToken: string | undefined;
  /** Accessor name -> field name, for {@link setAccessor}. */
  readonly accessors: ReadonlyMap<string, string>;

  constructor(
    private readonly context: SubmissionContext,
    readonly template: FormTemplate,
    data: Readonly<Record<string, FieldInput>> = {},
    ref?: Ref | string,
  ) {
    this.accessors = fieldAccessors(template, memberNames());
    for (const [fieldName, value] of template.defaultData) this.set(fieldName, value);
    for (const [fieldName, value] of Object.entries(data)) this.set(fieldName, value);
    if (ref !== undefined) this.ref(ref);
  }

  get formName(): string {
    return this.template.name;
  }

  get formMethod(): string {
    return this.template.method;
  }

  get formRel(): string | undefined {
    return this.template.rel;
  }

  get formEnctype(): string {
    return this.template.enctype;
  }

  get formAction(): string {
    return this.template.action;
  }

  get formFields(): ReadonlyMap<string, FieldSpec> {
    return this.template.fields;
  }

  /** Snapshot of the accumulated fields; `null` marks a cleared field. */
  get data(): Readonly<Record<string, FieldValue>> {
    return Object.fromEntries(this.values);
  }

  /** The bound ref token, if any. */
  get refValue(): string | undefined {
    return this.refToken;
  }

  /**
   * Sets a field. `null`/`undefined` are ignored and `''` clears the field.
   * Repeatable fields accumulate values, other fields are overwritten.
   * A `ref` field is stored like any other but never chooses the submitted
   * ref; use {@link ref} or pass one to {@link submit}.
   */
  set(fieldName: string, value: FieldInput): this {
    if (value === undefined || value === null) return this;
    if (value === '') {
      this.values.set(fieldName, null);
      return this;
    }
    const text = String(value);
    if (this.template.fields.get(fieldName)?.repeatable === true) {
      const previous = this.values.get(fieldName);
      const sequence = typeof previous === 'object' && previous !== null ? previous : [];
      this.values.set(fieldName, [...sequence, text]);
    } else {
      this.values.set(fieldName, text);
    }
    return this;
  }

  /** Sets a field through its accessor name, e.g. `page_size` for `pageSize`. */
  setAccessor(accessor: string, value: FieldInput): this {
    const fieldName = this.accessors.get(accessor);
    if (fieldName === undefined) {
      throw new UnknownFieldError(accessor, this.template.name);
    }
    return this.set(fieldName, value);
  }

  /** Sets `q`, compiling predicates into the query language. */
  query(expr: PredicateExpression): this {
    return this.set('q', compilePredicates(expr));
  }

  q(expr: PredicateExpression): this {
    return this.query(expr);
  }

  ref(ref: Ref | string): this {
    this.refToken = typeof ref === 'string' ? ref : ref.ref;
    return this;
  }

  page(page: number | string): this {
    return this.set('page', page);
  }

  pageSize(pageSize: number | string): this {
    return this.set('pageSize', pageSize);
  }

  /** e.g. `[my.blog-post.date desc]` */
  orderings(orderings: string): this {
    return this.set('orderings', orderings);
  }

  /** Restricts returned fragments to a comma-separated list of fields. */
  fetch(fields: string): this {
    return this.set('fetch', fields);
  }

  /** Fragments to include for document links, comma-separated. */
  fetchLinks(fields: string): this {
    return this.set('fetchLinks', fields);
  }

  lang(lang: string): this {
    return this.set('lang', lang);
  }

  /** Submits and decodes the response. See {@link submitRaw} for the ref rules. */
  async submit(ref?: Ref | string): Promise<SearchResponse> {
    return decodeResponseBody(await this.submitRaw(ref));
  }

  /**
   * Submits and resolves with the raw JSON body. The ref comes from the
   * argument, an earlier {@link ref} call or the one bound at creation; without
   * one the call fails with {@link NoRefSetError} before any I/O.
   */
  async submitRaw(ref?: Ref | string): Promise<string> {
    if (ref !== undefined) this.ref(ref);
    const token = this.refToken;
    if (token === undefined) {
      throw new NoRefSetError();
    }
    return submitRequest(this.context, {
      method: this.template.method,
      enctype: this.template.enctype,
      action: this.template.action,
      params: this.toParams(token),
    });
  }

  private toParams(ref: string): QueryParams {
    const params: Record<string, string | readonly string[]> = {};
    for (const [fieldName, value] of this.values) {
      if (value !== null) params[fieldName] = value;
    }
    params['ref'] = ref;
    return params;
  }
}
