import type { Ref } from './types.js';
import type { Document, Fragments } from './response/document.js';

/** What a link resolver receives: enough of a document to build an application URL. */
export interface DocumentLink {
  id: string;
  uid?: string;
  type: string;
  tags: readonly string[];
  slug: string;
  lang: string;
  fragments: Fragments;
  broken: boolean;
}

export type LinkResolverFn = (link: DocumentLink) => string;

function isDocumentLink(target: Document | DocumentLink): target is DocumentLink {
  return 'broken' in target;
}

/** Turns documents and document links into URLs of the host application. */
export class LinkResolver {
  constructor(
    readonly ref: Ref | undefined,
    private readonly resolve: LinkResolverFn,
  ) {}

  linkTo(target: Document | DocumentLink): string {
    if (isDocumentLink(target)) return this.resolve(target);
    return this.resolve({
      id: target.id,
      type: target.type,
      tags: target.tags,
      slug: target.slug,
      lang: target.lang,
      fragments: target.fragments,
      broken: false,
      ...(target.uid !== undefined ? { uid: target.uid } : {}),
    });
  }
}

export function linkResolver(ref: Ref | undefined, resolve: LinkResolverFn): LinkResolver {
  return new LinkResolver(ref, resolve);
}
