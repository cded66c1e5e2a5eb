import { describe, it, expect, vi } from 'vitest';
import { linkResolver } from '../../src/link-resolver.js';
import type { DocumentLink } from '../../src/link-resolver.js';
import { decodeResponse } from '../../src/response/decoder.js';
import type { Ref } from '../../src/types.js';
import { makeDocumentJson, makeResponseJson } from './helpers.js';

const ref: Ref = { id: 'master', ref: 'R1', label: 'Master', isMaster: true };

describe('LinkResolver', () => {
  it('keeps the ref it was built with', () => {
    expect(linkResolver(ref, () => '/').ref).toBe(ref);
  });

  it('passes a document link straight to the resolver', () => {
    const resolve = vi.fn((link: DocumentLink) => `/${link.type}/${link.slug}`);
    const link: DocumentLink = {
      id: 'A',
      type: 'page',
      tags: [],
      slug: 'about',
      lang: 'en-us',
      fragments: {},
      broken: true,
    };
    expect(linkResolver(ref, resolve).linkTo(link)).toBe('/page/about');
    expect(resolve).toHaveBeenCalledWith(link);
  });

  it('turns a document into a link first', () => {
    const doc = decodeResponse(makeResponseJson()).get(0);
    if (doc === undefined) throw new Error('fixture has no document');
    const resolve = vi.fn((link: DocumentLink) => `/${link.lang}/${link.uid ?? link.id}`);
    expect(linkResolver(ref, resolve).linkTo(doc)).toBe('/en-us/hello-world');
    expect(resolve).toHaveBeenCalledWith({
      id: 'WKxlPCUAAIZ10EHU',
      uid: 'hello-world',
      type: 'blog-post',
      tags: ['news'],
      slug: 'hello-world',
      lang: 'en-us',
      fragments: { title: [{ type: 'heading1', text: 'Hello world' }] },
      broken: false,
    });
  });

  it('omits uid for a document without one', () => {
    const doc = decodeResponse(makeResponseJson([makeDocumentJson({ uid: null, slugs: [] })])).get(0);
    if (doc === undefined) throw new Error('fixture has no document');
    const resolve = vi.fn((link: DocumentLink) => `/${link.slug}`);
    expect(linkResolver(undefined, resolve).linkTo(doc)).toBe('/-');
    expect(resolve.mock.calls[0]?.[0]).not.toHaveProperty('uid');
  });
});
