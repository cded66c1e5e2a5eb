export interface AlternateLanguage {
  readonly id: string;
  readonly uid?: string;
  readonly type: string;
  readonly lang: string;
}

/** Fragment payload of a document, keyed by fragment name. Not interpreted by this package. */
export type Fragments = Readonly<Record<string, unknown>>;

export interface DocumentInit {
  id: string;
  uid?: string;
  type: string;
  href: string;
  tags: readonly string[];
  slugs: readonly string[];
  firstPublicationDate?: Date;
  lastPublicationDate?: Date;
  lang: string;
  alternateLanguages: readonly AlternateLanguage[];
  fragments: Fragments;
}

export class Document {
  readonly id: string;
  readonly uid: string | undefined;
  readonly type: string;
  readonly href: string;
  readonly tags: readonly string[];
  /** Most recent first. */
  readonly slugs: readonly string[];
  readonly firstPublicationDate: Date | undefined;
  readonly lastPublicationDate: Date | undefined;
  readonly lang: string;
  readonly alternateLanguages: readonly AlternateLanguage[];
  readonly fragments: Fragments;

  constructor(init: DocumentInit) {
    this.id = init.id;
    this.uid = init.uid;
    this.type = init.type;
    this.href = init.href;
    this.tags = init.tags;
    this.slugs = init.slugs;
    this.firstPublicationDate = init.firstPublicationDate;
    this.lastPublicationDate = init.lastPublicationDate;
    this.lang = init.lang;
    this.alternateLanguages = init.alternateLanguages;
    this.fragments = init.fragments;
  }

  /** The current slug, or `-` when the document has none. */
  get slug(): string {
    return this.slugs[0] ?? '-';
  }
}
