export type ExtractorKind = 'plain-text' | 'markdown' | 'encyclopedia-markdown';

export interface ContentExtractor {
  readonly kind: ExtractorKind;
  /** `url` is the page's address; used for link resolution and site profiles. */
  extract(html: string, url: string): string;
}

export class ExtractionError extends Error {
  name = 'ExtractionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
