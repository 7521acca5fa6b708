import { Injectable } from '@nestjs/common';
import type { CheerioAPI } from 'cheerio';
import { ContentExtractor } from './content-extractor';
import { documentTitle, LAYOUT_SELECTORS, loadDocument, stripNonContent } from './html-document';
import { absolutizeLinks, finalizeMarkdown, htmlToMarkdown } from './markdown-converter';

/**
 * Converts the page body after the usual chrome (nav, header, footer...) is gone.
 * Expects `$` to be cleaned of non-content nodes already.
 */
export function renderPageMarkdown($: CheerioAPI, url: string, title: string): string {
  $(LAYOUT_SELECTORS).remove();
  absolutizeLinks($, url);

  const body = $('body');
  const html = (body.length > 0 ? body.html() : $.root().html()) ?? '';
  return finalizeMarkdown(htmlToMarkdown(html), title);
}

@Injectable()
export class GenericMarkdownExtractor implements ContentExtractor {
  readonly kind = 'markdown';

  extract(html: string, url: string): string {
    const $ = loadDocument(html);
    const title = documentTitle($);
    stripNonContent($);
    return renderPageMarkdown($, url, title);
  }
}
