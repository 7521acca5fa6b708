import * as cheerio from 'cheerio';
import { isComment } from 'domhandler';
import { ExtractionError } from './content-extractor';

// Never carry readable content
export const NON_CONTENT_SELECTORS = 'script, style, noscript, template, iframe, svg, meta, link';

// Page chrome dropped before Markdown conversion
export const LAYOUT_SELECTORS = 'nav, footer, aside, form, figure, header';

export function loadDocument(html: string): cheerio.CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new ExtractionError('document could not be parsed as HTML', { cause: error });
  }
}

export function removeComments($: cheerio.CheerioAPI): void {
  $.root()
    .find('*')
    .addBack()
    .contents()
    .filter((_, node) => isComment(node))
    .remove();
}

export function stripNonContent($: cheerio.CheerioAPI): void {
  $(NON_CONTENT_SELECTORS).remove();
  removeComments($);
}

export function documentTitle($: cheerio.CheerioAPI): string {
  return $('title').first().text().replace(/\s+/g, ' ').trim() || 'No Title';
}
