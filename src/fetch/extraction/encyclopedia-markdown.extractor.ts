import { Injectable } from '@nestjs/common';
import { ContentExtractor } from './content-extractor';
import { documentTitle, LAYOUT_SELECTORS, loadDocument, stripNonContent } from './html-document';
import { renderPageMarkdown } from './generic-markdown.extractor';
import { absolutizeLinks, finalizeMarkdown, htmlToMarkdown } from './markdown-converter';

const ENCYCLOPEDIA_HOST = 'wikipedia.org';

const CHROME_SELECTORS = [
  // navigation
  '#mw-navigation',
  '#mw-panel',
  '#mw-head',
  '.mw-jump-link',
  '.navbox',
  '.sidebar',
  '#toc',
  '.toc',
  // category footer
  '#catlinks',
  '.catlinks',
  // edit affordances
  '.mw-editsection',
  // references and citations
  'sup.reference',
  '.reflist',
  '.references',
  '.mw-references-wrap',
  '.mw-cite-backlink',
].join(', ');

export function isEncyclopediaUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === ENCYCLOPEDIA_HOST || host.endsWith(`.${ENCYCLOPEDIA_HOST}`);
  } catch {
    return false;
  }
}

/**
 * Article-body profile for encyclopedia pages. Best effort: pages without the
 * article container get the generic rendering.
 */
@Injectable()
export class EncyclopediaMarkdownExtractor implements ContentExtractor {
  readonly kind = 'encyclopedia-markdown';

  extract(html: string, url: string): string {
    const $ = loadDocument(html);
    const pageTitle = documentTitle($);
    stripNonContent($);
    $(CHROME_SELECTORS).remove();

    if ($('#mw-content-text').length === 0) {
      return renderPageMarkdown($, url, pageTitle);
    }

    // The title span sits inside the page <header> on current skins
    const heading = $('.mw-page-title-main').first().text().trim() || pageTitle;
    $(LAYOUT_SELECTORS).remove();
    const article = $('#mw-content-text').first();
    absolutizeLinks($, url);
    const markdown = htmlToMarkdown(article.html() ?? '');
    return finalizeMarkdown(`# ${heading}\n\n${markdown}`, heading);
  }
}
