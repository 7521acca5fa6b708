import TurndownService from 'turndown';
import type { CheerioAPI } from 'cheerio';
import { ExtractionError } from './content-extractor';

let turndownInstance: TurndownService | null = null;

function createTurndownInstance(): TurndownService {
  const instance = new TurndownService({
    headingStyle: 'atx',
    hr: '---',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    fence: '```',
    emDelimiter: '*',
    strongDelimiter: '**',
    linkStyle: 'inlined',
  });
  instance.remove(['script', 'style', 'noscript', 'template', 'iframe']);
  return instance;
}

export function getTurndown(): TurndownService {
  turndownInstance ??= createTurndownInstance();
  return turndownInstance;
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/** Rewrites relative hrefs so links stay usable outside the page. */
export function absolutizeLinks($: CheerioAPI, baseUrl: string): void {
  $('a[href]').each((_, anchor) => {
    const href = $(anchor).attr('href');
    const resolved = href ? resolveHref(href, baseUrl) : null;
    if (resolved) {
      $(anchor).attr('href', resolved);
    }
  });
}

export function htmlToMarkdown(html: string): string {
  try {
    return getTurndown().turndown(html);
  } catch (error) {
    throw new ExtractionError('markdown conversion failed', { cause: error });
  }
}

/**
 * Normalises line endings, collapses blank-line runs and guarantees the
 * document opens with a level-one heading.
 */
export function finalizeMarkdown(markdown: string, title: string): string {
  const body = markdown.replace(/\r\n/g, '\n').replace(/\n{2,}/g, '\n\n').trim();
  if (body.startsWith('# ')) return body;
  return body ? `# ${title}\n\n${body}` : `# ${title}`;
}
