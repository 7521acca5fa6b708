import { Injectable } from '@nestjs/common';
import type { AnyNode } from 'domhandler';
import { hasChildren, isText } from 'domhandler';
import { ContentExtractor } from './content-extractor';
import { loadDocument, stripNonContent } from './html-document';

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
  } else if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, out);
    }
  }
}

export function normalizeLines(chunks: string[]): string {
  return chunks
    .join('\n')
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/** Visible text, one text node per line. */
@Injectable()
export class PlainTextExtractor implements ContentExtractor {
  readonly kind = 'plain-text';

  extract(html: string): string {
    const $ = loadDocument(html);
    stripNonContent($);

    const chunks: string[] = [];
    for (const root of $.root().toArray()) {
      collectText(root, chunks);
    }
    return normalizeLines(chunks);
  }
}
