import { Injectable } from '@nestjs/common';
import { ContentExtractor } from './content-extractor';
import { PlainTextExtractor } from './plain-text.extractor';
import { GenericMarkdownExtractor } from './generic-markdown.extractor';
import {
  EncyclopediaMarkdownExtractor,
  isEncyclopediaUrl,
} from './encyclopedia-markdown.extractor';

@Injectable()
export class ExtractionStrategyResolver {
  constructor(
    private readonly plainText: PlainTextExtractor,
    private readonly genericMarkdown: GenericMarkdownExtractor,
    private readonly encyclopediaMarkdown: EncyclopediaMarkdownExtractor,
  ) {}

  resolve(toMarkdown: boolean, url: string): ContentExtractor {
    if (!toMarkdown) return this.plainText;
    return isEncyclopediaUrl(url) ? this.encyclopediaMarkdown : this.genericMarkdown;
  }
}
