/**
 * Unit tests for ExtractionStrategyResolver
 * Uses the real extractor providers
 */
import { Test, TestingModule } from '@nestjs/testing';
import { ExtractionStrategyResolver } from './extraction-strategy.resolver';
import { PlainTextExtractor } from './plain-text.extractor';
import { GenericMarkdownExtractor } from './generic-markdown.extractor';
import { EncyclopediaMarkdownExtractor } from './encyclopedia-markdown.extractor';

describe('ExtractionStrategyResolver', () => {
  let resolver: ExtractionStrategyResolver;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ExtractionStrategyResolver,
        PlainTextExtractor,
        GenericMarkdownExtractor,
        EncyclopediaMarkdownExtractor,
      ],
    }).compile();

    resolver = module.get(ExtractionStrategyResolver);
  });

  it('should pick plain text whenever markdown is off', () => {
    expect(resolver.resolve(false, 'https://en.wikipedia.org/wiki/X').kind).toBe('plain-text');
    expect(resolver.resolve(false, 'https://example.com').kind).toBe('plain-text');
  });

  it('should pick the encyclopedia profile for encyclopedia hosts', () => {
    expect(resolver.resolve(true, 'https://en.wikipedia.org/wiki/X').kind).toBe(
      'encyclopedia-markdown',
    );
  });

  it('should pick generic markdown for every other host', () => {
    expect(resolver.resolve(true, 'https://example.com/wiki/X').kind).toBe('markdown');
  });
});
