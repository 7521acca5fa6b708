/**
 * Unit tests for EncyclopediaMarkdownExtractor
 * No mocks needed - runs the real parser and markdown serializer
 */
import {
  EncyclopediaMarkdownExtractor,
  isEncyclopediaUrl,
} from './encyclopedia-markdown.extractor';

const ARTICLE_HTML =
  '<html><head><title>Ada Lovelace - Wikipedia</title></head><body>' +
  '<div id="mw-navigation"><a href="/wiki/Main_Page">Main page</a></div>' +
  '<h1 id="firstHeading"><span class="mw-page-title-main">Ada Lovelace</span></h1>' +
  '<div id="mw-content-text">' +
  '<p>Ada was a mathematician.<sup class="reference"><a href="#cite_note-1">[1]</a></sup></p>' +
  '<h2>Early life<span class="mw-editsection">[<a href="/w/index.php?action=edit">edit</a>]</span></h2>' +
  '<p>She was born in London.</p>' +
  '<div class="reflist"><ol class="references"><li>Citation text</li></ol></div>' +
  '</div>' +
  '<div id="catlinks" class="catlinks">Categories: Mathematicians</div>' +
  '</body></html>';

describe('EncyclopediaMarkdownExtractor', () => {
  const extractor = new EncyclopediaMarkdownExtractor();

  it('should render only the article body under the article title', () => {
    const markdown = extractor.extract(ARTICLE_HTML, 'https://en.wikipedia.org/wiki/Ada_Lovelace');

    expect(markdown).toBe(
      '# Ada Lovelace\n\nAda was a mathematician.\n\n## Early life\n\nShe was born in London.',
    );
  });

  it('should strip navigation, edit links, references and categories', () => {
    const markdown = extractor.extract(ARTICLE_HTML, 'https://en.wikipedia.org/wiki/Ada_Lovelace');

    expect(markdown).not.toContain('Main page');
    expect(markdown).not.toContain('edit');
    expect(markdown).not.toContain('Citation text');
    expect(markdown).not.toContain('Categories');
  });

  it('should drop figures, forms and page header chrome from the article', () => {
    const html =
      '<html><head><title>Ada Lovelace - Wikipedia</title></head><body>' +
      '<header class="mw-body-header"><h1><span class="mw-page-title-main">Ada Lovelace</span></h1>' +
      '<nav>Article Talk</nav></header>' +
      '<div id="mw-content-text">' +
      '<figure><img src="/portrait.jpg" alt="Portrait"><figcaption>Portrait of Ada</figcaption></figure>' +
      '<form><input name="search"><label>Search the wiki</label></form>' +
      '<p>Ada was a mathematician.</p>' +
      '<aside>Related pages</aside>' +
      '</div></body></html>';

    expect(extractor.extract(html, 'https://en.wikipedia.org/wiki/Ada_Lovelace')).toBe(
      '# Ada Lovelace\n\nAda was a mathematician.',
    );
  });

  it('should fall back to the generic rendering without an article container', () => {
    const html =
      '<html><head><title>Wikipedia</title></head><body>' +
      '<div id="mw-panel">Tools</div><p>Portal text</p></body></html>';

    expect(extractor.extract(html, 'https://www.wikipedia.org/')).toBe('# Wikipedia\n\nPortal text');
  });

  it('should use the page title when the article heading is missing', () => {
    const html =
      '<html><head><title>Some Page</title></head><body>' +
      '<div id="mw-content-text"><p>Body.</p></div></body></html>';

    expect(extractor.extract(html, 'https://de.wikipedia.org/wiki/X')).toBe('# Some Page\n\nBody.');
  });
});

describe('isEncyclopediaUrl', () => {
  it.each([
    ['https://en.wikipedia.org/wiki/Ada_Lovelace', true],
    ['https://wikipedia.org/', true],
    ['https://EN.WIKIPEDIA.ORG/wiki/X', true],
    ['https://notwikipedia.org/wiki/X', false],
    ['https://example.com/wikipedia.org', false],
    ['not a url', false],
  ])('%s -> %s', (url, expected) => {
    expect(isEncyclopediaUrl(url)).toBe(expected);
  });
});
