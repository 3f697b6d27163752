import { describe, expect, it } from 'vitest';

import { extractContent } from '../src/fetching/parsing/extractContent.js';

describe('extractContent', () => {
  const page = `<html><body>
    <div><p>Sidebar text</p></div>
    <main><h1>Title</h1><p>Body   text</p></main>
  </body></html>`;

  it('reads the whole body by default', () => {
    expect(extractContent(page)).toEqual({
      title: 'Title',
      markdown: 'Sidebar text\n\n# Title\n\nBody text',
    });
  });

  it('restricts documentation pages to the main element', () => {
    expect(extractContent(page, { preferMainContent: true }).markdown).toBe('# Title\n\nBody text');
  });

  it('prefers the document title over the first heading', () => {
    const html = '<html><head><title> Guide | Demo </title></head><body><h1>Other</h1></body></html>';

    expect(extractContent(html).title).toBe('Guide | Demo');
  });

  it('drops navigation and scripts', () => {
    const html = '<body><nav><p>Menu</p></nav><p>Kept</p><script>var hidden = 1;</script></body>';

    expect(extractContent(html).markdown).toBe('Kept');
  });

  it('renders lists and quotes without repeating nested blocks', () => {
    const html = '<body><ul><li>One <p>inner</p></li></ul><blockquote><p>Quote</p></blockquote></body>';

    expect(extractContent(html).markdown).toBe('- One inner\n\n> Quote');
  });

  it('fences preformatted code with the language from its class', () => {
    const html = '<body><pre class="lang-ruby">puts "hi"\n\n</pre></body>';

    expect(extractContent(html).markdown).toBe('```ruby\nputs "hi"\n```');
  });

  it('falls back to the collapsed text when there are no blocks', () => {
    expect(extractContent('<body><div>Just   text</div></body>')).toEqual({
      title: undefined,
      markdown: 'Just text',
    });
  });
});
