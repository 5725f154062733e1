import { describe, it, expect } from 'vitest';
import { cleanText, extractMainText, WebContentFetcher } from '@/services/contentFetcher';
import { DependencyFailureError } from '@/core/errors';
import { fakeHttp, signal } from '../helpers/http';

const ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Solar Basics</title></head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About</a></nav>
    <article>
      <h1>Solar Basics</h1>
      <p>Solar panels convert sunlight into electricity using photovoltaic cells. Each cell is built from layers of
      silicon that release electrons when photons strike them, and the panel collects those electrons as current.</p>
      <p>Panels are rated in watts under standard test conditions. Real output depends on orientation, shading,
      temperature and the season, so installers size systems from local irradiance data rather than the label alone.</p>
      <p>An inverter turns the direct current from the panels into alternating current for the home and the grid.</p>
    </article>
    <footer>Follow us on social media</footer>
  </body>
</html>`;

describe('cleanText', () => {
  it('collapses whitespace and strips boilerplate phrases', () => {
    expect(cleanText('Hello   world.  Read our privacy policy and more. End', 100)).toEqual({
      text: 'Hello world. Read our . End',
      truncated: false,
    });
  });

  it('truncates with an ellipsis inside the length limit', () => {
    expect(cleanText('abcdefghij', 7)).toEqual({ text: 'abcd...', truncated: true });

    const { text } = cleanText('word '.repeat(100), 50);
    expect(text).toBe(`${'word '.repeat(9)}wo...`);
    expect(text).toHaveLength(50);
  });

  it('does not split a surrogate pair when truncating', () => {
    expect(cleanText(`ab${'\u{1F600}'.repeat(5)}`, 6)).toEqual({ text: 'ab...', truncated: true });
  });
});

describe('extractMainText', () => {
  it('keeps the article body and drops page chrome', () => {
    const { title, text, truncated } = extractMainText(ARTICLE_HTML, 5000);
    expect(title).toBe('Solar Basics');
    expect(text).toContain('convert sunlight into electricity using photovoltaic cells');
    expect(text).toContain('An inverter turns the direct current');
    expect(text).not.toContain('Follow us');
    expect(text).not.toContain('<p>');
    expect(truncated).toBe(false);
  });

  it('falls back to the page text when there is no article', () => {
    const { text } = extractMainText('<html><body><main>Short note.</main></body></html>', 5000);
    expect(text).toBe('Short note.');
  });
});

describe('WebContentFetcher', () => {
  it('fetches directly without a proxy key and costs nothing', async () => {
    const { http, calls } = fakeHttp(() => ({ data: ARTICLE_HTML, headers: { 'content-type': 'text/html; charset=utf-8' } }));
    const fetcher = new WebContentFetcher({ maxContentLength: 5000, http });

    const source = await fetcher.fetch('https://solar.example/basics', signal(), 'Solar power 101');

    expect(fetcher.costPerRequest).toBe(0);
    expect(calls.map((c) => c.url)).toEqual(['https://solar.example/basics']);
    expect(source).toMatchObject({ url: 'https://solar.example/basics', title: 'Solar power 101', fetchStatus: 'ok' });
    expect(source.extractedText).toContain('photovoltaic cells');
  });

  it('uses the page title when the caller has none', async () => {
    const { http } = fakeHttp(() => ({ data: ARTICLE_HTML }));
    const source = await new WebContentFetcher({ maxContentLength: 5000, http }).fetch('https://solar.example/basics', signal());
    expect(source.title).toBe('Solar Basics');
  });

  it('marks long pages as truncated', async () => {
    const { http } = fakeHttp(() => ({ data: ARTICLE_HTML }));
    const source = await new WebContentFetcher({ maxContentLength: 40, http }).fetch('https://solar.example/basics', signal());
    expect(source.fetchStatus).toBe('truncated');
    expect(source.extractedText.endsWith('...')).toBe(true);
    expect(source.extractedText.length).toBeLessThanOrEqual(40);
  });

  it('goes through the proxy first and falls back to a direct request', async () => {
    const { http, calls } = fakeHttp((config) =>
      config.url === 'https://api.zenrows.com/v1/' ? { data: 'upstream error', status: 502 } : { data: ARTICLE_HTML },
    );
    const fetcher = new WebContentFetcher({ maxContentLength: 5000, zenrowsApiKey: 'test-secret', http });

    const source = await fetcher.fetch('https://solar.example/basics', signal());

    expect(fetcher.costPerRequest).toBe(0.01);
    expect(calls.map((c) => c.url)).toEqual(['https://api.zenrows.com/v1/', 'https://solar.example/basics']);
    expect(calls[0].params).toMatchObject({ url: 'https://solar.example/basics', apikey: 'test-secret' });
    expect(source.fetchStatus).toBe('ok');
  });

  it('maps HTTP failures onto failure kinds', async () => {
    const notFound = fakeHttp(() => ({ data: '', status: 404 }));
    await expect(
      new WebContentFetcher({ maxContentLength: 5000, http: notFound.http }).fetch('https://x.example/gone', signal()),
    ).rejects.toMatchObject({ dependency: 'content_fetcher', kind: 'not_found' });

    const forbidden = fakeHttp(() => ({ data: '', status: 403 }));
    await expect(
      new WebContentFetcher({ maxContentLength: 5000, http: forbidden.http }).fetch('https://x.example/private', signal()),
    ).rejects.toMatchObject({ kind: 'blocked' });
  });

  it('rejects non-HTML content', async () => {
    const { http } = fakeHttp(() => ({ data: '%PDF-1.7', headers: { 'content-type': 'application/pdf' } }));
    await expect(
      new WebContentFetcher({ maxContentLength: 5000, http }).fetch('https://x.example/file.pdf', signal()),
    ).rejects.toThrow('unsupported content type application/pdf');
  });

  it('fails on a page without extractable text', async () => {
    const { http } = fakeHttp(() => ({ data: '<html><body><script>var x = 1;</script></body></html>' }));
    await expect(
      new WebContentFetcher({ maxContentLength: 5000, http }).fetch('https://x.example/empty', signal()),
    ).rejects.toBeInstanceOf(DependencyFailureError);
  });
});
