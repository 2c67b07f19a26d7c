import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import type { AxiosRequestConfig } from 'axios';
import type { HttpGetter } from '../../server/services/http';
import {
  SearcherService,
  dedupeByUrl,
  formatResults,
  hostname,
  isHttpUrl,
  parseDuckDuckGoHtml,
} from '../../server/services/searcher';

type Handler = (config?: AxiosRequestConfig) => unknown;

class FakeHttp implements HttpGetter {
  calls: Array<{ url: string; config?: AxiosRequestConfig }> = [];
  constructor(private readonly routes: Record<string, Handler>) {}

  async get(url: string, config?: AxiosRequestConfig) {
    this.calls.push({ url, config });
    const handler = this.routes[url];
    if (!handler) throw new Error(`no route for ${url}`);
    return { data: handler(config) };
  }
}

const SERP = 'https://serpapi.com/search';
const DDG = 'https://duckduckgo.com/html/';
const WIKI = 'https://en.wikipedia.org/w/api.php';

const DDG_HTML = [
  '<div class="result">',
  '<a rel="nofollow" class="result__a" href="/l/?uddg=https%3A%2F%2Fwww.example.test%2Fsolar&amp;rut=abc">Solar <b>power</b> basics</a>',
  '<a class="result__snippet" href="#">Panels turn <b>light</b> into current.</a>',
  '</div>',
  '<div class="result">',
  '<a rel="nofollow" class="result__a" href="https://direct.test/wind">Wind &amp; grid</a>',
  '</div>',
  '<div class="result">',
  '<a rel="nofollow" class="result__a" href="/l/?uddg=javascript%3Aalert(1)">Bad link</a>',
  '</div>',
].join('\n');

describe('parseDuckDuckGoHtml', () => {
  it('decodes redirect links, titles and snippets', () => {
    const { results, totalResults } = parseDuckDuckGoHtml(DDG_HTML, 10);

    expect(totalResults).toBe(2);
    expect(results[0]).toEqual({
      title: 'Solar power basics',
      url: 'https://www.example.test/solar',
      snippet: 'Panels turn light into current.',
      source: 'example.test',
    });
  });

  it('falls back to the title when no snippet follows', () => {
    const { results } = parseDuckDuckGoHtml(DDG_HTML, 10);
    expect(results[1]).toEqual({
      title: 'Wind & grid',
      url: 'https://direct.test/wind',
      snippet: 'Wind & grid',
      source: 'direct.test',
    });
  });

  it('stops at the requested count', () => {
    expect(parseDuckDuckGoHtml(DDG_HTML, 1).results).toHaveLength(1);
  });

  it('returns nothing for a page without results', () => {
    expect(parseDuckDuckGoHtml('<html><body>No results</body></html>', 5)).toEqual({ results: [], totalResults: 0 });
  });
});

describe('formatResults', () => {
  it('renders Title/Snippet/URL blocks separated by blank lines', () => {
    const text = formatResults([
      { title: 'A', url: 'https://a.test', snippet: 'first' },
      { title: 'B', url: 'https://b.test', snippet: '' },
    ]);
    expect(text).toBe(
      'Title: A\nSnippet: first\nURL: https://a.test\n\nTitle: B\nSnippet: No description\nURL: https://b.test\n',
    );
  });

  it('reports an empty result set', () => {
    expect(formatResults([])).toBe('No results found.');
  });
});

describe('url helpers', () => {
  it('accepts only http and https', () => {
    expect(isHttpUrl('https://a.test/x')).toBe(true);
    expect(isHttpUrl('ftp://a.test')).toBe(false);
    expect(isHttpUrl('not a url')).toBe(false);
  });

  it('strips www from hostnames', () => {
    expect(hostname('https://www.news.test/a')).toBe('news.test');
    expect(hostname('::')).toBe('');
  });

  it('keeps the first result per URL', () => {
    const out = dedupeByUrl([
      { title: 'one', url: 'https://a.test', snippet: '' },
      { title: 'two', url: 'https://a.test', snippet: '' },
      { title: 'three', url: '', snippet: '' },
    ]);
    expect(out.map((r) => r.title)).toEqual(['one']);
  });
});

describe('SearcherService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses SerpAPI when a key is configured', async () => {
    const http = new FakeHttp({
      [SERP]: () => ({
        organic_results: [
          { title: 'Grid storage', link: 'https://www.energy.test/storage', snippet: 'Batteries at scale.' },
          { title: 'No link', snippet: 'dropped' },
          { title: 'Highlights', link: 'https://b.test', snippet_highlighted_words: ['lithium', 'prices'] },
        ],
      }),
    });
    const searcher = new SearcherService(http, 'test-secret');

    const { results } = await searcher.search('grid storage', 5);

    expect(results).toEqual([
      { title: 'Grid storage', url: 'https://www.energy.test/storage', snippet: 'Batteries at scale.', date: undefined, source: 'energy.test' },
      { title: 'Highlights', url: 'https://b.test', snippet: 'lithium prices', date: undefined, source: 'b.test' },
    ]);
    expect(http.calls[0].config?.params).toMatchObject({ q: 'grid storage', api_key: 'test-secret', num: 5 });
  });

  it('falls back to DuckDuckGo when SerpAPI fails', async () => {
    const http = new FakeHttp({
      [SERP]: () => {
        throw new Error('quota exceeded');
      },
      [DDG]: () => DDG_HTML,
    });
    const searcher = new SearcherService(http, 'test-secret');

    const { results } = await searcher.search('solar');

    expect(results.map((r) => r.url)).toEqual(['https://www.example.test/solar', 'https://direct.test/wind']);
    expect(http.calls.map((c) => c.url)).toEqual([SERP, DDG]);
  });

  it('skips SerpAPI without a key and ends with Wikipedia', async () => {
    const http = new FakeHttp({
      [DDG]: () => '<html></html>',
      [WIKI]: () => [
        'tides',
        ['Tide', 'Tidal power'],
        ['Rise and fall of sea levels.', ''],
        ['https://en.wikipedia.org/wiki/Tide', 'https://en.wikipedia.org/wiki/Tidal_power'],
      ],
    });
    const searcher = new SearcherService(http, undefined);

    const { results } = await searcher.search('tides');

    expect(http.calls.map((c) => c.url)).toEqual([DDG, WIKI]);
    expect(results).toEqual([
      { title: 'Tide', url: 'https://en.wikipedia.org/wiki/Tide', snippet: 'Rise and fall of sea levels.', source: 'en.wikipedia.org' },
      { title: 'Tidal power', url: 'https://en.wikipedia.org/wiki/Tidal_power', snippet: 'Tidal power', source: 'en.wikipedia.org' },
    ]);
  });

  it('returns an empty response when every backend fails', async () => {
    const searcher = new SearcherService(new FakeHttp({}), undefined);
    expect(await searcher.search('anything')).toEqual({ results: [], totalResults: 0 });
  });

  it('does not call out for a blank query', async () => {
    const http = new FakeHttp({});
    const searcher = new SearcherService(http, 'test-secret');
    expect(await searcher.search('   ')).toEqual({ results: [], totalResults: 0 });
    expect(http.calls).toEqual([]);
  });

  it('formats the top results for the agent', async () => {
    const searcher = new SearcherService(new FakeHttp({ [DDG]: () => DDG_HTML }), undefined);
    const text = await searcher.searchForAgent('solar');

    expect(text).toBe(
      'Title: Solar power basics\nSnippet: Panels turn light into current.\nURL: https://www.example.test/solar\n\n' +
        'Title: Wind & grid\nSnippet: Wind & grid\nURL: https://direct.test/wind\n',
    );
  });
});
