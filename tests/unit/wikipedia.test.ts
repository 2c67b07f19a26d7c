import { describe, it, expect } from '@jest/globals';
import type { HttpGetter } from '../../server/services/http';
import { WikipediaService, firstSentences } from '../../server/services/wikipedia';

const API = 'https://en.wikipedia.org/w/api.php';
const SUMMARY = 'https://en.wikipedia.org/api/rest_v1/page/summary/';

function fakeHttp(routes: Record<string, unknown>): HttpGetter & { urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    async get(url: string) {
      urls.push(url);
      if (!(url in routes)) throw new Error(`no route for ${url}`);
      return { data: routes[url] };
    },
  };
}

describe('firstSentences', () => {
  it('keeps the leading sentences', () => {
    expect(firstSentences('One. Two! Three? Four.', 3)).toBe('One. Two! Three?');
  });

  it('returns short text unchanged', () => {
    expect(firstSentences('  Only one sentence.  ', 3)).toBe('Only one sentence.');
  });

  it('does not split inside numbers', () => {
    expect(firstSentences('Pi is 3.14 roughly. Next.', 1)).toBe('Pi is 3.14 roughly.');
  });
});

describe('WikipediaService.lookup', () => {
  it('returns three sentences and the page URL', async () => {
    const http = fakeHttp({
      [API]: ['ada', ['Ada Lovelace'], [], []],
      [SUMMARY + 'Ada_Lovelace']: {
        type: 'standard',
        title: 'Ada Lovelace',
        extract: 'Ada was a mathematician. She wrote notes. She died in 1852. She is remembered.',
        content_urls: { desktop: { page: 'https://en.wikipedia.org/wiki/Ada_Lovelace' } },
      },
    });

    const text = await new WikipediaService(http).lookup('ada');

    expect(text).toBe(
      'Ada was a mathematician. She wrote notes. She died in 1852.\n\nSource URL: https://en.wikipedia.org/wiki/Ada_Lovelace',
    );
  });

  it('skips disambiguation pages', async () => {
    const http = fakeHttp({
      [API]: ['mercury', ['Mercury', 'Mercury (planet)'], [], []],
      [SUMMARY + 'Mercury']: { type: 'disambiguation', title: 'Mercury', extract: 'Mercury may refer to:' },
      [SUMMARY + encodeURIComponent('Mercury_(planet)')]: {
        type: 'standard',
        title: 'Mercury (planet)',
        extract: 'Mercury is the first planet.',
      },
    });

    const text = await new WikipediaService(http).lookup('mercury');

    expect(text).toBe(
      `Mercury is the first planet.\n\nSource URL: https://en.wikipedia.org/wiki/${encodeURIComponent('Mercury_(planet)')}`,
    );
  });

  it('lists the candidates when every page is a disambiguation', async () => {
    const http = fakeHttp({
      [API]: ['jaguar', ['Jaguar', 'Jaguar (disambiguation)'], [], []],
      [SUMMARY + 'Jaguar']: { type: 'disambiguation', title: 'Jaguar' },
      [SUMMARY + encodeURIComponent('Jaguar_(disambiguation)')]: { type: 'disambiguation', title: 'Jaguar (disambiguation)' },
    });

    expect(await new WikipediaService(http).lookup('jaguar')).toBe(
      'Multiple matches found: Jaguar, Jaguar (disambiguation)',
    );
  });

  it('reports a query with no matching page', async () => {
    const http = fakeHttp({ [API]: ['qqzzx', [], [], []] });
    expect(await new WikipediaService(http).lookup('qqzzx')).toBe(
      'Could not find Wikipedia article: no page matches "qqzzx"',
    );
    expect(http.urls).toEqual([API]);
  });

  it('turns transport errors into a message', async () => {
    const http = fakeHttp({});
    expect(await new WikipediaService(http).lookup('ada')).toBe(
      `Could not find Wikipedia article: no route for ${API}`,
    );
  });
});
