// server/services/searcher.ts
// Web search: SerpAPI first when a key is configured; DuckDuckGo HTML fallback
// (keyless); Wikipedia opensearch as the last resort so there is something to cite.

import { z } from "zod";
import { config } from "../config";
import { axiosGetter, safeErr, USER_AGENT, type HttpGetter } from "./http";

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  date?: string;
  source?: string;
}

export interface SearchResponse {
  results: SearchResult[];
  totalResults: number;
}

export const TOOL_RESULT_COUNT = 5;

const SerpResultSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  snippet: z.string().optional(),
  snippet_highlighted_words: z.array(z.string()).optional(),
  date: z.string().optional(),
});

const SerpResponseSchema = z.object({
  organic_results: z.array(SerpResultSchema).default([]),
});

// [query, titles, descriptions, urls]
const OpenSearchSchema = z.tuple([z.string(), z.array(z.string()), z.array(z.string()), z.array(z.string())]);

export class SearcherService {
  constructor(
    private readonly http: HttpGetter = axiosGetter,
    private readonly serpApiKey: string | undefined = config.serpApiKey,
  ) {}

  async search(query: string, maxResults = 10): Promise<SearchResponse> {
    if (!query.trim()) return { results: [], totalResults: 0 };

    // 1) SerpAPI (Google) if key present
    if (this.serpApiKey) {
      try {
        return await this.searchWithSerpAPI(query, maxResults);
      } catch (err) {
        console.warn("SerpAPI failed, falling back:", safeErr(err));
      }
    }

    // 2) DuckDuckGo HTML fallback
    try {
      const r = await this.searchWithDuckDuckGoHTML(query, maxResults);
      if (r.totalResults > 0) return r;
    } catch (err) {
      console.warn("DDG HTML fallback failed:", safeErr(err));
    }

    // 3) Wikipedia micro-fallback
    try {
      const w = await this.searchWikipedia(query, Math.min(maxResults, 5));
      if (w.totalResults > 0) return w;
    } catch (err) {
      console.warn("Wikipedia fallback failed:", safeErr(err));
    }

    return { results: [], totalResults: 0 };
  }

  /** Tool-facing search: top results as Title/Snippet/URL blocks. */
  async searchForAgent(query: string): Promise<string> {
    const { results } = await this.search(query, TOOL_RESULT_COUNT);
    return formatResults(results.slice(0, TOOL_RESULT_COUNT));
  }

  private async searchWithSerpAPI(query: string, maxResults: number): Promise<SearchResponse> {
    const r = await this.http.get("https://serpapi.com/search", {
      params: {
        q: query,
        api_key: this.serpApiKey,
        engine: "google",
        num: Math.min(maxResults, 10),
        hl: "en",
      },
      timeout: 10000,
    });

    const { organic_results } = SerpResponseSchema.parse(r.data);
    const mapped: SearchResult[] = organic_results
      .map((it) => ({
        title: it.title ?? "",
        url: it.link ?? "",
        snippet: it.snippet || it.snippet_highlighted_words?.join(" ") || "",
        date: it.date,
        source: hostname(it.link ?? ""),
      }))
      .filter((x) => x.title && isHttpUrl(x.url) && x.snippet);

    const deduped = dedupeByUrl(mapped).slice(0, maxResults);
    return { results: deduped, totalResults: deduped.length };
  }

  // Links look like: <a class="result__a" href="/l/?uddg=<ENCODED_URL>&rut=...">Title</a>
  private async searchWithDuckDuckGoHTML(query: string, maxResults: number): Promise<SearchResponse> {
    const res = await this.http.get("https://duckduckgo.com/html/", {
      params: { q: query, kl: "us-en" },
      timeout: 12000,
      responseType: "text",
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml",
      },
    });
    return parseDuckDuckGoHtml(typeof res.data === "string" ? res.data : "", maxResults);
  }

  private async searchWikipedia(query: string, maxResults: number): Promise<SearchResponse> {
    const r = await this.http.get("https://en.wikipedia.org/w/api.php", {
      params: {
        action: "opensearch",
        format: "json",
        limit: Math.min(maxResults, 10),
        search: query,
        namespace: 0,
      },
      timeout: 9000,
      headers: { "User-Agent": USER_AGENT },
    });

    const [, titles, descs, urls] = OpenSearchSchema.parse(r.data);
    const results: SearchResult[] = [];
    titles.forEach((title, i) => {
      const url = urls[i] ?? "";
      if (!isHttpUrl(url)) return;
      results.push({ title, url, snippet: (descs[i] || title).trim(), source: hostname(url) });
    });
    const deduped = dedupeByUrl(results);
    return { results: deduped, totalResults: deduped.length };
  }
}

/* --------------------------- parsing --------------------------- */

export function parseDuckDuckGoHtml(html: string, maxResults: number): SearchResponse {
  const out: SearchResult[] = [];
  const linkRe = /<a[^>]+class="result__a"[^>]+href="([^"]+)"[^>]*>(.*?)<\/a>/gim;
  const snippetRe = /<a[^>]+class="result__snippet[^"]*"[^>]*>(.*?)<\/a>|<div[^>]+class="result__snippet[^"]*"[^>]*>(.*?)<\/div>/im;

  let m: RegExpExecArray | null;
  while ((m = linkRe.exec(html)) && out.length < maxResults) {
    const href = decodeHtml(m[1]);
    let target = "";
    try {
      const u = new URL(href, "https://duckduckgo.com");
      target = u.searchParams.get("uddg") ?? (isHttpUrl(href) ? href : "");
    } catch {
      target = "";
    }
    if (!isHttpUrl(target)) continue;

    const title = collapse(stripTags(decodeHtml(m[2])));
    if (!title) continue;

    // snippet: the first snippet element after this link
    const after = html.slice(linkRe.lastIndex, linkRe.lastIndex + 1600);
    const sm = snippetRe.exec(after);
    const snippet = sm ? collapse(stripTags(decodeHtml(sm[1] ?? sm[2] ?? ""))) : "";

    out.push({ title, url: target, snippet: snippet || title, source: hostname(target) });
  }

  const deduped = dedupeByUrl(out);
  return { results: deduped, totalResults: deduped.length };
}

export function formatResults(results: SearchResult[]): string {
  if (!results.length) return "No results found.";
  return results
    .map((r) => `Title: ${r.title || "No title"}\nSnippet: ${r.snippet || "No description"}\nURL: ${r.url || "No link"}\n`)
    .join("\n");
}

/* --------------------------- helpers --------------------------- */

export function isHttpUrl(u: string): boolean {
  try {
    const { protocol } = new URL(u);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function hostname(u: string): string {
  try {
    return new URL(u).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
}

export function dedupeByUrl(arr: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  const out: SearchResult[] = [];
  for (const it of arr) {
    const key = it.url.trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

function decodeHtml(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'");
}

function stripTags(s: string): string {
  return s.replace(/<[^>]*>/g, " ");
}

function collapse(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export const searcherService = new SearcherService();
