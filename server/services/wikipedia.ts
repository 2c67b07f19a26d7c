// server/services/wikipedia.ts
// Wikipedia lookup for the agent: opensearch resolves the best title, the
// REST summary endpoint supplies the text.

import { z } from "zod";
import { axiosGetter, safeErr, USER_AGENT, type HttpGetter } from "./http";

const API_URL = "https://en.wikipedia.org/w/api.php";
const SUMMARY_URL = "https://en.wikipedia.org/api/rest_v1/page/summary/";

export const SUMMARY_SENTENCES = 3;
const MAX_CANDIDATES = 5;

const OpenSearchSchema = z.tuple([z.string(), z.array(z.string())]).rest(z.unknown());

const SummarySchema = z.object({
  type: z.string().default("standard"),
  title: z.string(),
  extract: z.string().default(""),
  content_urls: z
    .object({ desktop: z.object({ page: z.string() }) })
    .optional(),
});

type Summary = z.infer<typeof SummarySchema>;

/** First `count` sentences; a sentence ends at . ! or ? followed by whitespace. */
export function firstSentences(text: string, count: number): string {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .slice(0, count)
    .join(" ");
}

export class WikipediaService {
  constructor(private readonly http: HttpGetter = axiosGetter) {}

  /** Summary plus source URL, or a readable message when nothing matches. */
  async lookup(query: string): Promise<string> {
    try {
      const candidates = await this.candidates(query);
      if (!candidates.length) return `Could not find Wikipedia article: no page matches "${query}"`;

      for (const title of candidates) {
        const page = await this.summary(title);
        if (page.type === "disambiguation") continue;
        const url = page.content_urls?.desktop.page ?? pageUrl(page.title);
        return `${firstSentences(page.extract, SUMMARY_SENTENCES)}\n\nSource URL: ${url}`;
      }
      return `Multiple matches found: ${candidates.join(", ")}`;
    } catch (err) {
      return `Could not find Wikipedia article: ${safeErr(err)}`;
    }
  }

  private async candidates(query: string): Promise<string[]> {
    const r = await this.http.get(API_URL, {
      params: { action: "opensearch", format: "json", limit: MAX_CANDIDATES, search: query, namespace: 0 },
      timeout: 9000,
      headers: { "User-Agent": USER_AGENT },
    });
    const [, titles] = OpenSearchSchema.parse(r.data);
    return titles;
  }

  private async summary(title: string): Promise<Summary> {
    const r = await this.http.get(SUMMARY_URL + encodeURIComponent(title.replace(/ /g, "_")), {
      timeout: 9000,
      headers: { "User-Agent": USER_AGENT },
    });
    return SummarySchema.parse(r.data);
  }
}

function pageUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;
}

export const wikipediaService = new WikipediaService();
