// server/services/pdf/referenceList.ts
import { markup } from "./inline";

// http(s) token up to whitespace, a closing bracket/paren, or inline markup
export const URL_RE = /https?:\/\/[^\s)\]<>]+/g;

/** Ordered, de-duplicated URLs in order of first appearance; index + 1 is the citation number. */
export class ReferenceList {
  private readonly urls: string[] = [];
  private readonly seen = new Set<string>();

  add(url: string): number {
    if (!this.seen.has(url)) {
      this.seen.add(url);
      this.urls.push(url);
    }
    return this.urls.indexOf(url) + 1;
  }

  get size(): number {
    return this.urls.length;
  }

  get entries(): string[] {
    return [...this.urls];
  }

  /**
   * Wraps every URL token in link markup and records it. The wrapped text is
   * the matched token unchanged.
   */
  linkify(text: string): string {
    return text.replace(URL_RE, (url) => {
      this.add(url);
      return markup.link(url);
    });
  }
}
