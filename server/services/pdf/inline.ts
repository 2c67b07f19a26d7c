// server/services/pdf/inline.ts
// Inline markup carried by paragraph, bullet and table-cell text:
//   <link>url</link>   hyperlink whose visible text is the url itself
//   <sub>x</sub>       subscript run
//   <sup>x</sup>       superscript run
// Anything else, including stray "<", is literal text.

export type InlineSpan =
  | { kind: "text"; text: string }
  | { kind: "link"; text: string; href: string }
  | { kind: "sub"; text: string }
  | { kind: "sup"; text: string };

export const markup = {
  link: (url: string) => `<link>${url}</link>`,
  sub: (text: string) => `<sub>${text}</sub>`,
  sup: (text: string) => `<sup>${text}</sup>`,
};

const TAG_RE = /<(link|sub|sup)>(.*?)<\/\1>/g;

export function parseInline(text: string): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let last = 0;
  for (const m of text.matchAll(TAG_RE)) {
    const start = m.index ?? 0;
    if (start > last) spans.push({ kind: "text", text: text.slice(last, start) });
    const [, tag, inner] = m;
    if (tag === "link") spans.push({ kind: "link", text: inner, href: inner });
    else if (tag === "sub") spans.push({ kind: "sub", text: inner });
    else spans.push({ kind: "sup", text: inner });
    last = start + m[0].length;
  }
  if (last < text.length) spans.push({ kind: "text", text: text.slice(last) });
  return spans;
}

/** Visible text with all markup removed. */
export function plainText(text: string): string {
  return parseInline(text)
    .map((s) => s.text)
    .join("");
}
