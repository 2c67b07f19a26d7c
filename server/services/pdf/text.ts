// server/services/pdf/text.ts
// Glyph coverage and line breaking for the embedded standard fonts.

import type { PDFFont } from "pdf-lib";
import type { InlineSpan } from "./inline";

// Common symbols the WinAnsi set lacks.
const ASCII_FALLBACKS: Record<string, string> = {
  "→": "->",
  "←": "<-",
  "↔": "<->",
  "⇒": "=>",
  "≥": ">=",
  "≤": "<=",
  "≠": "!=",
  "≈": "~",
  "∞": "inf",
  "√": "sqrt",
  "✓": "v",
  "✔": "v",
  "✗": "x",
  "−": "-",
  "◦": "-",
  "\u00A0": " ",
  "\u2009": " ",
  "\u202F": " ",
  "\u200B": "",
};

const coverage = new WeakMap<PDFFont, Set<number>>();

function charset(font: PDFFont): Set<number> {
  let set = coverage.get(font);
  if (!set) {
    set = new Set(font.getCharacterSet());
    coverage.set(font, set);
  }
  return set;
}

/** Maps text onto the glyphs `font` can encode: known symbols get ASCII stand-ins, the rest "?". */
export function encodable(font: PDFFont, text: string): string {
  const set = charset(font);
  let out = "";
  for (const ch of text.replace(/\t/g, "    ")) {
    const cp = ch.codePointAt(0) ?? 0;
    if (set.has(cp)) out += ch;
    else if (ch in ASCII_FALLBACKS) out += ASCII_FALLBACKS[ch];
    else if (cp < 32) out += " ";
    else out += "?";
  }
  return out;
}

/** Plain word wrap; words wider than the line are split by character. */
export function wrapPlain(text: string, font: PDFFont, size: number, width: number): string[] {
  const out: string[] = [];
  let current = "";
  for (const word of encodable(font, text).split(/\s+/).filter(Boolean)) {
    const next = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(next, size) <= width) {
      current = next;
      continue;
    }
    if (current) out.push(current);
    if (font.widthOfTextAtSize(word, size) <= width) {
      current = word;
      continue;
    }
    const pieces = splitChars(word, font, size, width);
    out.push(...pieces.slice(0, -1));
    current = pieces[pieces.length - 1] ?? "";
  }
  if (current) out.push(current);
  return out;
}

/** Hard wrap by character, keeping leading whitespace (code listings). */
export function splitChars(text: string, font: PDFFont, size: number, width: number): string[] {
  const out: string[] = [];
  let current = "";
  for (const ch of encodable(font, text)) {
    const next = current + ch;
    if (font.widthOfTextAtSize(next, size) <= width || current === "") {
      current = next;
      continue;
    }
    out.push(current);
    current = ch;
  }
  out.push(current);
  return out;
}

export function truncate(text: string, font: PDFFont, size: number, width: number): string {
  const clean = encodable(font, text);
  if (font.widthOfTextAtSize(clean, size) <= width) return clean;
  let cut = clean;
  while (cut.length > 0 && font.widthOfTextAtSize(`${cut}...`, size) > width) {
    cut = cut.slice(0, -1);
  }
  return `${cut.trimEnd()}...`;
}

/* ─────────────────────────── Rich text ─────────────────────────── */

export interface RichFragment {
  text: string;
  x: number;
  width: number;
  font: PDFFont;
  size: number;
  rise: number;
  href?: string;
}

export interface RichLine {
  fragments: RichFragment[];
  width: number;
}

interface Atom {
  text: string;
  font: PDFFont;
  size: number;
  rise: number;
  href?: string;
  width: number;
}

type Word = Atom[];

const SCRIPT_SCALE = 0.7;

function atomFor(span: InlineSpan, text: string, font: PDFFont, size: number): Atom {
  const scriptSize = size * SCRIPT_SCALE;
  const base = { text: encodable(font, text), font };
  switch (span.kind) {
    case "sub":
      return { ...base, size: scriptSize, rise: -size * 0.2, width: font.widthOfTextAtSize(base.text, scriptSize) };
    case "sup":
      return { ...base, size: scriptSize, rise: size * 0.35, width: font.widthOfTextAtSize(base.text, scriptSize) };
    case "link":
      return { ...base, size, rise: 0, href: span.href, width: font.widthOfTextAtSize(base.text, size) };
    default:
      return { ...base, size, rise: 0, width: font.widthOfTextAtSize(base.text, size) };
  }
}

function wordWidth(word: Word): number {
  return word.reduce((sum, a) => sum + a.width, 0);
}

/**
 * Breaks spans into words. Text with no whitespace between spans stays glued
 * into one word, so "H<sub>2</sub>O" never breaks inside.
 */
function toWords(spans: InlineSpan[], font: PDFFont, size: number): Word[] {
  const words: Word[] = [];
  let glued = false;
  for (const span of spans) {
    for (const token of span.text.split(/(\s+)/)) {
      if (token === "") continue;
      if (/^\s+$/.test(token)) {
        glued = false;
        continue;
      }
      const atom = atomFor(span, token, font, size);
      if (glued && words.length) words[words.length - 1].push(atom);
      else words.push([atom]);
      glued = true;
    }
  }
  return words;
}

function splitWord(word: Word, width: number): Word[] {
  const out: Word[] = [];
  let current: Word = [];
  let used = 0;
  for (const atom of word) {
    let chunk = "";
    for (const ch of atom.text) {
      const w = atom.font.widthOfTextAtSize(chunk + ch, atom.size);
      if (used + w > width && (chunk !== "" || current.length > 0)) {
        if (chunk) current.push({ ...atom, text: chunk, width: atom.font.widthOfTextAtSize(chunk, atom.size) });
        out.push(current);
        current = [];
        used = 0;
        chunk = ch;
        continue;
      }
      chunk += ch;
    }
    if (chunk) {
      const piece = { ...atom, text: chunk, width: atom.font.widthOfTextAtSize(chunk, atom.size) };
      current.push(piece);
      used += piece.width;
    }
  }
  if (current.length) out.push(current);
  return out;
}

/** Greedy line breaking over inline spans in one base font. */
export function layoutRich(spans: InlineSpan[], font: PDFFont, size: number, width: number): RichLine[] {
  const space = font.widthOfTextAtSize(" ", size);
  const lines: Word[][] = [];
  let line: Word[] = [];
  let lineWidth = 0;

  const flush = () => {
    if (line.length) lines.push(line);
    line = [];
    lineWidth = 0;
  };

  for (const word of toWords(spans, font, size)) {
    const w = wordWidth(word);
    const need = line.length ? space + w : w;
    if (lineWidth + need <= width) {
      line.push(word);
      lineWidth += need;
      continue;
    }
    flush();
    if (w <= width) {
      line.push(word);
      lineWidth = w;
      continue;
    }
    const pieces = splitWord(word, width);
    for (const piece of pieces.slice(0, -1)) lines.push([piece]);
    const tail = pieces[pieces.length - 1];
    if (tail) {
      line.push(tail);
      lineWidth = wordWidth(tail);
    }
  }
  flush();

  return lines.map((words) => {
    const fragments: RichFragment[] = [];
    let x = 0;
    words.forEach((word, i) => {
      if (i > 0) x += space;
      for (const atom of word) {
        fragments.push({ text: atom.text, x, width: atom.width, font: atom.font, size: atom.size, rise: atom.rise, href: atom.href });
        x += atom.width;
      }
    });
    return { fragments, width: x };
  });
}
