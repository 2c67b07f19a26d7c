// server/services/pdf/scanner.ts
// Single pass over markdown-like text. Each line is offered to an ordered
// list of rules; the first rule that claims it decides the block type.

import fs from "fs";
import path from "path";
import type { BulletBlock, ContentBlock, HeadingLevel, TocEntry } from "./blocks";
import { ReferenceList } from "./referenceList";
import { SectionNumberTracker } from "./sectionTracker";
import { normalizeScripts } from "./unicode";

/* ─────────────────────────── Options ─────────────────────────── */

export type HeadingPredicate = (line: string) => boolean;

export interface ScanOptions {
  /** Relative image paths resolve against this directory. */
  imageBaseDir: string;
  fileExists?: (p: string) => boolean;
  /** Promotes an unmarked line to a level-1 heading (trailing colon dropped). */
  isImplicitHeading?: HeadingPredicate;
}

export interface ScanResult {
  blocks: ContentBlock[];
  toc: TocEntry[];
  references: string[];
}

// 0.15in
export const BLANK_LINE_SPACE = 10.8;

export const PAGE_BREAK_MARKERS = new Set(["---", "\\pagebreak", "<pagebreak>"]);

export const colonHeading: HeadingPredicate = (line) =>
  line.length < 60 && /^[A-Z][^.!?]*:$/.test(line);

/* ─────────────────────────── Scanner state ─────────────────────────── */

interface ScanState {
  lines: string[];
  index: number;
  blocks: ContentBlock[];
  tracker: SectionNumberTracker;
  references: ReferenceList;
  options: Required<ScanOptions>;
}

/** Returns true when it consumed the line(s) at `state.index` and advanced the cursor. */
type Rule = (state: ScanState, line: string, stripped: string) => boolean;

function inlineText(state: ScanState, text: string): string {
  return state.references.linkify(normalizeScripts(text));
}

/* ─────────────────────────── Rules ─────────────────────────── */

const FENCE = "```";

const codeFence: Rule = (state, _line, stripped) => {
  if (!stripped.startsWith(FENCE)) return false;
  const language = stripped.slice(FENCE.length).trim() || undefined;
  const body: string[] = [];
  let i = state.index + 1;
  while (i < state.lines.length && !state.lines[i].trim().startsWith(FENCE)) {
    body.push(state.lines[i]);
    i++;
  }
  // an unclosed fence runs to the end of input
  state.blocks.push({ kind: "code", language, text: body.join("\n") });
  state.index = i + 1;
  return true;
};

const SEPARATOR_RE = /^\|[\s:|-]*-[\s:|-]*\|?$/;

export function splitTableRow(row: string): string[] {
  const cells = row.split("|");
  if (cells.length && cells[0].trim() === "") cells.shift();
  if (cells.length && cells[cells.length - 1].trim() === "") cells.pop();
  return cells.map((c) => c.trim());
}

const table: Rule = (state, _line, stripped) => {
  if (!stripped.startsWith("|")) return false;
  const consumed: string[] = [];
  const rows: string[][] = [];
  let i = state.index;
  while (i < state.lines.length) {
    const row = state.lines[i].trim();
    if (!row.startsWith("|")) break;
    consumed.push(row);
    if (!SEPARATOR_RE.test(row)) rows.push(splitTableRow(row));
    i++;
  }
  state.index = i;

  if (rows.length === 0) {
    for (const row of consumed) {
      state.blocks.push({ kind: "paragraph", text: inlineText(state, row) });
    }
    return true;
  }

  const [header, ...body] = rows.map((cells) => cells.map((c) => inlineText(state, c)));
  state.blocks.push({ kind: "table", header, rows: body });
  return true;
};

const IMAGE_RE = /^!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/;

const image: Rule = (state, _line, stripped) => {
  if (!stripped.startsWith("![")) return false;
  const m = IMAGE_RE.exec(stripped);
  if (!m) return false;
  const [, alt, rawPath] = m;
  const resolved = path.isAbsolute(rawPath)
    ? rawPath
    : path.resolve(state.options.imageBaseDir, rawPath);
  state.blocks.push(
    state.options.fileExists(resolved)
      ? { kind: "image", path: resolved, alt }
      : { kind: "image_error", message: `Image not found: ${resolved}` },
  );
  state.index++;
  return true;
};

const pageBreak: Rule = (state, _line, stripped) => {
  if (!PAGE_BREAK_MARKERS.has(stripped)) return false;
  state.blocks.push({ kind: "page_break" });
  state.index++;
  return true;
};

const blank: Rule = (state, _line, stripped) => {
  if (stripped !== "") return false;
  state.blocks.push({ kind: "spacer", size: BLANK_LINE_SPACE });
  state.index++;
  return true;
};

const HEADING_RE = /^(#{1,6})\s+(.+)$/;

function pushHeading(state: ScanState, level: HeadingLevel, heading: string) {
  const text = normalizeScripts(heading.trim());
  const added = state.tracker.addHeading(level, text);
  if (!added) return;
  state.blocks.push({
    kind: "heading",
    level,
    number: added.number,
    text: added.entry.text,
    anchorKey: added.entry.anchorKey,
  });
}

const heading: Rule = (state, _line, stripped) => {
  const m = HEADING_RE.exec(stripped);
  if (m) {
    const depth = m[1].length;
    const level: HeadingLevel = depth === 1 ? 1 : depth === 2 ? 2 : 3;
    pushHeading(state, level, m[2]);
    state.index++;
    return true;
  }
  if (state.options.isImplicitHeading(stripped)) {
    pushHeading(state, 1, stripped.replace(/:$/, ""));
    state.index++;
    return true;
  }
  return false;
};

const BULLET_RE = /^([ \t]*)[-*•]\s+(.+)$/;
const NUMBERED_RE = /^\d+[.)]\s+(.*)$/;

const bullet: Rule = (state, line, stripped) => {
  const b = BULLET_RE.exec(line.replace(/\s+$/, ""));
  let item: BulletBlock | undefined;
  if (b) {
    // only an indent of exactly two spaces nests
    item = { kind: "bullet", depth: b[1] === "  " ? 1 : 0, text: inlineText(state, b[2]) };
  } else {
    const n = NUMBERED_RE.exec(stripped);
    if (n) item = { kind: "bullet", depth: 0, text: inlineText(state, n[1]) };
  }
  if (!item) return false;
  state.blocks.push(item);
  state.index++;
  return true;
};

const paragraph: Rule = (state, _line, stripped) => {
  state.blocks.push({ kind: "paragraph", text: inlineText(state, stripped) });
  state.index++;
  return true;
};

const RULES: readonly Rule[] = [codeFence, table, image, pageBreak, blank, heading, bullet, paragraph];

/* ─────────────────────────── Entry point ─────────────────────────── */

export function scanMarkdown(text: string, options: ScanOptions): ScanResult {
  const state: ScanState = {
    lines: text.replace(/\r\n?/g, "\n").split("\n"),
    index: 0,
    blocks: [],
    tracker: new SectionNumberTracker(),
    references: new ReferenceList(),
    options: {
      imageBaseDir: options.imageBaseDir,
      fileExists: options.fileExists ?? fs.existsSync,
      isImplicitHeading: options.isImplicitHeading ?? colonHeading,
    },
  };

  while (state.index < state.lines.length) {
    const line = state.lines[state.index];
    const stripped = line.trim();
    for (const rule of RULES) {
      if (rule(state, line, stripped)) break;
    }
  }

  return {
    blocks: state.blocks,
    toc: state.tracker.toc,
    references: state.references.entries,
  };
}
