// server/services/pdf/sectionTracker.ts
import type { HeadingLevel, TocEntry } from "./blocks";

export const MAX_HEADING_LEVEL = 3;

export function isHeadingLevel(level: number): level is HeadingLevel {
  return Number.isInteger(level) && level >= 1 && level <= MAX_HEADING_LEVEL;
}

/** Lowercase, whitespace runs to "_", then drop anything outside [a-z0-9_]. */
export function anchorKey(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

/**
 * Hierarchical section numbering for one document. Advancing level n bumps
 * counter n and zeroes every deeper counter.
 */
export class SectionNumberTracker {
  private counters = [0, 0, 0];
  private readonly entries: TocEntry[] = [];
  private readonly usedKeys = new Map<string, number>();

  /** Returns the dotted number, or "" (and no state change) for an out-of-range level. */
  advance(level: number): string {
    if (!isHeadingLevel(level)) return "";
    this.counters[level - 1] += 1;
    for (let i = level; i < MAX_HEADING_LEVEL; i++) this.counters[i] = 0;
    return this.counters.slice(0, level).join(".");
  }

  /** Numbers a heading and records its TOC entry. */
  addHeading(level: number, heading: string): { number: string; entry: TocEntry } | undefined {
    if (!isHeadingLevel(level)) return undefined;
    const number = this.advance(level);
    const entry: TocEntry = {
      level,
      text: `${number}. ${heading}`,
      anchorKey: this.uniqueKey(anchorKey(heading) || "section"),
    };
    this.entries.push(entry);
    return { number, entry };
  }

  get toc(): TocEntry[] {
    return [...this.entries];
  }

  private uniqueKey(base: string): string {
    const seen = this.usedKeys.get(base) ?? 0;
    this.usedKeys.set(base, seen + 1);
    if (seen === 0) return base;
    let n = seen + 1;
    let candidate = `${base}_${n}`;
    while (this.usedKeys.has(candidate)) {
      n += 1;
      candidate = `${base}_${n}`;
    }
    this.usedKeys.set(candidate, 1);
    return candidate;
  }
}
