// server/services/pdf/unicode.ts
import scriptGlyphs from "./scriptGlyphs.json";
import { markup } from "./inline";

type ScriptKind = "sub" | "sup";

interface ScriptGlyph {
  kind: ScriptKind;
  base: string;
}

const glyphEntries = (table: Record<string, string>, kind: ScriptKind): Array<[string, ScriptGlyph]> =>
  Object.entries(table).map(([glyph, base]) => [glyph, { kind, base }]);

const SCRIPT_TABLE: ReadonlyMap<string, ScriptGlyph> = new Map<string, ScriptGlyph>([
  ...glyphEntries(scriptGlyphs.subscript, "sub"),
  ...glyphEntries(scriptGlyphs.superscript, "sup"),
]);

/**
 * Rewrites Unicode subscript/superscript code points as `<sub>`/`<sup>` spans
 * over their base characters. Characters outside the table pass through, and
 * the output contains no table characters, so a second pass is a no-op.
 */
export function normalizeScripts(text: string): string {
  let out = "";
  for (const ch of text) {
    const hit = SCRIPT_TABLE.get(ch);
    out += hit ? markup[hit.kind](hit.base) : ch;
  }
  return out;
}
