// server/services/pdf/styles.ts
import { rgb, type RGB } from "pdf-lib";

export function hex(value: string): RGB {
  const clean = value.replace("#", "");
  const n = Number.parseInt(clean, 16);
  return rgb(((n >> 16) & 255) / 255, ((n >> 8) & 255) / 255, (n & 255) / 255);
}

/* ─────────────────────────── Page geometry (points) ─────────────────────────── */

const INCH = 72;

export const PAGE = {
  width: 8.5 * INCH,
  height: 11 * INCH,
  marginX: 0.75 * INCH,
  marginTop: INCH,
  marginBottom: INCH,
} as const;

export const CONTENT_WIDTH = PAGE.width - 2 * PAGE.marginX;
export const CONTENT_TOP = PAGE.height - PAGE.marginTop;
export const CONTENT_BOTTOM = PAGE.marginBottom;

export const FOOTER = {
  ruleY: 0.6 * INCH,
  textY: 0.4 * INCH,
  size: 9,
} as const;

export const IMAGE_MAX = { width: 6 * INCH, height: 4 * INCH } as const;

/* ─────────────────────────── Colors ─────────────────────────── */

export const COLORS = {
  darkBlue: hex("#294172"),
  steelBlue: hex("#4682B4"),
  body: hex("#333333"),
  link: hex("#0066CC"),
  gray: hex("#666666"),
  muted: hex("#505050"),
  footer: hex("#808080"),
  codeText: hex("#2F2F2F"),
  codeBg: hex("#F5F5F5"),
  codeBorder: hex("#CCCCCC"),
  grid: hex("#CCCCCC"),
  rowAlt: hex("#F8F8F8"),
  white: hex("#FFFFFF"),
} as const;

/* ─────────────────────────── Text styles ─────────────────────────── */

export type FontRole = "regular" | "bold" | "italic" | "mono" | "monoBold";

export interface TextStyle {
  font: FontRole;
  size: number;
  leading: number;
  color: RGB;
  spaceBefore: number;
  spaceAfter: number;
  indent: number;
}

export const HEADING_STYLES: Record<1 | 2 | 3, TextStyle> = {
  1: { font: "bold", size: 13, leading: 16, color: COLORS.darkBlue, spaceBefore: 10, spaceAfter: 6, indent: 0 },
  2: { font: "bold", size: 11, leading: 14, color: COLORS.steelBlue, spaceBefore: 8, spaceAfter: 4, indent: 0 },
  3: { font: "bold", size: 11, leading: 14, color: COLORS.steelBlue, spaceBefore: 6, spaceAfter: 4, indent: 0 },
};

export const BODY_STYLE: TextStyle = {
  font: "regular",
  size: 10,
  leading: 14,
  color: COLORS.body,
  spaceBefore: 0,
  spaceAfter: 6,
  indent: 0,
};

export const BULLET_STYLES: Record<0 | 1, TextStyle & { glyphIndent: number }> = {
  0: { ...BODY_STYLE, spaceAfter: 3, indent: 25, glyphIndent: 10 },
  1: { ...BODY_STYLE, spaceAfter: 3, indent: 40, glyphIndent: 25 },
};

// the standard fonts are WinAnsi-encoded, which has no white bullet
export const BULLET_GLYPHS: Record<0 | 1, string> = { 0: "•", 1: "–" };

export const CODE_STYLE = {
  size: 9,
  leading: 11,
  padding: 6,
  labelSize: 8,
} as const;

export const TABLE_STYLE = {
  size: 9,
  leading: 11,
  padX: 6,
  padY: 5,
} as const;

export const TOC_STYLES: Record<1 | 2 | 3, TextStyle> = {
  1: { font: "bold", size: 12, leading: 16, color: COLORS.darkBlue, spaceBefore: 0, spaceAfter: 6, indent: 0 },
  2: { font: "regular", size: 10, leading: 14, color: COLORS.steelBlue, spaceBefore: 0, spaceAfter: 4, indent: 20 },
  3: { font: "regular", size: 9, leading: 12, color: COLORS.gray, spaceBefore: 0, spaceAfter: 3, indent: 40 },
};

export const COVER = {
  titleY: PAGE.height - 2 * INCH,
  titleSize: 28,
  titleLeading: 34,
  preparedSize: 14,
  authorSize: 16,
  dateSize: 12,
} as const;
