// server/services/pptx.ts
// PowerPoint builders (pptxgenjs, 16:9):
//  • research deck: title slide, one slide per heading (max 10, 6 bullets each), closing slide
//  • visualization deck: title, executive summary, section dividers, charts, tables, closing slide

import PptxGenJS from "pptxgenjs";
import type { ChartSpec, TableSpec, VisualizationRequest, VisualizationResponse } from "@shared/schema";
import { CHART_DEFAULTS, CORPORATE_THEMES, FONT_HIERARCHY, config, type CorporateTheme } from "../config";
import { PreconditionError } from "../utils/errors";
import { fileStorage, normalizeFilename, type FileStorage } from "../utils/fileStorage";
import { formatCoverDate } from "./pdf/compositor";

/* ─────────────────────────── Types ─────────────────────────── */

export interface DeckSection {
  title: string;
  level: 1 | 2 | 3;
  content: string[];
}

export interface DeckRequest {
  data: string;
  title: string;
  filename?: string;
}

export interface DeckResult {
  filename: string;
  filePath: string;
  slideCount: number;
}

export interface VisualizationDeckResult extends VisualizationResponse {
  filename: string;
}

export const MAX_SECTION_SLIDES = 10;
export const MAX_BULLETS = 6;
export const MAX_FINDINGS = 5;

// Midnight palette for the plain research deck
const DECK = {
  primary: "1E2761",
  secondary: "CADCFC",
  accent: "FFFFFF",
  text: "333333",
} as const;

const FONT = FONT_HIERARCHY.body.font;

/* ─────────────────────────── Parsing ─────────────────────────── */

const SECTION_RE = /^(#{1,3}) (.*)$/;

/** Splits markdown into heading-led sections; text before the first heading is dropped. */
export function parseSections(data: string): DeckSection[] {
  const sections: DeckSection[] = [];
  let current: DeckSection | undefined;
  for (const line of data.split("\n")) {
    const stripped = line.trim();
    const m = SECTION_RE.exec(stripped);
    if (m) {
      if (current) sections.push(current);
      const level = m[1].length === 1 ? 1 : m[1].length === 2 ? 2 : 3;
      current = { title: m[2], level, content: [] };
    } else if (current && stripped) {
      current.content.push(stripped);
    }
  }
  if (current) sections.push(current);
  return sections;
}

export function cleanBullet(line: string): string {
  return line.replace(/^[-*•\s]+/, "").trim();
}

/** `{title lowercased, first 50 chars, [^a-z0-9_] → _}{suffix}` */
export function deckFilename(title: string, suffix: string): string {
  const safe = title.toLowerCase().slice(0, 50).replace(/[^a-z0-9_]/g, "_");
  return `${safe}${suffix}`;
}

async function toBuffer(out: string | ArrayBuffer | Blob | Uint8Array): Promise<Uint8Array> {
  if (typeof out === "string") return Buffer.from(out, "base64");
  if (out instanceof Uint8Array) return out;
  if (out instanceof ArrayBuffer) return new Uint8Array(out);
  return new Uint8Array(await out.arrayBuffer());
}

/* ─────────────────────────── Service ─────────────────────────── */

export class PptxService {
  constructor(private readonly storage: FileStorage = fileStorage) {}

  async buildResearchDeck(request: DeckRequest, date: Date = new Date()): Promise<DeckResult> {
    const title = request.title.trim();
    if (!title) throw new PreconditionError("Title is required for presentation");
    const explicit = request.filename?.trim();
    const filename = explicit ? normalizeFilename(explicit, ".pptx") : deckFilename(title, "_presentation.pptx");

    const pres = new PptxGenJS();
    pres.layout = "LAYOUT_16x9";
    pres.author = config.reportAuthor;
    pres.title = title;

    // Title slide
    {
      const s = pres.addSlide();
      s.background = { color: DECK.primary };
      s.addText(title, {
        x: 0.5, y: 2, w: 9, h: 2,
        fontSize: 44, fontFace: FONT, bold: true, color: DECK.accent, align: "center", valign: "middle",
      });
      s.addText("Research Report", {
        x: 0.5, y: 3.8, w: 9, h: 0.5,
        fontSize: FONT_HIERARCHY.subtitle.size, fontFace: FONT, color: DECK.secondary, align: "center",
      });
      s.addText(formatCoverDate(date), {
        x: 0.5, y: 4.5, w: 9, h: 0.4,
        fontSize: 14, fontFace: FONT, color: DECK.secondary, align: "center",
      });
    }

    const sections = parseSections(request.data).slice(0, MAX_SECTION_SLIDES);
    sections.forEach((section, idx) => {
      const slide = pres.addSlide();
      slide.background = { color: DECK.accent };

      // numbered badge
      slide.addShape(pres.ShapeType.rect, {
        x: 0.5, y: 0.5, w: 0.8, h: 0.5,
        fill: { color: DECK.primary }, line: { color: DECK.primary },
      });
      slide.addText(String(idx + 1), {
        x: 0.5, y: 0.5, w: 0.8, h: 0.5,
        fontSize: 24, fontFace: FONT, bold: true, color: DECK.accent, align: "center", valign: "middle",
      });

      slide.addText(section.title, {
        x: 1.5, y: 0.5, w: 8, h: 0.5,
        fontSize: 28, fontFace: FONT, bold: true, color: DECK.primary, align: "left", valign: "middle", margin: 0,
      });
      slide.addShape(pres.ShapeType.line, {
        x: 0.5, y: 1.2, w: 9, h: 0,
        line: { color: DECK.secondary, width: 2 },
      });

      const bullets = section.content
        .slice(0, MAX_BULLETS)
        .map(cleanBullet)
        .filter(Boolean)
        .map((text) => ({ text, options: { bullet: true, breakLine: true } }));
      if (bullets.length) {
        slide.addText(bullets, {
          x: 1, y: 1.8, w: 8.5, h: 3.2,
          fontSize: 16, fontFace: FONT, color: DECK.text,
        });
      }
    });

    // Closing slide
    {
      const s = pres.addSlide();
      s.background = { color: DECK.primary };
      s.addText("Thank You", {
        x: 0.5, y: 2.3, w: 9, h: 1,
        fontSize: 44, fontFace: FONT, bold: true, color: DECK.accent, align: "center", valign: "middle",
      });
      s.addText(config.reportAuthor, {
        x: 0.5, y: 3.5, w: 9, h: 0.5,
        fontSize: FONT_HIERARCHY.subtitle.size, fontFace: FONT, color: DECK.secondary, align: "center",
      });
    }

    const filePath = await this.save(pres, filename);
    return { filename, filePath, slideCount: sections.length + 2 };
  }

  async buildVisualizationDeck(
    request: VisualizationRequest,
    filename?: string,
    date: Date = new Date(),
  ): Promise<VisualizationDeckResult> {
    const title = request.presentation_title.trim();
    if (!title) throw new PreconditionError("Presentation title is required");
    const explicit = filename?.trim();
    const name = explicit ? normalizeFilename(explicit, ".pptx") : deckFilename(title, "_viz.pptx");
    const colors = CORPORATE_THEMES[request.theme];

    const pres = new PptxGenJS();
    pres.layout = "LAYOUT_16x9";
    pres.author = config.reportAuthor;
    pres.title = title;
    let slideCount = 0;

    // Title slide
    {
      const s = pres.addSlide();
      s.background = { color: colors.primary };
      s.addText(title, {
        x: 0.5, y: 1.8, w: 9, h: 1.5,
        fontSize: 36, fontFace: FONT, bold: true, color: "FFFFFF", align: "center", valign: "middle",
      });
      s.addText(formatCoverDate(date), {
        x: 0.5, y: 3.5, w: 9, h: 0.4,
        fontSize: 14, fontFace: FONT, color: colors.secondary, align: "center",
      });
      slideCount++;
    }

    const findings = (request.executive_summary ?? []).slice(0, MAX_FINDINGS);
    if (findings.length) {
      const s = pres.addSlide();
      s.background = { color: colors.background };
      s.addText("Executive Summary", {
        x: 0.5, y: 0.5, w: 9, h: 0.6,
        fontSize: FONT_HIERARCHY.title.size, fontFace: FONT, bold: true, color: colors.primary, align: "left",
      });
      s.addShape(pres.ShapeType.line, { x: 0.5, y: 1.2, w: 9, h: 0, line: { color: colors.accent, width: 2 } });
      findings.forEach((finding, i) => {
        s.addText(`${i + 1}. ${finding}`, {
          x: 1.0, y: 1.8 + i * 0.6, w: 8.5, h: 0.5,
          fontSize: 16, fontFace: FONT, color: colors.text, align: "left",
        });
      });
      slideCount++;
    }

    const dividers = request.section_dividers ?? [];
    request.charts.forEach((chart, idx) => {
      const divider = dividers[idx];
      if (divider !== undefined) {
        const s = pres.addSlide();
        s.background = { color: colors.primary };
        s.addText(divider, {
          x: 0.5, y: 2.3, w: 9, h: 0.8,
          fontSize: 32, fontFace: FONT, bold: true, color: "FFFFFF", align: "center", valign: "middle",
        });
        slideCount++;
      }
      this.addChartSlide(pres, chart, colors);
      slideCount++;
    });

    for (const table of request.tables) {
      this.addTableSlide(pres, table, colors);
      slideCount++;
    }

    // Closing slide
    {
      const s = pres.addSlide();
      s.background = { color: colors.primary };
      s.addText("Thank You", {
        x: 0.5, y: 2.3, w: 9, h: 1,
        fontSize: 44, fontFace: FONT, bold: true, color: "FFFFFF", align: "center", valign: "middle",
      });
      slideCount++;
    }

    const filePath = await this.save(pres, name);
    return {
      filename: name,
      pptx_path: filePath,
      charts_created: request.charts.length,
      tables_created: request.tables.length,
      slide_count: slideCount,
    };
  }

  private addChartSlide(pres: PptxGenJS, chart: ChartSpec, colors: CorporateTheme) {
    const slide = pres.addSlide();
    slide.background = { color: colors.background };
    slide.addText(chart.title, {
      x: 0.5, y: 0.4, w: 9, h: 0.6,
      fontSize: FONT_HIERARCHY.chartTitle.size, fontFace: FONT, bold: true, color: colors.primary, align: "left",
    });

    const data = [{ name: "Data", labels: chart.labels, values: chart.data }];
    const chartColors = chart.colors?.length
      ? chart.colors
      : [colors.primary, colors.secondary, colors.accent, colors.highlight];
    const common = {
      ...CHART_DEFAULTS,
      chartColors,
      showLegend: chart.show_legend,
      showValue: chart.show_data_labels,
    };

    if (chart.layout === "chart-insight" && chart.insight_text) {
      slide.addChart(chart.chart_type, data, { ...common, x: 0.5, y: 1.3, w: 5.5, h: 3.5 });
      slide.addShape(pres.ShapeType.rect, {
        x: 6.5, y: 1.5, w: 3, h: 3,
        fill: { color: colors.accent, transparency: 20 },
        line: { color: colors.primary, width: 1 },
      });
      slide.addText(chart.insight_text, {
        x: 6.7, y: 1.8, w: 2.6, h: 2.4,
        fontSize: 14, fontFace: FONT, color: colors.text, align: "left", valign: "top",
      });
      return;
    }

    slide.addChart(chart.chart_type, data, {
      ...common,
      x: 0.8, y: 1.3, w: 8.4, h: 3.8,
      dataLabelFontSize: 11,
      catAxisLabelFontSize: 12,
      valAxisLabelFontSize: 12,
      dataLabelPosition: "bestFit",
    });
  }

  private addTableSlide(pres: PptxGenJS, table: TableSpec, colors: CorporateTheme) {
    const slide = pres.addSlide();
    slide.background = { color: colors.background };
    slide.addText(table.title, {
      x: 0.5, y: 0.4, w: 9, h: 0.6,
      fontSize: FONT_HIERARCHY.chartTitle.size, fontFace: FONT, bold: true, color: colors.primary, align: "left",
    });

    const highlighted = new Set(table.highlight_rows ?? []);
    const header: PptxGenJS.TableRow = table.headers.map((h) => ({
      text: h,
      options: { bold: true, fontSize: 12, color: "FFFFFF", fill: { color: colors.primary }, align: "center" },
    }));
    const rows: PptxGenJS.TableRow[] = table.rows.map((row, i) =>
      row.map((cell) => ({
        text: String(cell),
        options: {
          fontSize: 11,
          color: colors.text,
          align: "center",
          ...(highlighted.has(i) ? { fill: { color: colors.highlight, transparency: 30 } } : {}),
        },
      })),
    );

    slide.addTable([header, ...rows], {
      x: 0.5, y: 1.3, w: 9, h: 3.5,
      colW: table.column_widths,
      border: { type: "solid", pt: 1, color: colors.accent },
      fontSize: 11,
      fontFace: FONT,
    });
  }

  private async save(pres: PptxGenJS, filename: string): Promise<string> {
    const out = await pres.write({ outputType: "nodebuffer" });
    return this.storage.saveFile(filename, await toBuffer(out));
  }
}

export const pptxService = new PptxService();
