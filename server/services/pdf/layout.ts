// server/services/pdf/layout.ts
// pdf-lib page layout for a composed document.
//
// Two phases: the cover and the table-of-contents pages are reserved first,
// then the body is laid out while every heading records a destination. The
// reserved TOC pages are filled in afterwards from those destinations, and a
// final pass stamps "Page X of Y" on every page.

import fs from "fs/promises";
import {
  PDFDocument,
  PDFName,
  PDFString,
  StandardFonts,
  type PDFDict,
  type PDFFont,
  type PDFImage,
  type PDFPage,
  type RGB,
} from "pdf-lib";
import type {
  BulletBlock,
  CodeBlock,
  ComposedDocument,
  ContentBlock,
  CoverPart,
  HeadingBlock,
  ImageBlock,
  ReferencesSection,
  TableBlock,
  TocEntry,
} from "./blocks";
import { parseInline, plainText } from "./inline";
import {
  BODY_STYLE,
  BULLET_GLYPHS,
  BULLET_STYLES,
  CODE_STYLE,
  COLORS,
  CONTENT_BOTTOM,
  CONTENT_TOP,
  CONTENT_WIDTH,
  COVER,
  FOOTER,
  HEADING_STYLES,
  IMAGE_MAX,
  PAGE,
  TABLE_STYLE,
  TOC_STYLES,
  type FontRole,
  type TextStyle,
} from "./styles";
import { encodable, layoutRich, splitChars, truncate, wrapPlain, type RichLine } from "./text";

/* ─────────────────────────── Types ─────────────────────────── */

export type FontSet = Record<FontRole, PDFFont>;

export interface Destination {
  page: PDFPage;
  pageNumber: number;
  top: number;
}

export interface RenderResult {
  bytes: Uint8Array;
  pageCount: number;
  /** anchor key -> physical page number (1-based) */
  headingPages: Map<string, number>;
}

const BLOCK_GAP_BEFORE = 7.2;
const BLOCK_GAP_AFTER = 14.4;

/* ─────────────────────────── Annotations ─────────────────────────── */

type Rect = [number, number, number, number];

function attachAnnotation(page: PDFPage, annotation: PDFDict) {
  const ref = page.doc.context.register(annotation);
  const annots = page.node.Annots();
  if (annots) {
    annots.push(ref);
    return;
  }
  page.node.set(PDFName.of("Annots"), page.doc.context.obj([ref]));
}

function uriLink(page: PDFPage, rect: Rect, url: string) {
  const annotation = page.doc.context.obj({
    Type: PDFName.of("Annot"),
    Subtype: PDFName.of("Link"),
    Rect: rect,
    Border: [0, 0, 0],
    A: {
      Type: PDFName.of("Action"),
      S: PDFName.of("URI"),
      URI: PDFString.of(url),
    },
  });
  attachAnnotation(page, annotation);
}

function goToLink(page: PDFPage, rect: Rect, target: Destination) {
  const annotation = page.doc.context.obj({
    Type: PDFName.of("Annot"),
    Subtype: PDFName.of("Link"),
    Rect: rect,
    Border: [0, 0, 0],
    Dest: [target.page.ref, PDFName.of("XYZ"), null, target.top, null],
  });
  attachAnnotation(page, annotation);
}

/* ─────────────────────────── TOC planning ─────────────────────────── */

const TOC_TITLE_SIZE = 18;
const TOC_FIRST_Y = CONTENT_TOP - TOC_TITLE_SIZE - 30;
// room kept on the right for page numbers
const TOC_NUMBER_SLOT = 36;

interface TocSlot {
  entry: TocEntry;
  pageOffset: number;
  top: number;
}

export function planToc(entries: TocEntry[]): { pages: number; slots: TocSlot[] } {
  const slots: TocSlot[] = [];
  let pageOffset = 0;
  let y = TOC_FIRST_Y;
  for (const entry of entries) {
    const style = TOC_STYLES[entry.level];
    if (y - style.leading < CONTENT_BOTTOM) {
      pageOffset += 1;
      y = CONTENT_TOP;
    }
    slots.push({ entry, pageOffset, top: y });
    y -= style.leading + style.spaceAfter;
  }
  return { pages: pageOffset + 1, slots };
}

/* ─────────────────────────── Layout engine ─────────────────────────── */

class PdfLayout {
  private current: PDFPage | null = null;
  private y = CONTENT_TOP;
  // nothing drawn on the current page yet
  private fresh = true;
  readonly destinations = new Map<string, Destination>();

  constructor(
    private readonly pdf: PDFDocument,
    private readonly fonts: FontSet,
  ) {}

  get page(): PDFPage {
    return this.current ?? this.addPage();
  }

  addPage(): PDFPage {
    this.current = this.pdf.addPage([PAGE.width, PAGE.height]);
    this.y = CONTENT_TOP;
    this.fresh = true;
    return this.current;
  }

  private ensure(height: number) {
    if (!this.fresh && this.y - height < CONTENT_BOTTOM) this.addPage();
  }

  private gap(size: number) {
    if (!this.fresh) this.y -= size;
  }

  private font(style: TextStyle): PDFFont {
    return this.fonts[style.font];
  }

  private drawRichLine(line: RichLine, x: number, baseline: number, color: RGB) {
    const page = this.page;
    for (const f of line.fragments) {
      const fx = x + f.x;
      page.drawText(f.text, { x: fx, y: baseline + f.rise, size: f.size, font: f.font, color: f.href ? COLORS.link : color });
      if (f.href) {
        page.drawLine({
          start: { x: fx, y: baseline - 1.5 },
          end: { x: fx + f.width, y: baseline - 1.5 },
          thickness: 0.5,
          color: COLORS.link,
        });
        uriLink(page, [fx, baseline - 3, fx + f.width, baseline + f.size], f.href);
      }
    }
    this.fresh = false;
  }

  /** Flows marked-up text line by line, breaking pages between lines. */
  private flowText(text: string, style: TextStyle, x: number, width: number, keepLines = 1) {
    const lines = layoutRich(parseInline(text), this.font(style), style.size, width);
    this.ensure(style.leading * Math.min(keepLines, Math.max(lines.length, 1)));
    for (const line of lines) {
      this.ensure(style.leading);
      this.drawRichLine(line, x, this.y - style.size, style.color);
      this.y -= style.leading;
    }
  }

  /* ---------------- cover ---------------- */

  drawCover(cover: CoverPart) {
    const page = this.addPage();
    const centered = (text: string, font: PDFFont, size: number, y: number, color: RGB) => {
      const clean = encodable(font, text);
      const width = font.widthOfTextAtSize(clean, size);
      page.drawText(clean, { x: (PAGE.width - width) / 2, y, size, font, color });
    };

    let y = COVER.titleY;
    for (const line of wrapPlain(plainText(cover.title), this.fonts.bold, COVER.titleSize, CONTENT_WIDTH)) {
      centered(line, this.fonts.bold, COVER.titleSize, y, COLORS.darkBlue);
      y -= COVER.titleLeading;
    }
    y -= 36;
    centered("Prepared by", this.fonts.regular, COVER.preparedSize, y, COLORS.steelBlue);
    y -= 24;
    centered(cover.author, this.fonts.bold, COVER.authorSize, y, COLORS.darkBlue);
    y -= 21.6 + 18;
    centered(cover.date, this.fonts.regular, COVER.dateSize, y, COLORS.gray);
    this.fresh = false;
  }

  /* ---------------- table of contents ---------------- */

  reserveTocPages(count: number): PDFPage[] {
    const pages: PDFPage[] = [];
    for (let i = 0; i < count; i++) pages.push(this.addPage());
    return pages;
  }

  fillToc(pages: PDFPage[], plan: { slots: TocSlot[] }) {
    const first = pages[0];
    if (!first) return;
    const title = "Table of Contents";
    const titleWidth = this.fonts.bold.widthOfTextAtSize(title, TOC_TITLE_SIZE);
    first.drawText(title, {
      x: (PAGE.width - titleWidth) / 2,
      y: CONTENT_TOP - TOC_TITLE_SIZE,
      size: TOC_TITLE_SIZE,
      font: this.fonts.bold,
      color: COLORS.darkBlue,
    });

    const right = PAGE.width - PAGE.marginX;
    for (const slot of plan.slots) {
      const page = pages[slot.pageOffset];
      const target = this.destinations.get(slot.entry.anchorKey);
      if (!page || !target) continue;
      const style = TOC_STYLES[slot.entry.level];
      const font = this.font(style);
      const baseline = slot.top - style.size;
      const x = PAGE.marginX + style.indent;

      const label = truncate(plainText(slot.entry.text), font, style.size, right - x - TOC_NUMBER_SLOT);
      const labelWidth = font.widthOfTextAtSize(label, style.size);
      page.drawText(label, { x, y: baseline, size: style.size, font, color: style.color });

      const pageLabel = String(target.pageNumber);
      const numberWidth = font.widthOfTextAtSize(pageLabel, style.size);
      page.drawText(pageLabel, { x: right - numberWidth, y: baseline, size: style.size, font, color: style.color });

      const dot = this.fonts.regular.widthOfTextAtSize(". ", style.size);
      const dotsFrom = x + labelWidth + 4;
      const dotsTo = right - numberWidth - 4;
      const count = Math.floor((dotsTo - dotsFrom) / dot);
      if (count > 0) {
        page.drawText(". ".repeat(count), {
          x: dotsTo - count * dot,
          y: baseline,
          size: style.size,
          font: this.fonts.regular,
          color: COLORS.gray,
        });
      }

      goToLink(page, [x, baseline - 3, right, baseline + style.size], target);
    }
  }

  /* ---------------- body ---------------- */

  startBody() {
    this.addPage();
  }

  async drawBlock(block: ContentBlock): Promise<void> {
    switch (block.kind) {
      case "heading":
        return this.drawHeading(block);
      case "paragraph":
        this.flowText(block.text, BODY_STYLE, PAGE.marginX, CONTENT_WIDTH, 2);
        this.y -= BODY_STYLE.spaceAfter;
        return;
      case "bullet":
        return this.drawBullet(block);
      case "table":
        return this.drawTable(block);
      case "code":
        return this.drawCode(block);
      case "image":
        return this.drawImage(block);
      case "image_error":
        return this.drawNote(`[${block.message}]`);
      case "page_break":
        if (!this.fresh) this.addPage();
        return;
      case "spacer":
        this.gap(block.size);
        return;
    }
  }

  private drawHeading(block: HeadingBlock) {
    const style = HEADING_STYLES[block.level];
    this.gap(style.spaceBefore);
    // keep the heading with two lines of what follows
    this.ensure(style.leading + 2 * BODY_STYLE.leading);
    this.destinations.set(block.anchorKey, {
      page: this.page,
      pageNumber: this.pdf.getPageCount(),
      top: this.y,
    });
    this.flowText(block.text, style, PAGE.marginX, CONTENT_WIDTH);
    this.y -= style.spaceAfter;
  }

  private drawBullet(block: BulletBlock) {
    const style = BULLET_STYLES[block.depth];
    const lines = layoutRich(parseInline(block.text), this.font(style), style.size, CONTENT_WIDTH - style.indent);
    lines.forEach((line, i) => {
      this.ensure(style.leading);
      const baseline = this.y - style.size;
      if (i === 0) {
        this.page.drawText(BULLET_GLYPHS[block.depth], {
          x: PAGE.marginX + style.glyphIndent,
          y: baseline,
          size: style.size,
          font: this.fonts.regular,
          color: style.color,
        });
      }
      this.drawRichLine(line, PAGE.marginX + style.indent, baseline, style.color);
      this.y -= style.leading;
    });
    this.y -= style.spaceAfter;
  }

  private drawTable(block: TableBlock) {
    const columns = Math.max(block.header.length, ...block.rows.map((r) => r.length), 1);
    const colWidth = CONTENT_WIDTH / columns;
    const innerWidth = colWidth - 2 * TABLE_STYLE.padX;

    const layoutRow = (cells: string[], header: boolean) => {
      const font = header ? this.fonts.bold : this.fonts.regular;
      const laid = Array.from({ length: columns }, (_, i) =>
        layoutRich(parseInline(cells[i] ?? ""), font, TABLE_STYLE.size, innerWidth),
      );
      const lineCount = Math.max(1, ...laid.map((l) => l.length));
      return { laid, header, height: lineCount * TABLE_STYLE.leading + 2 * TABLE_STYLE.padY };
    };

    const drawRow = (row: ReturnType<typeof layoutRow>, index: number) => {
      const page = this.page;
      const top = this.y;
      const fill = row.header ? COLORS.steelBlue : index % 2 === 0 ? COLORS.white : COLORS.rowAlt;
      row.laid.forEach((lines, col) => {
        const x = PAGE.marginX + col * colWidth;
        page.drawRectangle({
          x,
          y: top - row.height,
          width: colWidth,
          height: row.height,
          color: fill,
          borderColor: COLORS.grid,
          borderWidth: 0.5,
        });
        lines.forEach((line, i) => {
          const offset = row.header ? (innerWidth - line.width) / 2 : 0;
          const baseline = top - TABLE_STYLE.padY - TABLE_STYLE.size - i * TABLE_STYLE.leading;
          this.drawRichLine(line, x + TABLE_STYLE.padX + offset, baseline, row.header ? COLORS.white : COLORS.body);
        });
      });
      this.y -= row.height;
      this.fresh = false;
    };

    const header = layoutRow(block.header, true);

    // A row taller than a page below the header continues on the next page.
    const maxLines = Math.max(
      1,
      Math.floor((CONTENT_TOP - CONTENT_BOTTOM - header.height - 2 * TABLE_STYLE.padY) / TABLE_STYLE.leading),
    );
    const splitRow = (row: ReturnType<typeof layoutRow>): Array<ReturnType<typeof layoutRow>> => {
      const lineCount = Math.max(1, ...row.laid.map((l) => l.length));
      if (lineCount <= maxLines) return [row];
      const pieces: Array<ReturnType<typeof layoutRow>> = [];
      for (let start = 0; start < lineCount; start += maxLines) {
        const laid = row.laid.map((lines) => lines.slice(start, start + maxLines));
        const count = Math.min(maxLines, lineCount - start);
        pieces.push({ laid, header: false, height: count * TABLE_STYLE.leading + 2 * TABLE_STYLE.padY });
      }
      return pieces;
    };
    const rows = block.rows.flatMap((r, i) => splitRow(layoutRow(r, false)).map((row) => ({ row, index: i })));

    this.gap(BLOCK_GAP_BEFORE);
    this.ensure(header.height + (rows[0]?.row.height ?? 0));
    drawRow(header, 0);
    rows.forEach(({ row, index }) => {
      if (this.y - row.height < CONTENT_BOTTOM) {
        this.addPage();
        drawRow(header, 0);
      }
      drawRow(row, index);
    });
    this.y -= BLOCK_GAP_AFTER;
  }

  private drawCode(block: CodeBlock) {
    const mono = this.fonts.mono;
    const { size, leading, padding } = CODE_STYLE;
    const x = PAGE.marginX;
    const lines = block.text
      .split("\n")
      .flatMap((line) => splitChars(line, mono, size, CONTENT_WIDTH - 2 * padding));

    this.gap(BLOCK_GAP_BEFORE);
    if (block.language && block.language !== "text") {
      this.ensure(CODE_STYLE.labelSize + 4 + leading + padding);
      this.page.drawText(encodable(this.fonts.monoBold, `[${block.language}]`), {
        x,
        y: this.y - CODE_STYLE.labelSize,
        size: CODE_STYLE.labelSize,
        font: this.fonts.monoBold,
        color: COLORS.gray,
      });
      this.y -= CODE_STYLE.labelSize + 4;
      this.fresh = false;
    }

    this.ensure(padding + leading);
    let boxTop = this.y;
    const closeBox = () => {
      this.page.drawRectangle({
        x,
        y: this.y,
        width: CONTENT_WIDTH,
        height: boxTop - this.y,
        borderColor: COLORS.codeBorder,
        borderWidth: 0.5,
      });
    };
    const band = (height: number) => {
      this.page.drawRectangle({ x, y: this.y - height, width: CONTENT_WIDTH, height, color: COLORS.codeBg });
      this.y -= height;
      this.fresh = false;
    };

    band(padding);
    for (const line of lines) {
      if (this.y - leading - padding < CONTENT_BOTTOM) {
        closeBox();
        this.addPage();
        boxTop = this.y;
      }
      const baseline = this.y - size;
      band(leading);
      this.page.drawText(line, { x: x + padding, y: baseline, size, font: mono, color: COLORS.codeText });
    }
    band(padding);
    closeBox();
    this.y -= BLOCK_GAP_AFTER;
  }

  private async embed(filePath: string): Promise<PDFImage | string> {
    try {
      const bytes = await fs.readFile(filePath);
      if (isPng(bytes)) return await this.pdf.embedPng(bytes);
      if (isJpeg(bytes)) return await this.pdf.embedJpg(bytes);
      return `unsupported format ${filePath}`;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  private async drawImage(block: ImageBlock) {
    const embedded = await this.embed(block.path);
    if (typeof embedded === "string") return this.drawNote(`[Error loading image: ${embedded}]`);

    const scale = Math.min(1, IMAGE_MAX.width / embedded.width, IMAGE_MAX.height / embedded.height);
    const width = embedded.width * scale;
    const height = embedded.height * scale;
    this.gap(BLOCK_GAP_BEFORE);
    this.ensure(height);
    this.page.drawImage(embedded, {
      x: PAGE.marginX + (CONTENT_WIDTH - width) / 2,
      y: this.y - height,
      width,
      height,
    });
    this.y -= height + BLOCK_GAP_AFTER;
    this.fresh = false;
  }

  /** Shaded italic note, used for images that could not be placed. */
  private drawNote(message: string) {
    const style: TextStyle = { ...BODY_STYLE, font: "italic", size: 9, leading: 12, color: COLORS.muted };
    const padding = 6;
    const lines = wrapPlain(message, this.fonts.italic, style.size, CONTENT_WIDTH - 2 * padding);
    const height = lines.length * style.leading + 2 * padding;
    this.gap(BLOCK_GAP_BEFORE);
    this.ensure(height);
    const top = this.y;
    this.page.drawRectangle({ x: PAGE.marginX, y: top - height, width: CONTENT_WIDTH, height, color: COLORS.codeBg });
    lines.forEach((line, i) => {
      this.page.drawText(line, {
        x: PAGE.marginX + padding,
        y: top - padding - style.size - i * style.leading,
        size: style.size,
        font: this.fonts.italic,
        color: style.color,
      });
    });
    this.y -= height + BLOCK_GAP_AFTER;
    this.fresh = false;
  }

  /* ---------------- references ---------------- */

  drawReferences(section: ReferencesSection) {
    if (!this.fresh) this.addPage();
    const headingSize = 16;
    this.page.drawText("References", {
      x: PAGE.marginX,
      y: this.y - headingSize,
      size: headingSize,
      font: this.fonts.bold,
      color: COLORS.darkBlue,
    });
    this.y -= headingSize + 16;
    this.fresh = false;

    const style = BODY_STYLE;
    const font = this.font(style);
    section.entries.forEach((url, i) => {
      const label = `[${i + 1}] `;
      const labelWidth = font.widthOfTextAtSize(label, style.size);
      const lines = layoutRich(
        [{ kind: "link", text: url, href: url }],
        font,
        style.size,
        CONTENT_WIDTH - labelWidth,
      );
      lines.forEach((line, j) => {
        this.ensure(style.leading);
        const baseline = this.y - style.size;
        if (j === 0) {
          this.page.drawText(label, { x: PAGE.marginX, y: baseline, size: style.size, font, color: style.color });
        }
        this.drawRichLine(line, PAGE.marginX + labelWidth, baseline, style.color);
        this.y -= style.leading;
      });
      this.y -= 4;
    });
  }

  /* ---------------- footer ---------------- */

  stampFooters() {
    const pages = this.pdf.getPages();
    const total = pages.length;
    pages.forEach((page, i) => {
      page.drawLine({
        start: { x: PAGE.marginX, y: FOOTER.ruleY },
        end: { x: PAGE.width - PAGE.marginX, y: FOOTER.ruleY },
        thickness: 0.5,
        color: COLORS.steelBlue,
      });
      const label = `Page ${i + 1} of ${total}`;
      const width = this.fonts.italic.widthOfTextAtSize(label, FOOTER.size);
      page.drawText(label, {
        x: (PAGE.width - width) / 2,
        y: FOOTER.textY,
        size: FOOTER.size,
        font: this.fonts.italic,
        color: COLORS.footer,
      });
    });
  }
}

function isPng(bytes: Uint8Array): boolean {
  return bytes.length > 8 && bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47;
}

function isJpeg(bytes: Uint8Array): boolean {
  return bytes.length > 3 && bytes[0] === 0xff && bytes[1] === 0xd8;
}

/* ─────────────────────────── Entry point ─────────────────────────── */

export async function embedFonts(pdf: PDFDocument): Promise<FontSet> {
  return {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
    italic: await pdf.embedFont(StandardFonts.HelveticaOblique),
    mono: await pdf.embedFont(StandardFonts.Courier),
    monoBold: await pdf.embedFont(StandardFonts.CourierBold),
  };
}

export async function renderDocument(doc: ComposedDocument): Promise<RenderResult> {
  const pdf = await PDFDocument.create();
  const { metadata } = doc;
  pdf.setTitle(metadata.title);
  pdf.setAuthor(metadata.author);
  pdf.setSubject(metadata.subject);
  pdf.setCreator(metadata.creator);
  pdf.setCreationDate(metadata.creationDate);

  const layout = new PdfLayout(pdf, await embedFonts(pdf));
  layout.drawCover(doc.cover);

  const plan = planToc(doc.toc.entries);
  const tocPages = layout.reserveTocPages(plan.pages);

  layout.startBody();
  for (const block of doc.blocks) {
    await layout.drawBlock(block);
  }
  if (doc.references) layout.drawReferences(doc.references);

  layout.fillToc(tocPages, plan);
  layout.stampFooters();

  const headingPages = new Map<string, number>();
  for (const [key, dest] of layout.destinations) headingPages.set(key, dest.pageNumber);

  return {
    bytes: await pdf.save(),
    pageCount: pdf.getPageCount(),
    headingPages,
  };
}
