// server/services/pdf/compositor.ts
import { config } from "../../config";
import { PreconditionError } from "../../utils/errors";
import { fileStorage, normalizeFilename, type FileStorage } from "../../utils/fileStorage";
import type { ComposedDocument, CoverPart, DocumentPart, TocPart } from "./blocks";
import { renderDocument } from "./layout";
import { scanMarkdown, type HeadingPredicate } from "./scanner";

/* ─────────────────────────── Types ─────────────────────────── */

export interface ComposeOptions {
  author?: string;
  date?: Date;
  imageBaseDir?: string;
  fileExists?: (p: string) => boolean;
  isImplicitHeading?: HeadingPredicate;
}

export interface ExportRequest {
  data: string;
  title: string;
  filename?: string;
}

export interface ExportResult {
  filename: string;
  filePath: string;
  pageCount: number;
  references: string[];
}

export const GENERATOR_NAME = "Research Agent PDF Generator";

const BOILERPLATE_PREFIXES = ["Topic:", "Research:", "Summary:"];

/* ─────────────────────────── Helpers ─────────────────────────── */

export function formatCoverDate(date: Date): string {
  return date.toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric" });
}

function requireTitle(title: string | undefined): string {
  const clean = (title ?? "").trim();
  if (!clean) {
    throw new PreconditionError("Title is required for PDF generation");
  }
  return clean;
}

/**
 * Filename from the first non-empty line: heading markers and boilerplate
 * prefixes dropped, first five words, lowercased, [a-z0-9_] only, at most
 * 50 characters.
 */
export function generateFilename(data: string): string {
  const first = data
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (!first) return "research_output.pdf";

  let line = first.replace(/^#+\s*/, "");
  for (const prefix of BOILERPLATE_PREFIXES) {
    if (line.startsWith(prefix)) line = line.slice(prefix.length).trim();
  }
  const name = line
    .split(/\s+/)
    .slice(0, 5)
    .join("_")
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "")
    .slice(0, 50);

  return name ? `${name}_research.pdf` : "research_output.pdf";
}

/* ─────────────────────────── Compose ─────────────────────────── */

export function composeDocument(body: string, title: string, options: ComposeOptions = {}): ComposedDocument {
  const cleanTitle = requireTitle(title);
  const author = options.author ?? config.reportAuthor;
  const date = options.date ?? new Date();

  const scan = scanMarkdown(body, {
    imageBaseDir: options.imageBaseDir ?? fileStorage.dir,
    fileExists: options.fileExists,
    isImplicitHeading: options.isImplicitHeading,
  });

  const cover: CoverPart = { kind: "cover", title: cleanTitle, author, date: formatCoverDate(date) };
  const toc: TocPart = { kind: "toc", entries: scan.toc };
  const references = scan.references.length
    ? { kind: "references" as const, entries: scan.references }
    : undefined;

  const parts: DocumentPart[] = [cover, toc, ...scan.blocks];
  if (references) parts.push(references);

  return {
    title: cleanTitle,
    metadata: {
      title: cleanTitle,
      author,
      subject: `Research Report: ${cleanTitle}`,
      creator: GENERATOR_NAME,
      creationDate: date,
    },
    cover,
    toc,
    blocks: scan.blocks,
    references,
    parts,
  };
}

/* ─────────────────────────── Export ─────────────────────────── */

/**
 * Composes and renders the report, then writes it atomically into the
 * output directory. Throws PreconditionError for an empty title before any
 * work; layout and disk failures propagate.
 */
export async function exportPdf(
  request: ExportRequest,
  deps: { storage?: FileStorage; options?: ComposeOptions } = {},
): Promise<ExportResult> {
  const title = requireTitle(request.title);
  const storage = deps.storage ?? fileStorage;
  const explicit = request.filename?.trim();
  const filename = explicit ? normalizeFilename(explicit, ".pdf") : generateFilename(request.data);

  const doc = composeDocument(request.data, title, {
    ...deps.options,
    imageBaseDir: deps.options?.imageBaseDir ?? storage.dir,
  });
  const rendered = await renderDocument(doc);
  const filePath = await storage.saveFile(filename, rendered.bytes);

  return {
    filename,
    filePath,
    pageCount: rendered.pageCount,
    references: doc.references?.entries ?? [],
  };
}
