// server/services/pdf/blocks.ts

/* ─────────────────────────── Content blocks ─────────────────────────── */

export type HeadingLevel = 1 | 2 | 3;

export interface HeadingBlock {
  kind: "heading";
  level: HeadingLevel;
  number: string;
  /** "{number}. {heading}" */
  text: string;
  anchorKey: string;
}

export interface ParagraphBlock {
  kind: "paragraph";
  text: string;
}

export interface BulletBlock {
  kind: "bullet";
  depth: 0 | 1;
  text: string;
}

export interface TableBlock {
  kind: "table";
  header: string[];
  rows: string[][];
}

export interface CodeBlock {
  kind: "code";
  language?: string;
  text: string;
}

export interface ImageBlock {
  kind: "image";
  path: string;
  alt: string;
}

export interface ImageErrorBlock {
  kind: "image_error";
  message: string;
}

export interface PageBreakBlock {
  kind: "page_break";
}

export interface SpacerBlock {
  kind: "spacer";
  size: number;
}

export type ContentBlock =
  | HeadingBlock
  | ParagraphBlock
  | BulletBlock
  | TableBlock
  | CodeBlock
  | ImageBlock
  | ImageErrorBlock
  | PageBreakBlock
  | SpacerBlock;

/* ─────────────────────────── Document parts ─────────────────────────── */

export interface TocEntry {
  level: HeadingLevel;
  text: string;
  anchorKey: string;
}

export interface CoverPart {
  kind: "cover";
  title: string;
  author: string;
  date: string;
}

export interface TocPart {
  kind: "toc";
  entries: TocEntry[];
}

export interface ReferencesSection {
  kind: "references";
  entries: string[];
}

export type DocumentPart = CoverPart | TocPart | ContentBlock | ReferencesSection;

export interface DocumentMetadata {
  title: string;
  author: string;
  subject: string;
  creator: string;
  creationDate: Date;
}

export interface ComposedDocument {
  title: string;
  metadata: DocumentMetadata;
  cover: CoverPart;
  toc: TocPart;
  blocks: ContentBlock[];
  references?: ReferencesSection;
  /** cover, toc, body blocks, then references when any link was seen */
  parts: DocumentPart[];
}
