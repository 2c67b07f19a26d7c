import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import {
  composeDocument,
  exportPdf,
  formatCoverDate,
  generateFilename,
  GENERATOR_NAME,
} from '../../server/services/pdf/compositor';
import { renderDocument, planToc } from '../../server/services/pdf/layout';
import type { TocEntry } from '../../server/services/pdf/blocks';
import { PreconditionError } from '../../server/utils/errors';
import { FileStorage } from '../../server/utils/fileStorage';

const SAMPLE = '# Intro\nHello http://x.test world\n## Sub\nMore text';
const DATE = new Date(2026, 0, 5);

// 1x1 transparent PNG
const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64',
);

describe('composeDocument', () => {
  it('assembles cover, TOC, body and references in order', () => {
    const doc = composeDocument(SAMPLE, 'T', { date: DATE, author: 'Research Agent', fileExists: () => false });

    expect(doc.parts.map((p) => p.kind)).toEqual([
      'cover',
      'toc',
      'heading',
      'paragraph',
      'heading',
      'paragraph',
      'references',
    ]);
    expect(doc.cover).toEqual({ kind: 'cover', title: 'T', author: 'Research Agent', date: 'January 5, 2026' });
    expect(doc.toc.entries).toEqual([
      { level: 1, text: '1. Intro', anchorKey: 'intro' },
      { level: 2, text: '1.1. Sub', anchorKey: 'sub' },
    ]);
    expect(doc.blocks[1]).toEqual({ kind: 'paragraph', text: 'Hello <link>http://x.test</link> world' });
    expect(doc.references).toEqual({ kind: 'references', entries: ['http://x.test'] });
  });

  it('fills document metadata from the title', () => {
    const doc = composeDocument('body', '  Ocean Acidification  ', { date: DATE, author: 'Research Agent' });
    expect(doc.metadata).toEqual({
      title: 'Ocean Acidification',
      author: 'Research Agent',
      subject: 'Research Report: Ocean Acidification',
      creator: GENERATOR_NAME,
      creationDate: DATE,
    });
  });

  it('omits the references part when no URL appears', () => {
    const doc = composeDocument('plain text only', 'T', { date: DATE });
    expect(doc.references).toBeUndefined();
    expect(doc.parts.map((p) => p.kind)).toEqual(['cover', 'toc', 'paragraph']);
  });

  it('rejects an empty title', () => {
    expect(() => composeDocument(SAMPLE, '   ')).toThrow(PreconditionError);
  });
});

describe('generateFilename', () => {
  it('uses the first five words of the first non-empty line', () => {
    expect(generateFilename('\n# Quantum Computing Basics Explained Simply Today\nbody')).toBe(
      'quantum_computing_basics_explained_simply_research.pdf',
    );
  });

  it('does not count the heading marker as a word', () => {
    expect(generateFilename('# A B C D E F')).toBe('a_b_c_d_e_research.pdf');
  });

  it('drops boilerplate prefixes', () => {
    expect(generateFilename('Topic: Climate Change Impacts')).toBe('climate_change_impacts_research.pdf');
    expect(generateFilename('Summary: Solar Power')).toBe('solar_power_research.pdf');
  });

  it('truncates the name to 50 characters', () => {
    const word = 'Supercalifragilisticexpialidocious';
    expect(generateFilename(`${word} ${word}`)).toBe(
      'supercalifragilisticexpialidocious_supercalifragil_research.pdf',
    );
  });

  it('falls back when no usable line exists', () => {
    expect(generateFilename('\n  \n')).toBe('research_output.pdf');
  });
});

describe('formatCoverDate', () => {
  it('writes the full month name', () => {
    expect(formatCoverDate(new Date(2025, 10, 20))).toBe('November 20, 2025');
  });
});

describe('planToc', () => {
  const entries = (n: number): TocEntry[] =>
    Array.from({ length: n }, (_, i) => ({ level: 1, text: `${i + 1}. Section`, anchorKey: `s${i}` }));

  it('always reserves one page', () => {
    expect(planToc([]).pages).toBe(1);
  });

  it('spills onto a second page once the first is full', () => {
    const plan = planToc(entries(30));
    expect(plan.pages).toBe(2);
    expect(plan.slots[26].pageOffset).toBe(0);
    expect(plan.slots[27].pageOffset).toBe(1);
  });
});

describe('renderDocument', () => {
  it('places the body after cover and TOC and appends a references page', async () => {
    const doc = composeDocument(SAMPLE, 'T', { date: DATE, author: 'Research Agent' });
    const result = await renderDocument(doc);

    expect(result.pageCount).toBe(4);
    expect(result.headingPages.get('intro')).toBe(3);
    expect(result.headingPages.get('sub')).toBe(3);

    const loaded = await PDFDocument.load(result.bytes);
    expect(loaded.getPageCount()).toBe(4);
    expect(loaded.getTitle()).toBe('T');
    expect(loaded.getAuthor()).toBe('Research Agent');
    expect(loaded.getSubject()).toBe('Research Report: T');
    expect(loaded.getCreator()).toBe(GENERATOR_NAME);
  });

  it('pushes the body back when the TOC needs two pages', async () => {
    const body = Array.from({ length: 30 }, (_, i) => `# Section ${i + 1}\nText.`).join('\n');
    const result = await renderDocument(composeDocument(body, 'Long', { date: DATE }));

    expect(result.headingPages.get('section_1')).toBe(4);
    expect(result.pageCount).toBeGreaterThan(4);
  });

  it('continues a table row taller than a page onto the following pages', async () => {
    const cell = Array.from({ length: 3000 }, () => 'word').join(' ');
    const body = `| Topic | Notes |\n|---|---|\n| Long | ${cell} |`;
    const result = await renderDocument(composeDocument(body, 'Table', { date: DATE }));

    // cover, TOC and at least five body pages
    expect(result.pageCount).toBeGreaterThanOrEqual(7);
  });

  it('renders characters outside the standard font encoding', async () => {
    const body = '# Größe → ≥ 5\nGreek αβγ ✓ 中文 and tabs\tinside\n```\n\tcode → here\n```';
    const result = await renderDocument(composeDocument(body, 'Symbols ✓', { date: DATE }));
    expect(result.pageCount).toBe(3);
  });
});

describe('exportPdf', () => {
  let tempDir: string;
  let storage: FileStorage;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'compositor-test-'));
    storage = new FileStorage(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes the report under a derived filename', async () => {
    const result = await exportPdf(
      { data: SAMPLE, title: 'T' },
      { storage, options: { date: DATE, author: 'Research Agent' } },
    );

    expect(result.filename).toBe('intro_research.pdf');
    expect(result.filePath).toBe(path.join(tempDir, 'intro_research.pdf'));
    expect(result.pageCount).toBe(4);
    expect(result.references).toEqual(['http://x.test']);

    const loaded = await PDFDocument.load(await fs.readFile(result.filePath));
    expect(loaded.getPageCount()).toBe(4);
    expect(await storage.listFiles()).toEqual(['intro_research.pdf']);
  });

  it('keeps an explicit filename and adds the extension', async () => {
    const result = await exportPdf({ data: 'x', title: 'T', filename: 'custom_report' }, { storage });
    expect(result.filename).toBe('custom_report.pdf');
  });

  it('still writes the file when an image is missing', async () => {
    const result = await exportPdf(
      { data: '# Figures\n![Growth](growth.png)\nAfter the figure.', title: 'Figures' },
      { storage },
    );
    const stats = await storage.getFileStats(result.filename);
    expect(stats.exists).toBe(true);
    expect(result.pageCount).toBe(3);
  });

  it('embeds an image found next to the output', async () => {
    await fs.writeFile(path.join(tempDir, 'pixel.png'), PIXEL_PNG);
    const result = await exportPdf({ data: '![Pixel](pixel.png)', title: 'Image' }, { storage });
    expect(result.pageCount).toBe(3);
  });

  it('refuses an empty title before writing anything', async () => {
    await expect(exportPdf({ data: SAMPLE, title: '' }, { storage })).rejects.toBeInstanceOf(PreconditionError);
    expect(await storage.listFiles()).toEqual([]);
  });
});
