import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { scanMarkdown, BLANK_LINE_SPACE, splitTableRow, type ScanOptions } from '../../server/services/pdf/scanner';

const BASE_DIR = path.resolve('/reports/out');

function scan(text: string, overrides: Partial<ScanOptions> = {}) {
  return scanMarkdown(text, { imageBaseDir: BASE_DIR, fileExists: () => false, ...overrides });
}

describe('scanMarkdown', () => {
  describe('code fences', () => {
    it('keeps fenced content verbatim and out of every other rule', () => {
      const result = scan('```sql\n# not a heading\n| a | b |\nhttp://x.test\n```\nafter');

      expect(result.blocks).toEqual([
        { kind: 'code', language: 'sql', text: '# not a heading\n| a | b |\nhttp://x.test' },
        { kind: 'paragraph', text: 'after' },
      ]);
      expect(result.toc).toEqual([]);
      expect(result.references).toEqual([]);
    });

    it('flushes an unclosed fence at end of input', () => {
      const result = scan('```\n  indented\nline');
      expect(result.blocks).toEqual([{ kind: 'code', language: undefined, text: '  indented\nline' }]);
    });
  });

  describe('tables', () => {
    it('yields an empty body for a header plus separator', () => {
      const result = scan('| A | B |\n|---|---|');
      expect(result.blocks).toEqual([{ kind: 'table', header: ['A', 'B'], rows: [] }]);
    });

    it('links URLs inside cells and keeps ragged rows', () => {
      const result = scan('| Name | Link |\n| :--- | ---: |\n| x | https://t.test |\n| y |');

      expect(result.blocks).toEqual([
        {
          kind: 'table',
          header: ['Name', 'Link'],
          rows: [['x', '<link>https://t.test</link>'], ['y']],
        },
      ]);
      expect(result.references).toEqual(['https://t.test']);
    });

    it('degrades separator-only rows to paragraphs', () => {
      expect(scan('|---|').blocks).toEqual([{ kind: 'paragraph', text: '|---|' }]);
    });

    it('splits rows and discards the outer empty cells', () => {
      expect(splitTableRow('| a | b |')).toEqual(['a', 'b']);
      expect(splitTableRow('| a | b')).toEqual(['a', 'b']);
      expect(splitTableRow('| a |  | c |')).toEqual(['a', '', 'c']);
    });
  });

  describe('images', () => {
    it('resolves relative paths against the base directory', () => {
      const result = scan('![Chart](charts/growth.png)', { fileExists: () => true });
      expect(result.blocks).toEqual([
        { kind: 'image', path: path.join(BASE_DIR, 'charts', 'growth.png'), alt: 'Chart' },
      ]);
    });

    it('reports missing files without throwing', () => {
      const result = scan('![Missing](missing.png)');
      expect(result.blocks).toEqual([
        { kind: 'image_error', message: `Image not found: ${path.join(BASE_DIR, 'missing.png')}` },
      ]);
    });

    it('keeps absolute paths as given', () => {
      const absolute = path.resolve('/data/img.jpg');
      const seen: string[] = [];
      scan(`![](${absolute})`, { fileExists: (p) => { seen.push(p); return true; } });
      expect(seen).toEqual([absolute]);
    });

    it('lets a malformed image line fall through to a paragraph', () => {
      expect(scan('![broken').blocks).toEqual([{ kind: 'paragraph', text: '![broken' }]);
    });
  });

  it('recognizes every page break marker', () => {
    const result = scan('a\n---\n\\pagebreak\n<pagebreak>');
    expect(result.blocks.map((b) => b.kind)).toEqual(['paragraph', 'page_break', 'page_break', 'page_break']);
  });

  it('emits one spacer per blank line', () => {
    const result = scan('a\n\n   \nb');
    expect(result.blocks).toEqual([
      { kind: 'paragraph', text: 'a' },
      { kind: 'spacer', size: BLANK_LINE_SPACE },
      { kind: 'spacer', size: BLANK_LINE_SPACE },
      { kind: 'paragraph', text: 'b' },
    ]);
  });

  describe('headings', () => {
    it('numbers marked headings and clamps deeper levels to 3', () => {
      const result = scan('# One\n## Two\n### Three\n#### Four');

      expect(result.blocks).toEqual([
        { kind: 'heading', level: 1, number: '1', text: '1. One', anchorKey: 'one' },
        { kind: 'heading', level: 2, number: '1.1', text: '1.1. Two', anchorKey: 'two' },
        { kind: 'heading', level: 3, number: '1.1.1', text: '1.1.1. Three', anchorKey: 'three' },
        { kind: 'heading', level: 3, number: '1.1.2', text: '1.1.2. Four', anchorKey: 'four' },
      ]);
      expect(result.toc.map((e) => e.text)).toEqual(['1. One', '1.1. Two', '1.1.1. Three', '1.1.2. Four']);
    });

    it('promotes short capitalized colon lines to level 1', () => {
      const result = scan('Key Findings:\nNote: this is a sentence.');
      expect(result.blocks).toEqual([
        { kind: 'heading', level: 1, number: '1', text: '1. Key Findings', anchorKey: 'key_findings' },
        { kind: 'paragraph', text: 'Note: this is a sentence.' },
      ]);
    });

    it('accepts a replacement heading predicate', () => {
      const result = scan('Key Findings:', { isImplicitHeading: () => false });
      expect(result.blocks).toEqual([{ kind: 'paragraph', text: 'Key Findings:' }]);
    });

    it('does not link URLs in headings', () => {
      const result = scan('# See http://x.test');
      expect(result.blocks).toEqual([
        { kind: 'heading', level: 1, number: '1', text: '1. See http://x.test', anchorKey: 'see_httpxtest' },
      ]);
      expect(result.references).toEqual([]);
    });

    it('needs a space after the hash marks', () => {
      expect(scan('#hashtag').blocks).toEqual([{ kind: 'paragraph', text: '#hashtag' }]);
    });
  });

  describe('lists', () => {
    it('recognizes bullet markers, nesting and numbered items', () => {
      const result = scan('- a\n* b\n• c\n  - d\n1. e\n2) f');
      expect(result.blocks).toEqual([
        { kind: 'bullet', depth: 0, text: 'a' },
        { kind: 'bullet', depth: 0, text: 'b' },
        { kind: 'bullet', depth: 0, text: 'c' },
        { kind: 'bullet', depth: 1, text: 'd' },
        { kind: 'bullet', depth: 0, text: 'e' },
        { kind: 'bullet', depth: 0, text: 'f' },
      ]);
    });

    it('nests only items indented by exactly two spaces', () => {
      const result = scan('  - two\n    - four\n\t- tab\n - one');
      expect(result.blocks.map((b) => (b.kind === 'bullet' ? b.depth : -1))).toEqual([1, 0, 0, 0]);
    });

    it('normalizes scripts and links inside items', () => {
      const result = scan('- H₂O per https://w.test');
      expect(result.blocks).toEqual([
        { kind: 'bullet', depth: 0, text: 'H<sub>2</sub>O per <link>https://w.test</link>' },
      ]);
    });

    it('leaves emphasis markers to paragraphs', () => {
      expect(scan('**bold** text').blocks).toEqual([{ kind: 'paragraph', text: '**bold** text' }]);
    });
  });

  it('handles CRLF line endings', () => {
    expect(scan('a\r\nb').blocks).toEqual([
      { kind: 'paragraph', text: 'a' },
      { kind: 'paragraph', text: 'b' },
    ]);
  });

  it('lists each URL once, in order of first appearance', () => {
    const result = scan('x https://b.test\n- https://a.test\ny https://b.test');
    expect(result.references).toEqual(['https://b.test', 'https://a.test']);
  });
});
