/**
 * Tests for Markdown, HTML and PDF text extraction
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ExtractionError } from '../../errors/index.js';
import {
  collapseWhitespace,
  decodeEntities,
  extractDocument,
  extractHtmlText,
  extractMarkdownText,
  extractPdfText,
} from '../chunker/extractors/index.js';
import type { FileInfo } from '../types.js';

const pdfMock = vi.hoisted(() => ({
  destroy: vi.fn(async () => {}),
}));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(() => ({
    promise: Promise.resolve({
      numPages: 2,
      getPage: async (pageNumber: number) => ({
        getTextContent: async () => ({
          items: [{ str: 'Page' }, { str: String(pageNumber) }, { type: 'beginMarkedContent' }],
        }),
      }),
      destroy: pdfMock.destroy,
    }),
  })),
}));

describe('decodeEntities', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeEntities('Tom &amp; Jerry&#39;s &lt;b&gt; &#x41;')).toBe("Tom & Jerry's <b> A");
  });

  it('leaves unknown and out-of-range entities as written', () => {
    expect(decodeEntities('&bogus; &#1114112;')).toBe('&bogus; &#1114112;');
  });
});

describe('extractMarkdownText', () => {
  it('flattens blocks and inline formatting into prose', () => {
    const source = [
      '# Getting Started',
      '',
      'Install with **npm** and read the [guide](https://example.com/guide).',
      '',
      '- first item',
      '- second `code`',
      '',
      '| A | B |',
      '|---|---|',
      '| 1 | 2 |',
    ].join('\n');

    const { text, title } = extractMarkdownText(source);

    expect(title).toBe('Getting Started');
    expect(collapseWhitespace(text)).toBe(
      'Getting Started Install with npm and read the guide. first item second code A | B 1 | 2'
    );
  });

  it('keeps fenced code and decodes escaped characters', () => {
    const { text } = extractMarkdownText("Tom & Jerry's show\n\n```js\nconst a = 1;\n```\n");
    expect(collapseWhitespace(text)).toBe("Tom & Jerry's show const a = 1;");
  });

  it('has no title without a level-1 heading', () => {
    expect(extractMarkdownText('## Section\n\nBody').title).toBeUndefined();
  });
});

describe('extractHtmlText', () => {
  it('drops head, scripts and comments and reads the title', () => {
    const html =
      '<html><head><title>Guide &amp; Intro</title><style>p{}</style></head>' +
      '<body><h1>Hello</h1><script>var x=1;</script>' +
      '<p>A&nbsp;b &lt;c&gt; &#65;&#x42;</p><!-- note --></body></html>';

    const { text, title } = extractHtmlText(html);

    expect(title).toBe('Guide & Intro');
    expect(collapseWhitespace(text)).toBe('Hello A b <c> AB');
  });

  it('has no title when the document has none', () => {
    expect(extractHtmlText('<p>only text</p>').title).toBeUndefined();
  });
});

describe('extractPdfText', () => {
  beforeEach(() => {
    pdfMock.destroy.mockClear();
  });

  it('joins text items per page and pages per line', async () => {
    const { text } = await extractPdfText(new Uint8Array([1, 2, 3]));

    expect(text).toBe('Page 1 \nPage 2 ');
    expect(pdfMock.destroy).toHaveBeenCalledTimes(1);
  });
});

describe('extractDocument', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'docent-extract-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function fileInfo(name: string, content: string, type: FileInfo['type']): FileInfo {
    const path = join(tempDir, name);
    writeFileSync(path, content);
    return {
      path,
      relativePath: name,
      extension: name.slice(name.lastIndexOf('.')),
      type,
      size: Buffer.byteLength(content),
      modifiedAt: '2024-01-01T00:00:00.000Z',
    };
  }

  it('falls back to the file name for the title', async () => {
    const doc = await extractDocument(
      fileInfo('getting_started.md', 'Just some   text\nwithout a heading.', 'markdown')
    );

    expect(doc.title).toBe('Getting Started');
    expect(doc.text).toBe('Just some text without a heading.');
    expect(doc.type).toBe('markdown');
    expect(doc.size).toBe(35);
  });

  it('prefers the document title', async () => {
    const doc = await extractDocument(
      fileInfo('page.html', '<title>Real Title</title><p>Body</p>', 'html')
    );
    expect(doc.title).toBe('Real Title');
    expect(doc.text).toBe('Body');
  });

  it('reads plain text as is', async () => {
    const doc = await extractDocument(fileInfo('notes.txt', 'plain *text*', 'text'));
    expect(doc.text).toBe('plain *text*');
  });

  it('rejects documents without text', async () => {
    const file = fileInfo('blank.txt', '   \n  ', 'text');

    await expect(extractDocument(file)).rejects.toBeInstanceOf(ExtractionError);
    await expect(extractDocument(file)).rejects.toMatchObject({ errorCode: 'EXTRACTION_EMPTY' });
  });

  it('wraps read failures', async () => {
    const file: FileInfo = {
      path: join(tempDir, 'missing.md'),
      relativePath: 'missing.md',
      extension: '.md',
      type: 'markdown',
      size: 0,
      modifiedAt: '2024-01-01T00:00:00.000Z',
    };

    await expect(extractDocument(file)).rejects.toMatchObject({
      errorCode: 'EXTRACTION_FAILED',
      path: file.path,
    });
  });
});
