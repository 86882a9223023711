import fs from 'fs';
import path from 'path';
import JSZip from 'jszip';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import documentTextService, {
  extractParagraphs,
  preprocessParagraph,
  preprocessText,
} from './document-text.service';
import { makeTempDir, removeDir } from '../../test/helpers';

describe('preprocessParagraph', () => {
  it('removes reference numbers, dashes, phone numbers, e-mails and the paragraph number', () => {
    expect(
      preprocessParagraph('1. Call 555-123-4567 or mail a.b@x.com [12] now - today.')
    ).toBe('Call or mail now today.');
  });

  it('strips lettered and parenthesised paragraph numbers', () => {
    expect(preprocessParagraph('(a) The witness arrived.')).toBe('The witness arrived.');
    expect(preprocessParagraph('iv) Exhibits were filed.')).toBe('Exhibits were filed.');
  });

  it('keeps short numbers and ordinary sentences', () => {
    expect(preprocessParagraph('The fee was 250 dollars.')).toBe('The fee was 250 dollars.');
  });
});

describe('preprocessText', () => {
  it('cleans each paragraph and drops those left empty', () => {
    expect(preprocessText('2. First point.\n\n[3]\r\nSecond point.')).toBe('First point.\nSecond point.');
  });
});

describe('extractParagraphs', () => {
  it('returns trimmed non-blank lines', () => {
    expect(extractParagraphs('  one \n\n two\n   ')).toEqual(['one', 'two']);
  });
});

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

/** Smallest Word package that carries the given paragraphs. */
async function writeDocx(filePath: string, paragraphs: string[]): Promise<void> {
  const body = paragraphs
    .map((text) => `<w:p><w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`)
    .join('');
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ' +
      'ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>'
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" ' +
      'Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" ' +
      'Target="word/document.xml"/>' +
      '</Relationships>'
  );
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:document xmlns:w="${W_NS}"><w:body>${body}</w:body></w:document>`
  );
  fs.writeFileSync(filePath, await zip.generateAsync({ type: 'nodebuffer' }));
}

describe('documentTextService.readDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  it('reads and preprocesses a text file', async () => {
    const file = path.join(dir, 'deposition.txt');
    fs.writeFileSync(file, '1. Opening remarks [4].\n2. Questions follow.');

    await expect(documentTextService.readDocument(file)).resolves.toBe(
      'Opening remarks .\nQuestions follow.'
    );
  });

  it('returns the raw text when preprocessing is off', async () => {
    const file = path.join(dir, 'notes.md');
    fs.writeFileSync(file, '1. Keep me [4]');

    await expect(documentTextService.readDocument(file, { preprocess: false })).resolves.toBe(
      '1. Keep me [4]'
    );
  });

  it('reads the paragraphs of a Word document and preprocesses them', async () => {
    const file = path.join(dir, 'hearing.docx');
    await writeDocx(file, ['1. First paragraph [3] of the record.', 'Call 555 123 4567 today.']);

    await expect(documentTextService.readDocument(file)).resolves.toBe(
      'First paragraph of the record.\nCall today.'
    );
  });

  it('rejects a Word document that is not a valid package with 422', async () => {
    const file = path.join(dir, 'broken.docx');
    fs.writeFileSync(file, 'not a zip archive');

    await expect(documentTextService.readDocument(file)).rejects.toMatchObject({ statusCode: 422 });
  });

  it('rejects unsupported formats with 415', async () => {
    await expect(documentTextService.readDocument(path.join(dir, 'brief.pdf'))).rejects.toMatchObject({
      statusCode: 415,
    });
  });

  it('reports a missing file with 404', async () => {
    await expect(documentTextService.readDocument(path.join(dir, 'gone.txt'))).rejects.toMatchObject({
      statusCode: 404,
    });
  });
});
