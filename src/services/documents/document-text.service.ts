import fs from 'fs';
import path from 'path';
import { extractRawText } from 'mammoth';
import { logger } from '../../config/logger';
import { AppError } from '../../middleware/errorHandler';

export const SUPPORTED_DOCUMENT_EXTENSIONS = ['.txt', '.md', '.docx'];

const NUMBER_IN_BRACKETS = /\[\s*\d+\s*\]/g;
const HANGING_DASH = / - /g;
const PHONE = /\b\+?\d[\d\s-]{7,}\d\b/g;
const EMAIL = /[\w.-]+@[\w.-]+/g;
const PARAGRAPH_NUMBER = /^\(?(?:\d+|[a-zA-Z]|[ivxIVX]+)\)?[.)]\s*/;

/**
 * Clean one paragraph for narration: drops reference numbers like `[12]`,
 * hanging dashes, phone numbers, e-mail addresses and a leading `1.` / `(a)`
 * style paragraph number.
 */
export function preprocessParagraph(text: string): string {
  return text
    .replace(NUMBER_IN_BRACKETS, '')
    .replace(HANGING_DASH, ' ')
    .replace(PHONE, '')
    .replace(EMAIL, '')
    .trim()
    .replace(PARAGRAPH_NUMBER, '')
    .replace(/ {2,}/g, ' ')
    .trim();
}

/** Non-blank, trimmed lines of `text`. */
export function extractParagraphs(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Preprocess every paragraph and drop the ones left empty. */
export function preprocessText(text: string): string {
  return extractParagraphs(text)
    .map(preprocessParagraph)
    .filter((p) => p.length > 0)
    .join('\n');
}

export interface ReadDocumentOptions {
  /** Run `preprocessText` over the content (default true) */
  preprocess?: boolean;
}

class DocumentTextService {
  /**
   * Read a TXT, Markdown or DOCX document for narration
   */
  async readDocument(filePath: string, options: ReadDocumentOptions = {}): Promise<string> {
    const { preprocess = true } = options;
    const ext = path.extname(filePath).toLowerCase();

    if (!SUPPORTED_DOCUMENT_EXTENSIONS.includes(ext)) {
      throw new AppError(
        `Unsupported document type '${ext || '(none)'}'. Supported: ${SUPPORTED_DOCUMENT_EXTENSIONS.join(', ')}`,
        415
      );
    }
    if (!fs.existsSync(filePath)) {
      throw new AppError(`Document not found: ${filePath}`, 404);
    }

    const raw = ext === '.docx' ? await this.readDocx(filePath) : await fs.promises.readFile(filePath, 'utf-8');
    const text = preprocess ? preprocessText(raw) : raw;

    logger.info('Document loaded', {
      filePath,
      characters: text.length,
      preprocessed: preprocess,
    });

    return text;
  }

  /** Paragraph text of a Word document, one paragraph per line. */
  private async readDocx(filePath: string): Promise<string> {
    try {
      const { value, messages } = await extractRawText({ path: filePath });
      for (const message of messages) {
        logger.warn(`DOCX ${message.type}: ${message.message}`, { filePath });
      }
      return value;
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new AppError(`Could not read DOCX document: ${msg}`, 422);
    }
  }
}

export { DocumentTextService };
export default new DocumentTextService();
