import { readFile } from 'fs/promises';
import { basename } from 'path';
import pdfParse, { type PdfPageData } from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { UnreadablePdfError } from '../../utils/errors.js';
import type { ExtractedText } from '../../types/terms.types.js';

export const PAGE_SEPARATOR = '\n\n';
export const DEFAULT_MAX_CHARS = 50_000;

export type PdfSource = string | Buffer;

export interface TextSource {
  extractText(source: PdfSource, label?: string): Promise<ExtractedText>;
}

/**
 * Renders one page by grouping text items on the same baseline into a line,
 * top to bottom, left to right.
 */
async function renderPage(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();
  for (const item of content.items) {
    if (!item.str || item.str.trim() === '') continue;
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);
    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  return [...itemsByY.keys()]
    .sort((a, b) => b - a)
    .map(y =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map(item => item.str)
        .join(' ')
        .trim()
    )
    .filter(line => line.length > 0)
    .join('\n');
}

export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export class PdfTextExtractor implements TextSource {
  constructor(private maxChars: number = DEFAULT_MAX_CHARS) {}

  async extractText(source: PdfSource, label?: string): Promise<ExtractedText> {
    const name = label ?? (typeof source === 'string' ? basename(source) : 'upload.pdf');
    logger.info({ source: name }, 'Extracting text from PDF');

    let buffer: Buffer;
    try {
      buffer = typeof source === 'string' ? await readFile(source) : source;
    } catch (error) {
      logger.error({ error, source: name }, 'PDF read failed');
      throw new UnreadablePdfError(`Cannot read ${name}`, name, error);
    }

    const pages: string[] = [];
    let pageCount: number;
    try {
      const result = await pdfParse(buffer, {
        pagerender: async pageData => {
          const pageText = await renderPage(pageData);
          pages.push(pageText);
          return pageText;
        },
      });
      pageCount = result.numpages;
    } catch (error) {
      logger.error({ error, source: name }, 'PDF parsing failed');
      throw new UnreadablePdfError(`${name} is not a readable PDF`, name, error);
    }

    const fullText = pages.filter(page => page.trim().length > 0).join(PAGE_SEPARATOR);
    if (!fullText.trim()) {
      logger.warn({ source: name, pageCount }, 'No text content extracted from PDF');
    }

    const text = truncateText(fullText, this.maxChars);
    const truncated = text.length < fullText.length;
    if (truncated) {
      logger.warn(
        { source: name, originalLength: fullText.length, maxChars: this.maxChars },
        'Extracted text exceeds character budget, truncating'
      );
    }

    logger.info({ source: name, pageCount, chars: text.length }, 'PDF text extraction complete');

    return {
      text,
      pageCount,
      originalLength: fullText.length,
      truncated,
    };
  }
}
