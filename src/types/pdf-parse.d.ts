declare module 'pdf-parse/lib/pdf-parse.js' {
  import type { Result } from 'pdf-parse';

  export interface PdfTextItem {
    str: string;
    transform: number[];
  }

  export interface PdfPageData {
    getTextContent(options?: {
      normalizeWhitespace?: boolean;
      disableCombineTextItems?: boolean;
    }): Promise<{ items: PdfTextItem[] }>;
  }

  export interface PdfParseOptions {
    max?: number;
    pagerender?: (pageData: PdfPageData) => Promise<string>;
  }

  function pdfParse(dataBuffer: Buffer, options?: PdfParseOptions): Promise<Result>;
  export default pdfParse;
}
