import { extractText, getDocumentProxy } from 'unpdf';

/**
 * Searchable text of an uploaded file
 */
export interface TextExtractor {
  /** Null when the file holds no text to index */
  extract(data: Uint8Array): Promise<string | null>;
}

export type PdfReader = (data: Uint8Array) => Promise<string>;

// %PDF-
const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46, 0x2d];

export function isPdf(data: Uint8Array): boolean {
  return PDF_SIGNATURE.every((byte, index) => data[index] === byte);
}

/**
 * Text of every page, pages separated by a newline
 */
export async function readPdfText(data: Uint8Array): Promise<string> {
  // pdf.js takes ownership of the buffer it is given
  const pdf = await getDocumentProxy(new Uint8Array(data));
  const { text } = await extractText(pdf, { mergePages: true });
  return text;
}

/**
 * Reads PDFs through pdf.js and everything else as UTF-8. Other binary files have no text.
 */
export class DocumentTextExtractor implements TextExtractor {
  private readonly readPdf: PdfReader;

  constructor(readPdf: PdfReader = readPdfText) {
    this.readPdf = readPdf;
  }

  async extract(data: Uint8Array): Promise<string | null> {
    if (isPdf(data)) {
      const text = (await this.readPdf(data)).trim();
      return text === '' ? null : text;
    }
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch {
      return null;
    }
  }
}
