/**
 * PDF text layer. Screenplays and mood boards may arrive as PDF exports; only
 * the text layer is read, one string per page with its line breaks kept.
 * Page images are not rendered.
 */
import { INGESTION } from '../config.js';
import { UnreadableDocument } from '../errors.js';
import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/retry.js';

export interface PdfReader {
  /** Text of each page, first page first. */
  readPages(bytes: Uint8Array, signal?: AbortSignal): Promise<string[]>;
}

const MAGIC = Buffer.from('%PDF-', 'latin1');

export function isPdf(bytes: Uint8Array): boolean {
  return bytes.byteLength >= MAGIC.byteLength && Buffer.from(bytes.subarray(0, MAGIC.byteLength)).equals(MAGIC);
}

/** Page texts joined into one document, with the 1-based page of any offset. */
export function joinPages(pages: readonly string[]): { text: string; pageAt: (offset: number) => number } {
  const starts: number[] = [];
  let text = '';
  for (const page of pages) {
    if (starts.length > 0) text += '\n\n';
    starts.push(text.length);
    text += page;
  }
  const pageAt = (offset: number): number => {
    let page = 1;
    starts.forEach((start, i) => {
      if (start <= offset) page = i + 1;
    });
    return page;
  };
  return { text, pageAt };
}

export class PdfJsReader implements PdfReader {
  constructor(private readonly maxPages: number = INGESTION.pdfMaxPages) {}

  async readPages(bytes: Uint8Array, signal?: AbortSignal): Promise<string[]> {
    // legacy build: the modern one needs APIs newer than Node 20
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const task = pdfjs.getDocument({
      data: new Uint8Array(bytes),
      useWorkerFetch: false,
      isEvalSupported: false,
      useSystemFonts: true,
    });

    let doc: Awaited<typeof task.promise>;
    try {
      doc = await task.promise;
    } catch (err) {
      throw new UnreadableDocument('PDF could not be opened', { cause: err });
    }

    try {
      const count = Math.min(doc.numPages, this.maxPages);
      if (doc.numPages > count) {
        logger.warn('Parser: PDF truncated', { pages: doc.numPages, read: count });
      }
      const pages: string[] = [];
      for (let i = 1; i <= count; i++) {
        throwIfAborted(signal, 'PDF extraction');
        const page = await doc.getPage(i);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str + (item.hasEOL ? '\n' : '');
        }
        pages.push(text.replace(/\u0000/g, ''));
      }
      return pages;
    } finally {
      await doc.destroy();
    }
  }
}
