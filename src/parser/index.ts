/**
 * Document Parser: raw content in, position-contiguous segments out.
 * Dispatches on the document kind, and on PDF content before that.
 */
import { UnreadableDocument } from '../errors.js';
import { logger } from '../utils/logger.js';
import { decodeText, toBytes, type RawContent } from './decode.js';
import { segmentMoodboard, readMoodboard, type Moodboard } from './moodboard.js';
import { PdfJsReader, isPdf, joinPages, type PdfReader } from './pdf.js';
import { segmentScreenplay } from './screenplay.js';
import type { VisualAnalyzer } from './visual.js';
import type { DocumentKind, Segment } from '../types.js';

export interface ParseResult {
  segments: Segment[];
  warnings: string[];
  /** title found inside the document (title page or board title) */
  embeddedTitle: string | null;
}

export interface ParseOptions {
  analyzer: VisualAnalyzer;
  /** text layer reader for PDF content */
  pdf?: PdfReader;
  signal?: AbortSignal;
}

const defaultPdfReader = new PdfJsReader();

function titleFromTitlePage(segments: Segment[]): string | null {
  const page = segments.find((s) => s.role === 'title_page');
  const match = page?.text.match(/^title\s*:\s*(.+)$/im);
  return match?.[1]?.trim() || null;
}

function parseScreenplay(documentId: string, text: string): ParseResult {
  const result = segmentScreenplay(documentId, text);
  logger.debug('Parser: screenplay segmented', {
    documentId, segments: result.segments.length, structured: result.structured,
  });
  return { segments: result.segments, warnings: result.warnings, embeddedTitle: titleFromTitlePage(result.segments) };
}

async function parseMoodboard(documentId: string, board: Moodboard, opts: ParseOptions): Promise<ParseResult> {
  const result = await segmentMoodboard(documentId, board, opts.analyzer, opts.signal);
  logger.debug('Parser: mood board segmented', {
    documentId, segments: result.segments.length, skipped: result.skipped.length,
  });
  return { segments: result.segments, warnings: result.warnings, embeddedTitle: result.title };
}

/**
 * A PDF screenplay is segmented from its joined page text, each segment
 * keeping the page it starts on. A PDF mood board turns every page into one
 * region captioned with the page text.
 */
async function parsePdf(documentId: string, kind: DocumentKind, bytes: Uint8Array, opts: ParseOptions): Promise<ParseResult> {
  const pages = await (opts.pdf ?? defaultPdfReader).readPages(bytes, opts.signal);
  if (pages.every((p) => p.trim() === '')) {
    throw new UnreadableDocument('PDF has no text layer');
  }
  switch (kind) {
    case 'screenplay': {
      const { text, pageAt } = joinPages(pages);
      const result = parseScreenplay(documentId, text);
      return { ...result, segments: result.segments.map((s) => ({ ...s, page: pageAt(s.span.start) })) };
    }
    case 'moodboard':
      return parseMoodboard(documentId, { pages: pages.map((caption) => ({ caption })) }, opts);
  }
}

export async function parseDocument(
  documentId: string,
  kind: DocumentKind,
  content: RawContent,
  opts: ParseOptions,
): Promise<ParseResult> {
  const bytes = toBytes(content);
  if (isPdf(bytes)) return parsePdf(documentId, kind, bytes, opts);

  const text = decodeText(content);
  if (text.trim() === '') throw new UnreadableDocument('document is empty');

  switch (kind) {
    case 'screenplay':
      return parseScreenplay(documentId, text);
    case 'moodboard':
      return parseMoodboard(documentId, readMoodboard(text), opts);
  }
}

export { decodeText, toBytes, type RawContent } from './decode.js';
export { PaletteVisualAnalyzer, ModelVisualAnalyzer, type VisualAnalyzer } from './visual.js';
export { PdfJsReader, type PdfReader } from './pdf.js';
