/**
 * Mood-board segmentation. A board arrives as a JSON container of pages, each
 * page holding captioned image regions. Every region with caption text or an
 * image becomes one segment; empty regions are skipped with a warning.
 *
 * Spans count regions across the whole board (skipped ones included), so the
 * segments plus the skipped regions tile [0, regionCount).
 */
import { z } from 'zod';
import { UnreadableDocument } from '../errors.js';
import { throwIfAborted } from '../utils/retry.js';
import { segmentId, type Modality, type Segment, type Span } from '../types.js';
import type { BoardImage, VisualAnalyzer } from './visual.js';

const ImageSchema = z.object({
  ref:        z.string().optional(),
  data:       z.string().optional(),
  mediaType:  z.string().optional(),
  palette:    z.array(z.string()).optional(),
  brightness: z.number().min(0).max(255).optional(),
});

const RegionSchema = z.object({
  label:   z.string().optional(),
  caption: z.string().optional(),
  image:   ImageSchema.optional(),
});

const PageSchema = z.object({
  caption: z.string().optional(),
  regions: z.array(RegionSchema).optional(),
});

export const MoodboardSchema = z.object({
  title: z.string().optional(),
  pages: z.array(PageSchema),
});

export type Moodboard = z.infer<typeof MoodboardSchema>;
type Region = z.infer<typeof RegionSchema>;

export interface SkippedRegion {
  page: number;
  span: Span;
  reason: string;
}

export interface MoodboardSegmentation {
  title: string | null;
  segments: Segment[];
  skipped: SkippedRegion[];
  regionCount: number;
  warnings: string[];
}

export function readMoodboard(text: string): Moodboard {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new UnreadableDocument('mood board container is not valid JSON', { cause: err });
  }
  const parsed = MoodboardSchema.safeParse(raw);
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    throw new UnreadableDocument(`mood board container has an invalid layout at ${where}`);
  }
  return parsed.data;
}

function regionsOf(page: z.infer<typeof PageSchema>): Region[] {
  const regions = page.regions ?? [];
  const caption = page.caption?.trim();
  // A page-level caption is a text region of its own, ahead of the image regions.
  return caption ? [{ caption }, ...regions] : regions;
}

function hasImage(image: BoardImage | undefined): image is BoardImage {
  return !!image && (!!image.ref || !!image.data || (image.palette?.length ?? 0) > 0 || image.brightness !== undefined);
}

export async function segmentMoodboard(
  documentId: string,
  board: Moodboard,
  analyzer: VisualAnalyzer,
  signal?: AbortSignal,
): Promise<MoodboardSegmentation> {
  const segments: Segment[] = [];
  const skipped: SkippedRegion[] = [];
  const warnings: string[] = [];
  let regionIndex = 0;

  for (let p = 0; p < board.pages.length; p++) {
    const page = board.pages[p];
    if (!page) continue;
    const pageNumber = p + 1;
    const regions = regionsOf(page);
    if (regions.length === 0) {
      warnings.push(`page ${pageNumber} has no regions`);
    }

    for (const region of regions) {
      throwIfAborted(signal, 'mood board segmentation');
      const span = { start: regionIndex, end: regionIndex + 1 };
      regionIndex++;

      const label = region.label?.trim() ?? '';
      const caption = region.caption?.trim() ?? '';
      const text = label && caption ? `${label}: ${caption}` : label || caption;
      const image = hasImage(region.image) ? region.image : undefined;
      const visual = image ? await analyzer.describe(image, text, signal) : null;

      if (!text && !image) {
        skipped.push({ page: pageNumber, span, reason: 'region has neither text nor image' });
        warnings.push(`page ${pageNumber} region ${span.start} skipped: no text or image`);
        continue;
      }

      const modality: Modality = text && image ? 'mixed' : image ? 'image' : 'text';
      const ordinal = segments.length;
      segments.push({
        id: segmentId(documentId, ordinal),
        documentId,
        ordinal,
        modality,
        role: 'region',
        text,
        label: label || null,
        visual,
        span,
        page: pageNumber,
      });
    }
  }

  return { title: board.title?.trim() || null, segments, skipped, regionCount: regionIndex, warnings };
}
