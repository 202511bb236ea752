/**
 * Visual descriptors for mood-board images. The analyzer is a pluggable
 * capability: PaletteVisualAnalyzer names colors from palette metadata that
 * came with the board, ModelVisualAnalyzer asks a vision-capable model.
 */
import { z } from 'zod';
import { BRIGHTNESS } from '../config.js';
import { getLexicon } from '../extract/lexicon.js';
import { extractJson, type LanguageModel } from '../ai/model.js';
import { OperationAborted } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Brightness, VisualDescriptor } from '../types.js';

export interface BoardImage {
  ref?: string;
  data?: string;
  mediaType?: string;
  palette?: string[];
  /** mean grey level 0-255 */
  brightness?: number;
}

export interface VisualAnalyzer {
  describe(image: BoardImage, caption: string, signal?: AbortSignal): Promise<VisualDescriptor | null>;
}

interface Hsl { h: number; s: number; l: number }

export function hexToHsl(hex: string): Hsl | null {
  const m = hex.trim().match(/^#?([0-9a-f]{3}|[0-9a-f]{6})$/i);
  if (!m?.[1]) return null;
  const full = m[1].length === 3 ? m[1].split('').map((c) => c + c).join('') : m[1];
  const r = parseInt(full.slice(0, 2), 16) / 255;
  const g = parseInt(full.slice(2, 4), 16) / 255;
  const b = parseInt(full.slice(4, 6), 16) / 255;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;
  const d = max - min;
  if (d === 0) return { h: 0, s: 0, l };
  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h: number;
  if (max === r) h = ((g - b) / d) % 6;
  else if (max === g) h = (b - r) / d + 2;
  else h = (r - g) / d + 4;
  h *= 60;
  if (h < 0) h += 360;
  return { h, s, l };
}

/** Names a color as "<modifier> <hue>", e.g. "desaturated blue", or a grey level. */
export function nameColor(hex: string): string | null {
  const hsl = hexToHsl(hex);
  if (!hsl) return null;
  const { h, s, l } = hsl;
  if (s < 0.12 || l < 0.06 || l > 0.96) {
    if (l < 0.15) return 'black';
    if (l > 0.9) return 'white';
    return l < 0.45 ? 'dark grey' : 'grey';
  }
  const hue = getLexicon().hues.find((band) => h >= band.from && h < band.to)?.name ?? 'red';
  if (l < 0.25) return `dark ${hue}`;
  if (l > 0.8) return `pale ${hue}`;
  if (s < 0.35) return `desaturated ${hue}`;
  if (s > 0.8) return `vivid ${hue}`;
  return hue;
}

export function brightnessLevel(value: number | undefined): Brightness | null {
  if (value === undefined || !Number.isFinite(value)) return null;
  if (value < BRIGHTNESS.lowBelow) return 'low';
  if (value > BRIGHTNESS.highAbove) return 'high';
  return 'medium';
}

function summarize(colorTerms: string[], brightness: Brightness | null, lightingTerms: string[]): string {
  const parts = [...colorTerms];
  if (brightness) parts.push(`${brightness} brightness`);
  parts.push(...lightingTerms);
  return parts.join(', ');
}

export class PaletteVisualAnalyzer implements VisualAnalyzer {
  async describe(image: BoardImage): Promise<VisualDescriptor | null> {
    const palette = (image.palette ?? []).filter((hex) => hexToHsl(hex) !== null).map((hex) => hex.toLowerCase());
    const colorTerms = [...new Set(palette.map(nameColor).filter((c): c is string => c !== null))];
    const brightness = brightnessLevel(image.brightness);
    if (colorTerms.length === 0 && brightness === null) return null;
    const lightingTerms = brightness === 'low' ? ['low-key'] : brightness === 'high' ? ['high-key'] : [];
    return { palette, colorTerms, brightness, lightingTerms, summary: summarize(colorTerms, brightness, lightingTerms) };
  }
}

const ModelDescriptorSchema = z.object({
  colors:     z.array(z.string()).default([]),
  brightness: z.enum(['low', 'medium', 'high']).nullable().default(null),
  lighting:   z.array(z.string()).default([]),
  summary:    z.string().default(''),
});

/**
 * Vision-model analyzer. Falls back to the palette analyzer when the region has
 * no inline image data or when the model reply cannot be used.
 */
export class ModelVisualAnalyzer implements VisualAnalyzer {
  private readonly fallback = new PaletteVisualAnalyzer();

  constructor(private readonly model: LanguageModel) {}

  async describe(image: BoardImage, caption: string, signal?: AbortSignal): Promise<VisualDescriptor | null> {
    const base = await this.fallback.describe(image);
    if (!image.data) return base;

    const prompt =
      `You are describing a film mood-board image for a cinematographer.\n` +
      (caption ? `Caption on the board: "${caption}"\n` : '') +
      `Respond with JSON only:\n` +
      `{ "colors": ["<modifier> <color>", ...], "brightness": "low|medium|high", ` +
      `"lighting": ["<lighting style>", ...], "summary": "<one sentence>" }`;

    let reply: string;
    try {
      reply = await this.model.generate({
        prompt,
        maxTokens: 300,
        images: [{ data: image.data, mediaType: image.mediaType ?? 'image/jpeg' }],
        signal,
      });
    } catch (err) {
      if (err instanceof OperationAborted && signal?.aborted) throw err;
      logger.warn('Visual analysis: model call failed, using palette metadata', { error: String(err) });
      return base;
    }

    const parsed = ModelDescriptorSchema.safeParse(safeJson(reply));
    if (!parsed.success) {
      logger.warn('Visual analysis: unusable model reply, using palette metadata');
      return base;
    }
    const d = parsed.data;
    const colorTerms = [...new Set([...(base?.colorTerms ?? []), ...d.colors.map((c) => c.toLowerCase().trim())])];
    const lightingTerms = [...new Set([...(base?.lightingTerms ?? []), ...d.lighting.map((c) => c.toLowerCase().trim())])];
    const brightness = base?.brightness ?? d.brightness;
    return {
      palette: base?.palette ?? [],
      colorTerms,
      brightness,
      lightingTerms,
      summary: d.summary || summarize(colorTerms, brightness, lightingTerms),
    };
  }
}

function safeJson(text: string): unknown {
  try {
    return extractJson(text);
  } catch {
    return null;
  }
}
