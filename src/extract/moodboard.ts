/**
 * Rule-based recognizer for mood-board regions. Color palettes come from the
 * visual descriptor or color words in the caption, lighting styles and motifs
 * from lexicon phrases and #tags. Each region links its palette to the moods
 * it shows (EVOKES_MOOD).
 */
import { getLexicon } from './lexicon.js';
import { normalizeName } from '../utils/text.js';
import { emptyRecognition, type EndpointRef, type EntityRecognizer, type Mention, type Recognition } from './recognizer.js';
import type { Segment, SourceDocument } from '../types.js';

const CONFIDENCE = {
  paletteFromImage:   0.9,
  paletteFromCaption: 0.7,
  lighting:           0.7,
  lightingFromImage:  0.6,
  motif:              0.55,
  tag:                0.8,
} as const;

const EVOKES_WEIGHT = 0.8;

function containsPhrase(haystack: string, phrase: string): boolean {
  const h = ` ${normalizeName(haystack)} `;
  return h.includes(` ${normalizeName(phrase)} `);
}

/** Color phrases in free text, e.g. "desaturated blue" or "amber". */
export function colorTermsIn(text: string): string[] {
  const lex = getLexicon();
  const words = normalizeName(text).split(' ');
  const colors = new Set(lex.colorWords);
  const modifiers = new Set(lex.colorModifiers);
  const found: string[] = [];
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (!word || !colors.has(word)) continue;
    const prev = words[i - 1];
    found.push(prev && modifiers.has(prev) ? `${prev} ${word}` : word);
  }
  return [...new Set(found)];
}

export function lightingPhrasesIn(text: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const phrase of getLexicon().lightingPhrases) {
    const key = normalizeName(phrase);
    if (seen.has(key) || !containsPhrase(text, phrase)) continue;
    seen.add(key);
    out.push(phrase);
  }
  return out;
}

export function motifsIn(text: string): { surface: string; tagged: boolean }[] {
  const out = new Map<string, { surface: string; tagged: boolean }>();
  for (const m of text.matchAll(/#([A-Za-z][\w-]*)/g)) {
    const tag = m[1]?.replace(/[-_]+/g, ' ').toLowerCase();
    if (tag) out.set(normalizeName(tag), { surface: tag, tagged: true });
  }
  const untagged = text.replace(/#[A-Za-z][\w-]*/g, ' ');
  for (const word of getLexicon().motifWords) {
    const key = normalizeName(word);
    if (!out.has(key) && containsPhrase(untagged, word)) out.set(key, { surface: word, tagged: false });
  }
  return [...out.values()];
}

export class MoodboardRecognizer implements EntityRecognizer {
  readonly name = 'moodboard-rules';

  async recognize(_document: SourceDocument, segments: Segment[]): Promise<Recognition> {
    const out = emptyRecognition();
    for (const segment of segments) {
      if (segment.role !== 'region') continue;
      const caption = segment.label && segment.text.startsWith(`${segment.label}: `)
        ? segment.text.slice(segment.label.length + 2)
        : segment.text;
      const visual = segment.visual;
      const description = [caption, visual?.summary ?? ''].filter(Boolean).join('; ');

      let palette: EndpointRef | null = null;
      const captionColors = colorTermsIn(caption);
      const imageColors = visual?.colorTerms ?? [];
      if (imageColors.length > 0 || captionColors.length > 0) {
        const colors = [...new Set([...captionColors, ...imageColors])];
        const surface = segment.label ?? `${colors.slice(0, 2).join(' and ')} palette`;
        const mention: Mention = {
          type: 'color-palette',
          surface,
          segmentId: segment.id,
          confidence: imageColors.length > 0 ? CONFIDENCE.paletteFromImage : CONFIDENCE.paletteFromCaption,
        };
        if (description) mention.description = description;
        out.mentions.push(mention);
        palette = { type: 'color-palette', surface };
      }

      const moods: EndpointRef[] = [];
      for (const phrase of lightingPhrasesIn(caption)) {
        out.mentions.push({ type: 'lighting-style', surface: phrase, segmentId: segment.id, confidence: CONFIDENCE.lighting, description: caption });
        moods.push({ type: 'lighting-style', surface: phrase });
      }
      for (const term of visual?.lightingTerms ?? []) {
        if (moods.some((m) => normalizeName(m.surface) === normalizeName(term))) continue;
        const mention: Mention = { type: 'lighting-style', surface: term, segmentId: segment.id, confidence: CONFIDENCE.lightingFromImage };
        if (visual?.summary) mention.description = visual.summary;
        out.mentions.push(mention);
        moods.push({ type: 'lighting-style', surface: term });
      }
      for (const motif of motifsIn(caption)) {
        out.mentions.push({
          type: 'visual-motif',
          surface: motif.surface,
          segmentId: segment.id,
          confidence: motif.tagged ? CONFIDENCE.tag : CONFIDENCE.motif,
          description: caption,
        });
        moods.push({ type: 'visual-motif', surface: motif.surface });
      }

      if (palette) {
        for (const target of moods) {
          out.relations.push({ type: 'EVOKES_MOOD', source: palette, target, segmentId: segment.id, weight: EVOKES_WEIGHT });
        }
      } else {
        const lights = moods.filter((m) => m.type === 'lighting-style');
        for (const motif of moods.filter((m) => m.type === 'visual-motif')) {
          for (const target of lights) {
            out.relations.push({ type: 'EVOKES_MOOD', source: motif, target, segmentId: segment.id, weight: EVOKES_WEIGHT });
          }
        }
      }
    }
    return out;
  }
}
