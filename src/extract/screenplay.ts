/**
 * Rule-based recognizer for screenplay segments.
 *
 *   scene heading  -> scene + location, LOCATED_AT
 *   character cue  -> character, APPEARS_IN the current scene
 *   action lines   -> extra support for known characters (and APPEARS_IN)
 *   dialogue       -> extra support for characters named in it
 *   shared scene   -> SPEAKS_WITH between every pair of speakers
 */
import { EXTRACTION } from '../config.js';
import { cueName, sceneHeadingParts } from '../parser/screenplay.js';
import { truncate } from '../utils/text.js';
import { emptyRecognition, type EntityRecognizer, type Mention, type Recognition } from './recognizer.js';
import type { Segment, SourceDocument } from '../types.js';

/** Per-mention confidence; the extractor combines repeated mentions. */
const CONFIDENCE = {
  sceneHeading: 0.9,
  location:     0.8,
  cue:          0.6,
  nameInText:   0.2,
} as const;

const WEIGHT = {
  speaks:       1.0,
  presentInAction: 0.7,
  locatedAt:    1.0,
  speaksWith:   0.8,
} as const;

interface OpenScene {
  mention: Mention;
  surface: string;
  action: string[];
  /** speaker name -> first cue segment in this scene */
  speakers: Map<string, string>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function displayHeading(text: string): string {
  return text.trim().replace(/^\./, '').replace(/\s+/g, ' ');
}

export class ScreenplayRecognizer implements EntityRecognizer {
  readonly name = 'screenplay-rules';

  async recognize(_document: SourceDocument, segments: Segment[]): Promise<Recognition> {
    const out = emptyRecognition();
    const characters = new Set<string>();
    for (const s of segments) {
      if (s.role !== 'character_cue') continue;
      const name = cueName(s.text);
      if (name) characters.add(name);
    }
    const namePatterns = [...characters].map((name) => ({
      name,
      pattern: new RegExp(`(^|[^A-Za-z0-9])${escapeRegExp(name)}(?![A-Za-z0-9])`, 'i'),
      intro: new RegExp(`(^|[^A-Za-z0-9])${escapeRegExp(name)}(?![A-Za-z0-9])`),
    }));
    const introduced = new Set<string>();

    let scene: OpenScene | null = null;
    const closeScene = () => {
      const open = scene;
      if (!open) return;
      scene = null;
      const description = open.action.join(' ').replace(/\s+/g, ' ').trim();
      if (description) open.mention.description = truncate(description, EXTRACTION.sceneDescriptionChars);
      const speakers = [...open.speakers.entries()].sort(([a], [b]) => a.localeCompare(b));
      for (let i = 0; i < speakers.length; i++) {
        for (let j = i + 1; j < speakers.length; j++) {
          const a = speakers[i];
          const b = speakers[j];
          if (!a || !b) continue;
          for (const segmentId of [a[1], b[1]]) {
            out.relations.push({
              type: 'SPEAKS_WITH',
              source: { type: 'character', surface: a[0] },
              target: { type: 'character', surface: b[0] },
              segmentId,
              weight: WEIGHT.speaksWith,
            });
          }
        }
      }
    };

    for (const segment of segments) {
      switch (segment.role) {
        case 'scene_heading': {
          closeScene();
          const surface = displayHeading(segment.text);
          const mention: Mention = { type: 'scene', surface, segmentId: segment.id, confidence: CONFIDENCE.sceneHeading };
          out.mentions.push(mention);
          scene = { mention, surface, action: [], speakers: new Map() };

          const { place } = sceneHeadingParts(segment.text);
          if (place) {
            out.mentions.push({ type: 'location', surface: place, segmentId: segment.id, confidence: CONFIDENCE.location });
            out.relations.push({
              type: 'LOCATED_AT',
              source: { type: 'scene', surface },
              target: { type: 'location', surface: place },
              segmentId: segment.id,
              weight: WEIGHT.locatedAt,
            });
          }
          break;
        }
        case 'character_cue': {
          const name = cueName(segment.text);
          if (!name) break;
          out.mentions.push({ type: 'character', surface: name, segmentId: segment.id, confidence: CONFIDENCE.cue });
          if (scene) {
            if (!scene.speakers.has(name)) scene.speakers.set(name, segment.id);
            out.relations.push({
              type: 'APPEARS_IN',
              source: { type: 'character', surface: name },
              target: { type: 'scene', surface: scene.surface },
              segmentId: segment.id,
              weight: WEIGHT.speaks,
            });
          }
          break;
        }
        case 'action':
        case 'dialogue':
        case 'paragraph': {
          if (segment.role === 'action' && scene) scene.action.push(segment.text);
          for (const { name, pattern, intro } of namePatterns) {
            if (!pattern.test(segment.text)) continue;
            const mention: Mention = {
              type: 'character', surface: name, segmentId: segment.id, confidence: CONFIDENCE.nameInText,
            };
            if (segment.role === 'action' && !introduced.has(name) && intro.test(segment.text)) {
              introduced.add(name);
              mention.description = truncate(segment.text.replace(/\s+/g, ' '), 200);
            }
            out.mentions.push(mention);
            if (segment.role === 'action' && scene) {
              out.relations.push({
                type: 'APPEARS_IN',
                source: { type: 'character', surface: name },
                target: { type: 'scene', surface: scene.surface },
                segmentId: segment.id,
                weight: WEIGHT.presentInAction,
              });
            }
          }
          break;
        }
        default:
          break;
      }
    }
    closeScene();
    return out;
  }
}
