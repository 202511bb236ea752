/**
 * Model-backed recognizer. Sends segments in small batches and asks for a JSON
 * list of entities and relations; replies are validated before use and an
 * unusable batch only produces a warning. Entity types foreign to the document
 * kind, and relations whose endpoints do not fit the relation, are dropped.
 */
import { z } from 'zod';
import { extractJson, type LanguageModel } from '../ai/model.js';
import { ModelUnavailable } from '../errors.js';
import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/retry.js';
import { truncate } from '../utils/text.js';
import { emptyRecognition, type EntityRecognizer, type Recognition, type RelationMention } from './recognizer.js';
import {
  ENTITY_TYPES, NARRATIVE_TYPES, VISUAL_TYPES,
  type DocumentKind, type EntityType, type Segment, type SourceDocument,
} from '../types.js';

const BATCH_SIZE = 20;

const ReplySchema = z.object({
  entities: z.array(z.object({
    type:        z.enum(ENTITY_TYPES),
    name:        z.string().min(1),
    segment:     z.number().int().nonnegative(),
    confidence:  z.number().min(0).max(1).default(0.6),
    description: z.string().optional(),
  })).default([]),
  relations: z.array(z.object({
    type:       z.enum(['APPEARS_IN', 'LOCATED_AT', 'SPEAKS_WITH', 'EVOKES_MOOD']),
    sourceType: z.enum(ENTITY_TYPES),
    source:     z.string().min(1),
    targetType: z.enum(ENTITY_TYPES),
    target:     z.string().min(1),
    segment:    z.number().int().nonnegative(),
    weight:     z.number().min(0).max(1).default(0.6),
  })).default([]),
});

const TYPES_BY_KIND: Record<DocumentKind, readonly EntityType[]> = {
  screenplay: NARRATIVE_TYPES,
  moodboard:  VISUAL_TYPES,
};

const RELATIONS_BY_KIND: Record<DocumentKind, string> = {
  screenplay: 'APPEARS_IN (character -> scene), LOCATED_AT (scene -> location), SPEAKS_WITH (character -> character)',
  moodboard:  `EVOKES_MOOD (one of ${VISUAL_TYPES.join(', ')} -> another)`,
};

/** Whether a relation's endpoint types fit it. */
export function endpointsFit(type: RelationMention['type'], source: EntityType, target: EntityType): boolean {
  switch (type) {
    case 'APPEARS_IN':
      return source === 'character' && target === 'scene';
    case 'LOCATED_AT':
      return source === 'scene' && target === 'location';
    case 'SPEAKS_WITH':
      return source === 'character' && target === 'character';
    case 'EVOKES_MOOD':
      return VISUAL_TYPES.includes(source) && VISUAL_TYPES.includes(target) && source !== target;
  }
}

function buildPrompt(document: SourceDocument, batch: Segment[]): string {
  const lines = batch.map((s) => `[${s.ordinal}] (${s.role}) ${truncate(s.text, 500)}` +
    (s.visual ? ` {visual: ${s.visual.summary}}` : ''));
  return (
    `You extract a knowledge graph from a ${document.kind === 'screenplay' ? 'screenplay' : 'film mood board'} ` +
    `titled "${document.title}".\n\n` +
    `Entity types: ${TYPES_BY_KIND[document.kind].join(', ')}.\n` +
    `Relation types: ${RELATIONS_BY_KIND[document.kind]}.\n` +
    `Only report what the numbered segments state. Reference segments by their number.\n\n` +
    `SEGMENTS:\n${lines.join('\n')}\n\n` +
    `Respond with this exact JSON format (no markdown):\n` +
    `{ "entities": [{ "type": "...", "name": "...", "segment": 0, "confidence": 0.0, "description": "..." }],\n` +
    `  "relations": [{ "type": "...", "sourceType": "...", "source": "...", "targetType": "...", "target": "...", "segment": 0, "weight": 0.0 }] }`
  );
}

export class ModelRecognizer implements EntityRecognizer {
  readonly name = 'model';

  constructor(private readonly model: LanguageModel) {}

  async recognize(document: SourceDocument, segments: Segment[], signal?: AbortSignal): Promise<Recognition> {
    const out = emptyRecognition();
    const allowed = TYPES_BY_KIND[document.kind];
    let dropped = 0;
    for (let i = 0; i < segments.length; i += BATCH_SIZE) {
      throwIfAborted(signal, 'model extraction');
      const batch = segments.slice(i, i + BATCH_SIZE);
      const byOrdinal = new Map(batch.map((s) => [s.ordinal, s.id]));

      let reply: string;
      try {
        reply = await this.model.generate({ prompt: buildPrompt(document, batch), maxTokens: 1500, signal });
      } catch (err) {
        if (err instanceof ModelUnavailable) {
          out.warnings.push(`model extraction skipped: ${err.message}`);
          return out;
        }
        throw err;
      }

      let parsed: z.infer<typeof ReplySchema>;
      try {
        parsed = ReplySchema.parse(extractJson(reply));
      } catch (err) {
        logger.warn('Extractor: unusable model reply', { documentId: document.id, batchStart: i, error: String(err) });
        out.warnings.push(`model reply for segments ${i}-${i + batch.length - 1} could not be parsed`);
        continue;
      }

      for (const e of parsed.entities) {
        const segmentId = byOrdinal.get(e.segment);
        if (!segmentId) continue;
        if (!allowed.includes(e.type)) {
          dropped++;
          continue;
        }
        out.mentions.push({
          type: e.type, surface: e.name, segmentId, confidence: e.confidence,
          ...(e.description ? { description: e.description } : {}),
        });
      }
      for (const r of parsed.relations) {
        const segmentId = byOrdinal.get(r.segment);
        if (!segmentId) continue;
        if (!allowed.includes(r.sourceType) || !allowed.includes(r.targetType) || !endpointsFit(r.type, r.sourceType, r.targetType)) {
          dropped++;
          continue;
        }
        out.relations.push({
          type: r.type,
          source: { type: r.sourceType, surface: r.source },
          target: { type: r.targetType, surface: r.target },
          segmentId,
          weight: r.weight,
        });
      }
    }
    if (dropped > 0) out.warnings.push(`model reported ${dropped} entities or relations that do not fit a ${document.kind}; dropped`);
    return out;
  }
}
