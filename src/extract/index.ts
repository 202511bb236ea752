/**
 * Entity Extractor: turns one document's segments into a candidate batch.
 *
 * Mentions of the same (type, normalized surface) are pre-merged here, with
 * support unioned over every mentioning segment and confidence combined as
 * 1 - Π(1 - c). Candidates under the threshold are discarded and reported;
 * relations touching a discarded candidate go with them.
 */
import { EXTRACTION } from '../config.js';
import { ExtractionLowConfidence } from '../errors.js';
import { logger } from '../utils/logger.js';
import { normalizeName, round, uniqueSorted } from '../utils/text.js';
import { MoodboardRecognizer } from './moodboard.js';
import { ScreenplayRecognizer } from './screenplay.js';
import type { EndpointRef, EntityRecognizer, Recognition } from './recognizer.js';
import type {
  CandidateBatch, CandidateEntity, CandidateRelation, DocumentKind, Segment, SourceDocument,
} from '../types.js';

export interface ExtractionReport {
  batch: CandidateBatch;
  discarded: ExtractionLowConfidence[];
  warnings: string[];
}

export interface ExtractorOptions {
  minConfidence?: number;
  /** extra recognizers run after the rule-based one for the document kind */
  recognizers?: Partial<Record<DocumentKind, EntityRecognizer[]>>;
}

interface Accumulator {
  type: CandidateEntity['type'];
  name: string;
  surfaces: Set<string>;
  descriptions: string[];
  support: Set<string>;
  missProbability: number;
}

const candidateKey = (ref: EndpointRef) => `${ref.type}/${normalizeName(ref.surface)}`;

export class EntityExtractor {
  private readonly minConfidence: number;
  private readonly recognizers: Record<DocumentKind, EntityRecognizer[]>;

  constructor(opts: ExtractorOptions = {}) {
    this.minConfidence = opts.minConfidence ?? EXTRACTION.minConfidence;
    this.recognizers = {
      screenplay: [new ScreenplayRecognizer(), ...(opts.recognizers?.screenplay ?? [])],
      moodboard:  [new MoodboardRecognizer(), ...(opts.recognizers?.moodboard ?? [])],
    };
  }

  async extract(document: SourceDocument, segments: Segment[], signal?: AbortSignal): Promise<ExtractionReport> {
    const own = segments.filter((s) => s.documentId === document.id);
    const recognitions: Recognition[] = [];
    for (const recognizer of this.recognizers[document.kind]) {
      recognitions.push(await recognizer.recognize(document, own, signal));
    }
    const report = this.aggregate(document.id, recognitions);
    logger.info('Extractor: candidates ready', {
      documentId: document.id,
      entities: report.batch.entities.length,
      relations: report.batch.relations.length,
      discarded: report.discarded.length,
    });
    return report;
  }

  aggregate(documentId: string, recognitions: Recognition[]): ExtractionReport {
    const acc = new Map<string, Accumulator>();
    const warnings = recognitions.flatMap((r) => r.warnings);

    for (const m of recognitions.flatMap((r) => r.mentions)) {
      const surface = m.surface.trim();
      if (!normalizeName(surface)) continue;
      const key = candidateKey({ type: m.type, surface });
      let entry = acc.get(key);
      if (!entry) {
        entry = { type: m.type, name: surface, surfaces: new Set(), descriptions: [], support: new Set(), missProbability: 1 };
        acc.set(key, entry);
      }
      entry.surfaces.add(surface);
      for (const alias of m.aliases ?? []) {
        if (normalizeName(alias)) entry.surfaces.add(alias.trim());
      }
      const description = m.description?.trim();
      if (description && !entry.descriptions.includes(description)) entry.descriptions.push(description);
      entry.support.add(m.segmentId);
      entry.missProbability *= 1 - Math.min(1, Math.max(0, m.confidence));
    }

    const kept = new Map<string, CandidateEntity>();
    const discarded: ExtractionLowConfidence[] = [];
    for (const [key, entry] of acc) {
      const confidence = round(1 - entry.missProbability);
      if (confidence < this.minConfidence) {
        discarded.push(new ExtractionLowConfidence(`${entry.type}:${entry.name}`, confidence, this.minConfidence));
        continue;
      }
      kept.set(key, {
        localId: `${documentId}/${key}`,
        documentId,
        type: entry.type,
        name: entry.name,
        aliases: uniqueSorted([...entry.surfaces].filter((s) => s !== entry.name)),
        descriptions: entry.descriptions,
        support: uniqueSorted(entry.support),
        confidence,
      });
    }

    const relations = new Map<string, CandidateRelation>();
    for (const r of recognitions.flatMap((x) => x.relations)) {
      const source = kept.get(candidateKey(r.source));
      const target = kept.get(candidateKey(r.target));
      if (!source || !target || source.localId === target.localId) continue;
      const key = `${source.localId}|${r.type}|${target.localId}`;
      const existing = relations.get(key);
      if (existing) {
        existing.weight = Math.max(existing.weight, r.weight);
        existing.support = uniqueSorted([...existing.support, r.segmentId]);
      } else {
        relations.set(key, { source: source.localId, target: target.localId, type: r.type, weight: r.weight, support: [r.segmentId] });
      }
    }

    for (const d of discarded) {
      logger.debug('Extractor: candidate discarded', { documentId, candidate: d.candidate, confidence: d.confidence });
    }

    const entities = [...kept.values()].sort((a, b) => a.localId.localeCompare(b.localId));
    const sortedRelations = [...relations.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, r]) => r);
    return { batch: { documentId, entities, relations: sortedRelations }, discarded, warnings };
  }
}

export { ScreenplayRecognizer } from './screenplay.js';
export { MoodboardRecognizer } from './moodboard.js';
export { ModelRecognizer } from './model.js';
export type { EntityRecognizer, Mention, Recognition, RelationMention } from './recognizer.js';
