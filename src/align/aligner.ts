/**
 * Cross-Modal Aligner: scores every (narrative, visual) entity pair from
 * different documents and writes ALIGNED_WITH edges for the pairs that pass.
 * The narrative side is drawn from screenplays and the visual side from mood
 * boards; an entity's type alone does not place it.
 *
 * Scoring runs in parallel against one snapshot; the write is a single store
 * mutation that replaces the full ALIGNED_WITH edge set, so re-running on an
 * unchanged graph leaves the version as it was.
 */
import { ALIGNMENT } from '../config.js';
import { ModelUnavailable, describeError } from '../errors.js';
import { GraphDraft } from '../graph/builder.js';
import { logger } from '../utils/logger.js';
import { mapPool } from '../utils/pool.js';
import { withTimeout } from '../utils/retry.js';
import { round, uniqueSorted } from '../utils/text.js';
import { LexicalSimilarity, type SimilarityFunction } from './similarity.js';
import type { GraphStore } from '../graph/store.js';
import {
  NARRATIVE_TYPES, VISUAL_TYPES, relationKey, type DocumentKind, type Entity, type Relation,
} from '../types.js';

const log = logger.child('Aligner');

export interface AlignerOptions {
  similarity?: SimilarityFunction;
  /** used pair by pair when `similarity` reports the model unavailable */
  fallback?: SimilarityFunction;
  threshold?: number;
  concurrency?: number;
  timeoutMs?: number;
}

export interface AlignmentPair {
  source: string;
  target: string;
  score: number;
}

export interface AlignmentReport {
  similarity: string;
  pairsScored: number;
  excludedSameDocument: number;
  aligned: AlignmentPair[];
  added: number;
  removed: number;
  updated: number;
  degraded: boolean;
  graphVersion: number;
}

function sharesDocument(a: Entity, b: Entity): boolean {
  const docs = new Set(a.documents);
  return b.documents.some((d) => docs.has(d));
}

function groundedIn(entity: Entity, kinds: Map<string, DocumentKind>, kind: DocumentKind): boolean {
  return entity.documents.some((d) => kinds.get(d) === kind);
}

export class Aligner {
  private readonly similarity: SimilarityFunction;
  private readonly fallback: SimilarityFunction;
  private readonly threshold: number;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  constructor(private readonly store: GraphStore, opts: AlignerOptions = {}) {
    this.similarity = opts.similarity ?? new LexicalSimilarity();
    this.fallback = opts.fallback ?? new LexicalSimilarity();
    this.threshold = opts.threshold ?? ALIGNMENT.threshold;
    this.concurrency = opts.concurrency ?? ALIGNMENT.concurrency;
    this.timeoutMs = opts.timeoutMs ?? ALIGNMENT.timeoutMs;
  }

  align(signal?: AbortSignal): Promise<AlignmentReport> {
    return withTimeout((s) => this.run(s), this.timeoutMs, 'alignment', signal);
  }

  private async run(signal: AbortSignal): Promise<AlignmentReport> {
    const graph = this.store.graph;
    const kinds = new Map(this.store.documents().map((d) => [d.id, d.kind]));
    const left = graph.entities()
      .filter((e) => NARRATIVE_TYPES.includes(e.type) && groundedIn(e, kinds, 'screenplay'));
    const right = graph.entities()
      .filter((e) => VISUAL_TYPES.includes(e.type) && groundedIn(e, kinds, 'moodboard'));

    const pairs: [Entity, Entity][] = [];
    let excludedSameDocument = 0;
    for (const a of left) {
      for (const b of right) {
        if (sharesDocument(a, b)) excludedSameDocument++;
        else pairs.push([a, b]);
      }
    }
    log.info('scoring pairs', { pairs: pairs.length, excludedSameDocument, similarity: this.similarity.name });

    let degraded = false;
    const scores = await mapPool(pairs, this.concurrency, async ([a, b]) => {
      try {
        return await this.similarity.score(a, b, signal);
      } catch (err) {
        if (!(err instanceof ModelUnavailable)) throw err;
        if (!degraded) log.warn('similarity model unavailable; using fallback', { error: describeError(err) });
        degraded = true;
        return this.fallback.score(a, b, signal);
      }
    }, signal);

    const passing: AlignmentPair[] = [];
    pairs.forEach(([a, b], i) => {
      const score = round(scores[i] ?? 0);
      if (score >= this.threshold) passing.push({ source: a.id, target: b.id, score });
    });

    return this.store.mutate('align', (state) => {
      const draft = new GraphDraft(state.graph.toData());
      const wanted = new Map<string, Relation>();
      for (const p of passing) {
        const source = draft.resolveId(p.source);
        const target = draft.resolveId(p.target);
        const a = source ? draft.entities.get(source) : undefined;
        const b = target ? draft.entities.get(target) : undefined;
        // Merges since scoring can pull both ends into one document.
        if (!a || !b || sharesDocument(a, b)) continue;
        const relation: Relation = {
          source: a.id, target: b.id, type: 'ALIGNED_WITH', weight: p.score,
          support: uniqueSorted([...a.support, ...b.support]),
        };
        wanted.set(relationKey(relation), relation);
      }

      let added = 0;
      let removed = 0;
      let updated = 0;
      for (const [key, r] of [...draft.relations]) {
        if (r.type === 'ALIGNED_WITH' && !wanted.has(key)) {
          draft.deleteRelation(key);
          removed++;
        }
      }
      for (const [key, r] of wanted) {
        const existing = draft.relations.get(key);
        if (!existing) added++;
        else if (existing.weight !== r.weight || existing.support.join() !== r.support.join()) updated++;
        draft.putRelation(r);
      }

      const data = draft.toData();
      const report: AlignmentReport = {
        similarity: this.similarity.name,
        pairsScored: pairs.length,
        excludedSameDocument,
        aligned: [...wanted.values()].map((r) => ({ source: r.source, target: r.target, score: r.weight })),
        added,
        removed,
        updated,
        degraded,
        graphVersion: data.version,
      };
      log.info('alignment committed', { added, removed, updated, version: data.version, degraded });
      return { graph: data, result: report };
    });
  }
}
