/**
 * Query Engine: answers a question from the latest committed snapshot:
 * candidate entities, bounded traversal, citations, then composition.
 */
import { QUERY_DEFAULTS } from '../config.js';
import { InsufficientContext, ModelUnavailable } from '../errors.js';
import { logger } from '../utils/logger.js';
import { throwIfAborted } from '../utils/retry.js';
import { truncate } from '../utils/text.js';
import { TemplateComposer, type AnswerComposer, type Citation } from './composer.js';
import { findCandidates, semanticCandidates, type Candidate } from './relevance.js';
import type { EmbeddingSimilarity } from '../align/similarity.js';
import { citationOrder, traverse } from './traversal.js';
import type { GraphStore } from '../graph/store.js';
import type { Entity, Relation } from '../types.js';

const log = logger.child('Query');

export interface QueryOptions {
  hops?: number;
  signal?: AbortSignal;
}

export interface QueryEngineOptions {
  composer?: AnswerComposer;
  minRelevance?: number;
  minWeight?: number;
  maxHops?: number;
  maxCitations?: number;
  /** embedding lookup tried when no entity matches the question lexically */
  semantic?: EmbeddingSimilarity;
}

export interface QueryAnswer {
  answer: string;
  citations: Citation[];
  entities: (Entity & { hop: number })[];
  relations: Relation[];
  graphVersion: number;
  degraded: boolean;
}

export class QueryEngine {
  private readonly composer: AnswerComposer;
  private readonly minRelevance: number;
  private readonly minWeight: number;
  private readonly maxHops: number;
  private readonly maxCitations: number;
  private readonly semantic: EmbeddingSimilarity | undefined;

  constructor(private readonly store: GraphStore, opts: QueryEngineOptions = {}) {
    this.composer = opts.composer ?? new TemplateComposer();
    this.minRelevance = opts.minRelevance ?? QUERY_DEFAULTS.minRelevance;
    this.minWeight = opts.minWeight ?? QUERY_DEFAULTS.minWeight;
    this.maxHops = opts.maxHops ?? QUERY_DEFAULTS.maxHops;
    this.maxCitations = opts.maxCitations ?? QUERY_DEFAULTS.maxCitations;
    this.semantic = opts.semantic;
  }

  private async candidates(entities: Entity[], question: string, signal?: AbortSignal): Promise<Candidate[]> {
    const lexical = findCandidates(entities, question, this.minRelevance);
    if (lexical.length > 0 || !this.semantic) return lexical;
    try {
      return await semanticCandidates(entities, question, this.semantic, this.minRelevance, signal);
    } catch (err) {
      if (!(err instanceof ModelUnavailable)) throw err;
      log.warn('semantic lookup unavailable', { error: err.message });
      return [];
    }
  }

  async query(question: string, opts: QueryOptions = {}): Promise<QueryAnswer> {
    const { graph, documents, segments } = this.store.snapshot();
    const trimmed = question.trim();
    if (!trimmed) throw new InsufficientContext(question, 'the question is empty');
    if (graph.entityCount === 0) throw new InsufficientContext(question, 'the graph is empty; ingest documents first');

    const candidates = await this.candidates(graph.entities(), trimmed, opts.signal);
    if (candidates.length === 0) {
      throw new InsufficientContext(question, 'no entity in the graph matches the question');
    }
    throwIfAborted(opts.signal, 'query');

    const hops = Math.max(0, opts.hops ?? this.maxHops);
    const subgraph = traverse(graph, candidates.map((c) => c.entity.id), { maxHops: hops, minWeight: this.minWeight });

    const citations: Citation[] = [];
    for (const { segmentId, hop } of citationOrder(subgraph, this.maxCitations)) {
      const segment = segments.get(segmentId);
      if (!segment) continue;
      citations.push({
        segmentId,
        documentId: segment.documentId,
        documentTitle: documents.get(segment.documentId)?.title ?? segment.documentId,
        hop,
        page: segment.page,
        text: truncate(segment.text, 500),
      });
    }

    const composition = await this.composer.compose(
      { question: trimmed, entities: subgraph.entities, relations: subgraph.relations, citations },
      opts.signal,
    );
    log.info('answered', {
      candidates: candidates.length,
      entities: subgraph.entities.length,
      relations: subgraph.relations.length,
      citations: citations.length,
      version: graph.version,
      degraded: composition.degraded,
    });
    return {
      answer: composition.answer,
      citations,
      entities: subgraph.entities.map((r) => ({ ...r.entity, hop: r.hop })),
      relations: subgraph.relations.map((r) => r.relation),
      graphVersion: graph.version,
      degraded: composition.degraded,
    };
  }
}
