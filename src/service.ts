/**
 * FusionService: the public surface: ingest documents, align modalities,
 * ask questions, inspect the store. Wires the components from configuration;
 * every collaborator can be swapped through the options.
 */
import { EXTRACTION, QUERY_DEFAULTS } from './config.js';
import { createModels, type ModelSet } from './ai/index.js';
import { NoModel } from './ai/model.js';
import { Aligner, type AlignmentReport } from './align/aligner.js';
import { EmbeddingSimilarity, LexicalSimilarity, type SimilarityFunction } from './align/similarity.js';
import { createPersistence, type GraphPersistence } from './db/index.js';
import { EntityExtractor, ModelRecognizer } from './extract/index.js';
import { GraphStore } from './graph/store.js';
import { ModelVisualAnalyzer, PaletteVisualAnalyzer } from './parser/index.js';
import { IngestionPipeline, type BatchSummary, type IngestReport, type IngestRequest } from './pipeline/ingest.js';
import { ModelComposer, TemplateComposer } from './query/composer.js';
import { QueryEngine, type QueryAnswer, type QueryOptions } from './query/engine.js';
import { logger } from './utils/logger.js';
import type { EntityType, RelationType, SourceDocument } from './types.js';

export interface FusionServiceOptions {
  persistence?: GraphPersistence;
  models?: Partial<ModelSet>;
  similarity?: SimilarityFunction;
  alignThreshold?: number;
  /** document-id entropy, for reproducible runs */
  nonce?: () => string;
  clock?: () => Date;
}

export interface StoreStatus {
  backend: string;
  graphVersion: number;
  documents: (SourceDocument & { segments: number })[];
  entities: Partial<Record<EntityType, number>>;
  relations: Partial<Record<RelationType, number>>;
}

function isConfigured(model: { name: string }): boolean {
  return model.name !== 'none';
}

export class FusionService {
  private constructor(
    private readonly store: GraphStore,
    private readonly backend: string,
    private readonly pipeline: IngestionPipeline,
    private readonly aligner: Aligner,
    private readonly engine: QueryEngine,
  ) {}

  static async create(opts: FusionServiceOptions = {}): Promise<FusionService> {
    const persistence = opts.persistence ?? createPersistence();
    const configured = opts.models ? null : createModels();
    const models: ModelSet = {
      generation: opts.models?.generation ?? configured?.generation ?? new NoModel(),
      embedding:  opts.models?.embedding ?? configured?.embedding ?? new NoModel(),
      vision:     opts.models?.vision ?? configured?.vision ?? new NoModel(),
    };
    const store = await GraphStore.open(persistence);

    const extractor = new EntityExtractor(EXTRACTION.withModel && isConfigured(models.generation)
      ? { recognizers: { screenplay: [new ModelRecognizer(models.generation)], moodboard: [new ModelRecognizer(models.generation)] } }
      : {});
    const analyzer = isConfigured(models.vision) ? new ModelVisualAnalyzer(models.vision) : new PaletteVisualAnalyzer();
    const pipeline = new IngestionPipeline(store, { extractor, analyzer, nonce: opts.nonce, clock: opts.clock });

    const embeddings = isConfigured(models.embedding) ? new EmbeddingSimilarity(models.embedding) : undefined;
    const aligner = new Aligner(store, {
      similarity: opts.similarity ?? embeddings ?? new LexicalSimilarity(),
      threshold: opts.alignThreshold,
    });
    const engine = new QueryEngine(store, {
      composer: QUERY_DEFAULTS.composeWithModel && isConfigured(models.generation)
        ? new ModelComposer(models.generation)
        : new TemplateComposer(),
      semantic: embeddings,
    });
    logger.info('FusionService ready', {
      backend: persistence.name,
      generation: models.generation.name,
      embedding: models.embedding.name,
      vision: models.vision.name,
    });
    return new FusionService(store, persistence.name, pipeline, aligner, engine);
  }

  ingest(request: IngestRequest, signal?: AbortSignal): Promise<IngestReport> {
    return this.pipeline.ingest(request, signal);
  }

  ingestMany(requests: readonly IngestRequest[], signal?: AbortSignal): Promise<BatchSummary> {
    return this.pipeline.ingestMany(requests, signal);
  }

  align(signal?: AbortSignal): Promise<AlignmentReport> {
    return this.aligner.align(signal);
  }

  query(question: string, opts: QueryOptions = {}): Promise<QueryAnswer> {
    return this.engine.query(question, opts);
  }

  status(): StoreStatus {
    const graph = this.store.graph;
    const entities: Partial<Record<EntityType, number>> = {};
    for (const e of graph.entities()) entities[e.type] = (entities[e.type] ?? 0) + 1;
    const relations: Partial<Record<RelationType, number>> = {};
    for (const r of graph.relations()) relations[r.type] = (relations[r.type] ?? 0) + 1;
    return {
      backend: this.backend,
      graphVersion: graph.version,
      documents: this.store.documents().map((d) => ({ ...d, segments: this.store.segmentsOf(d.id).length })),
      entities,
      relations,
    };
  }

  /** Read access for callers that need the raw snapshot (tests, exports). */
  get graphStore(): GraphStore {
    return this.store;
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

export type { IngestRequest, IngestReport, BatchSummary } from './pipeline/ingest.js';
export type { AlignmentReport } from './align/aligner.js';
export type { QueryAnswer } from './query/engine.js';
export * from './errors.js';
