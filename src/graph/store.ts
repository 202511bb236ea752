/**
 * GraphStore: the single owner of documents, segments and the graph.
 *
 * Every mutation runs under one promise-chain lock and is flushed to the
 * persistence backend before it becomes visible. Readers get the last
 * committed snapshot and never wait on writers.
 */
import { STORAGE } from '../config.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { KnowledgeGraph } from './knowledgeGraph.js';
import type { GraphPersistence } from '../db/persistence.js';
import {
  PersistedStateSchema,
  type GraphData, type PersistedState, type Segment, type SourceDocument,
} from '../types.js';

const log = logger.child('GraphStore');

export interface StoreSnapshot {
  graph: KnowledgeGraph;
  documents: ReadonlyMap<string, SourceDocument>;
  segments: ReadonlyMap<string, Segment>;
}

export interface Mutation<T> {
  graph?: GraphData;
  documents?: SourceDocument[];
  segments?: Segment[];
  result: T;
}

export interface StoreOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
}

export class GraphStore {
  private current: StoreSnapshot;
  private tail: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly persistence: GraphPersistence,
    initial: StoreSnapshot,
    private readonly opts: Required<StoreOptions>,
  ) {
    this.current = initial;
  }

  static async open(persistence: GraphPersistence, opts: StoreOptions = {}): Promise<GraphStore> {
    const loaded = await persistence.load();
    const state = loaded ? PersistedStateSchema.parse(loaded) : null;
    const snapshot: StoreSnapshot = state
      ? {
          graph: KnowledgeGraph.fromData(state.graph),
          documents: new Map(state.documents.map((d) => [d.id, d])),
          segments: new Map(state.segments.map((s) => [s.id, s])),
        }
      : { graph: KnowledgeGraph.empty(), documents: new Map(), segments: new Map() };
    log.info('opened', {
      backend: persistence.name,
      documents: snapshot.documents.size,
      entities: snapshot.graph.entityCount,
      version: snapshot.graph.version,
    });
    return new GraphStore(persistence, snapshot, {
      maxAttempts: opts.maxAttempts ?? STORAGE.maxAttempts,
      retryDelayMs: opts.retryDelayMs ?? STORAGE.retryDelayMs,
    });
  }

  /** Last committed state. */
  snapshot(): StoreSnapshot {
    return this.current;
  }

  get graph(): KnowledgeGraph {
    return this.current.graph;
  }

  documents(): SourceDocument[] {
    return [...this.current.documents.values()].sort((a, b) => a.ingestedAt.localeCompare(b.ingestedAt) || a.id.localeCompare(b.id));
  }

  segmentsOf(documentId: string): Segment[] {
    return [...this.current.segments.values()]
      .filter((s) => s.documentId === documentId)
      .sort((a, b) => a.ordinal - b.ordinal);
  }

  segment(id: string): Segment | undefined {
    return this.current.segments.get(id);
  }

  /**
   * Runs `fn` against the committed state under the write lock. Whatever it
   * returns is flushed and then published; a flush that keeps failing leaves
   * the committed state untouched.
   */
  mutate<T>(label: string, fn: (state: StoreSnapshot) => Promise<Mutation<T>> | Mutation<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const base = this.current;
      const change = await fn(base);
      const documents = new Map(base.documents);
      for (const d of change.documents ?? []) documents.set(d.id, d);
      const segments = new Map(base.segments);
      for (const s of change.segments ?? []) segments.set(s.id, s);

      const graphChanged = change.graph !== undefined && change.graph.version !== base.graph.version;
      const added = documents.size !== base.documents.size || segments.size !== base.segments.size;
      if (!graphChanged && !added) return change.result;

      const next: StoreSnapshot = {
        graph: change.graph && graphChanged ? KnowledgeGraph.fromData(change.graph) : base.graph,
        documents,
        segments,
      };
      await withRetry(() => this.persistence.save(toPersisted(next)), {
        maxAttempts: this.opts.maxAttempts,
        baseDelayMs: this.opts.retryDelayMs,
        label: `flush ${label}`,
      });
      this.current = next;
      log.debug('committed', { label, version: next.graph.version });
      return change.result;
    };
    const result = this.tail.then(run, run);
    this.tail = result.catch(() => undefined);
    return result;
  }

  async close(): Promise<void> {
    await this.tail;
    await this.persistence.close?.();
  }
}

function toPersisted(s: StoreSnapshot): PersistedState {
  return {
    documents: [...s.documents.values()].sort((a, b) => a.id.localeCompare(b.id)),
    segments: [...s.segments.values()].sort((a, b) => a.id.localeCompare(b.id)),
    graph: s.graph.toData(),
  };
}
