import { describe, it, expect } from 'vitest';
import { LOOK_BOOK, WAREHOUSE_SCRIPT, offlineService } from '../__fixtures__/film.js';
import { MemoryPersistence } from '../db/persistence.js';
import { ModelUnavailable } from '../errors.js';
import { GraphBuilder } from '../graph/builder.js';
import { GraphStore } from '../graph/store.js';
import type { CandidateEntity, DocumentKind, Entity, EntityType, SourceDocument } from '../types.js';
import { Aligner } from './aligner.js';
import { LexicalSimilarity, type SimilarityFunction } from './similarity.js';

/** Scores the warehouse scene against the blue palette high, everything else low. */
const warehouseStub: SimilarityFunction = {
  name: 'stub',
  async score(a: Entity, b: Entity) {
    return a.canonicalName === 'INT. WAREHOUSE - NIGHT' && b.canonicalName === 'cold-blue-palette' ? 0.8 : 0.1;
  },
};

const always: SimilarityFunction = { name: 'always', score: async () => 0.9 };

const doc = (id: string, kind: DocumentKind): SourceDocument => ({
  id, kind, title: id, contentHash: id, byteLength: 1, ingestedAt: '2024-01-01T00:00:00.000Z',
});

interface Seed {
  document: SourceDocument;
  entities: [EntityType, string][];
}

/** Integrates one batch per document, each entity supported by the document's first segment. */
async function seededStore(seeds: Seed[]): Promise<GraphStore> {
  const store = await GraphStore.open(new MemoryPersistence());
  const builder = new GraphBuilder();
  await store.mutate('seed', (state) => {
    let data = state.graph.toData();
    for (const { document, entities } of seeds) {
      const candidates = entities.map(([type, name]): CandidateEntity => ({
        localId: `${document.id}/${type}/${name}`, documentId: document.id, type, name, aliases: [], descriptions: [],
        support: [`${document.id}:00000`], confidence: 0.9,
      }));
      data = builder.integrate(data, { documentId: document.id, entities: candidates, relations: [] }).data;
    }
    return { graph: data, documents: seeds.map((s) => s.document), result: undefined };
  });
  return store;
}

async function filmStore(): Promise<GraphStore> {
  const service = await offlineService();
  await service.ingest({ kind: 'screenplay', content: WAREHOUSE_SCRIPT });
  await service.ingest({ kind: 'moodboard', content: LOOK_BOOK });
  return service.graphStore;
}

describe('Aligner', () => {
  it('links the scene to the palette and nothing else', async () => {
    const store = await filmStore();
    expect(store.graph.version).toBe(2);
    const report = await new Aligner(store, { similarity: warehouseStub, threshold: 0.6 }).align();

    // 6 narrative x 2 visual entities, all from different documents
    expect(report.pairsScored).toBe(12);
    expect(report.excludedSameDocument).toBe(0);
    expect(report.aligned).toEqual([{ source: 'ent_000005', target: 'ent_000006', score: 0.8 }]);
    expect([report.added, report.removed, report.updated]).toEqual([1, 0, 0]);
    expect(report.degraded).toBe(false);
    expect(report.graphVersion).toBe(3);

    const edges = store.graph.relations().filter((r) => r.type === 'ALIGNED_WITH');
    expect(edges.map((r) => [r.source, r.target, r.weight])).toEqual([['ent_000005', 'ent_000006', 0.8]]);
  });

  it('leaves the version alone when re-run on an unchanged graph', async () => {
    const store = await filmStore();
    const aligner = new Aligner(store, { similarity: warehouseStub, threshold: 0.6 });
    await aligner.align();
    const again = await aligner.align();
    expect([again.added, again.removed, again.updated]).toEqual([0, 0, 0]);
    expect(again.graphVersion).toBe(3);
    expect(store.graph.version).toBe(3);
  });

  it('removes edges that no longer pass', async () => {
    const store = await filmStore();
    await new Aligner(store, { similarity: warehouseStub, threshold: 0.6 }).align();
    const stricter = await new Aligner(store, { similarity: warehouseStub, threshold: 0.9 }).align();
    expect(stricter.removed).toBe(1);
    expect(stricter.aligned).toEqual([]);
    expect(store.graph.relations().some((r) => r.type === 'ALIGNED_WITH')).toBe(false);
    expect(store.graph.version).toBe(4);
  });

  it('falls back when the similarity model is unavailable', async () => {
    const store = await filmStore();
    const down: SimilarityFunction = {
      name: 'embedding',
      async score() {
        throw new ModelUnavailable('test', 'offline');
      },
    };
    const report = await new Aligner(store, { similarity: down, fallback: warehouseStub, threshold: 0.6 }).align();
    expect(report.degraded).toBe(true);
    expect(report.aligned).toHaveLength(1);
  });

  it('never aligns entities of the same document', async () => {
    // night-palette is grounded in the screenplay too, next to the scene
    const store = await seededStore([
      { document: doc('doc_s', 'screenplay'), entities: [['scene', 'INT. ROOF - NIGHT'], ['color-palette', 'night-palette']] },
      { document: doc('doc_m', 'moodboard'), entities: [['color-palette', 'night-palette'], ['color-palette', 'storm-palette']] },
    ]);
    const report = await new Aligner(store, { similarity: always, threshold: 0.6 }).align();
    expect(report.excludedSameDocument).toBe(1);
    expect(report.pairsScored).toBe(1);
    // ids: night-palette ent_000000, scene ent_000001, storm-palette ent_000002
    expect(report.aligned).toEqual([{ source: 'ent_000001', target: 'ent_000002', score: 0.9 }]);
  });

  it('draws narrative entities from screenplays and visual ones from mood boards', async () => {
    const store = await seededStore([
      { document: doc('doc_s', 'screenplay'), entities: [['character', 'ADA'], ['color-palette', 'script-palette']] },
      { document: doc('doc_m', 'moodboard'), entities: [['lighting-style', 'low-key'], ['scene', 'INT. ROOF - NIGHT']] },
    ]);
    const report = await new Aligner(store, { similarity: always, threshold: 0.6 }).align();
    // ids: ADA ent_000000, script-palette ent_000001, low-key ent_000002, scene ent_000003
    expect(report.pairsScored).toBe(1);
    expect(report.excludedSameDocument).toBe(0);
    expect(report.aligned).toEqual([{ source: 'ent_000000', target: 'ent_000002', score: 0.9 }]);
  });
});

describe('LexicalSimilarity', () => {
  const entity = (type: EntityType, canonicalName: string): Entity => ({
    id: canonicalName, type, canonicalName, aliases: [], descriptions: [], support: ['d:00000'], documents: ['d'], createdSeq: 0,
  });

  it('expands scene words into mood terms', async () => {
    // {ext, roof, night, dark, low, key, moonlight, shadow} against {low, key}
    const score = await new LexicalSimilarity().score(entity('scene', 'EXT. ROOF - NIGHT'), entity('lighting-style', 'low-key'));
    expect(score).toBe(0.25);
  });

  it('scores unrelated names at zero', async () => {
    const score = await new LexicalSimilarity().score(entity('character', 'ADA'), entity('color-palette', 'vivid red'));
    expect(score).toBe(0);
  });
});
