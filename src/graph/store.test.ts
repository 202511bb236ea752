import { describe, it, expect } from 'vitest';
import { MemoryPersistence, type GraphPersistence } from '../db/persistence.js';
import { SqlitePersistence } from '../db/sqlite.js';
import { segmentId, type PersistedState, type Segment, type SourceDocument } from '../types.js';
import { GraphBuilder } from './builder.js';
import { GraphStore } from './store.js';

const builder = new GraphBuilder();

function document(id: string): SourceDocument {
  return { id, kind: 'screenplay', title: id, contentHash: 'h', byteLength: 3, ingestedAt: '2026-01-01T00:00:00.000Z' };
}

function segment(documentId: string, ordinal: number): Segment {
  return {
    id: segmentId(documentId, ordinal), documentId, ordinal, modality: 'text', role: 'action',
    text: `line ${ordinal}`, label: null, visual: null, span: { start: ordinal, end: ordinal + 1 }, page: null,
  };
}

/** Adds one character named after the document. */
function addDocument(store: GraphStore, id: string) {
  return store.mutate(`ingest ${id}`, (state) => {
    const seg = segment(id, 0);
    const integration = builder.integrate(state.graph.toData(), {
      documentId: id,
      entities: [{
        localId: `${id}/character/${id}`, documentId: id, type: 'character', name: id.toUpperCase(),
        aliases: [], descriptions: [], support: [seg.id], confidence: 0.9,
      }],
      relations: [],
    });
    return { graph: integration.data, documents: [document(id)], segments: [seg], result: integration.data.version };
  });
}

class FlakyPersistence implements GraphPersistence {
  readonly name = 'flaky';
  attempts = 0;
  saved: PersistedState | null = null;

  constructor(private failures: number) {}

  async load(): Promise<PersistedState | null> {
    return null;
  }

  async save(state: PersistedState): Promise<void> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('disk busy');
    }
    this.saved = state;
  }
}

describe('GraphStore', () => {
  it('serializes concurrent mutations', async () => {
    const store = await GraphStore.open(new MemoryPersistence());
    const versions = await Promise.all(['doc_a', 'doc_b', 'doc_c'].map((id) => addDocument(store, id)));
    expect(versions).toEqual([1, 2, 3]);
    expect(store.graph.entityCount).toBe(3);
    expect(store.documents().map((d) => d.id)).toEqual(['doc_a', 'doc_b', 'doc_c']);
  });

  it('does not flush a mutation that changes nothing', async () => {
    const persistence = new MemoryPersistence();
    const store = await GraphStore.open(persistence);
    await addDocument(store, 'doc_a');
    await addDocument(store, 'doc_a');
    expect(persistence.saves).toBe(1);
    expect(store.graph.version).toBe(1);
  });

  it('retries a failing flush', async () => {
    const persistence = new FlakyPersistence(2);
    const store = await GraphStore.open(persistence, { maxAttempts: 3, retryDelayMs: 1 });
    await addDocument(store, 'doc_a');
    expect(persistence.attempts).toBe(3);
    expect(persistence.saved?.graph.version).toBe(1);
    expect(store.graph.version).toBe(1);
  });

  it('keeps the committed state when the flush gives up', async () => {
    const store = await GraphStore.open(new FlakyPersistence(5), { maxAttempts: 2, retryDelayMs: 1 });
    await expect(addDocument(store, 'doc_a')).rejects.toThrow('disk busy');
    expect(store.graph.version).toBe(0);
    expect(store.documents()).toEqual([]);
    expect(store.segment(segmentId('doc_a', 0))).toBeUndefined();
  });

  it('reopens from what was persisted', async () => {
    const persistence = new MemoryPersistence();
    const store = await GraphStore.open(persistence);
    await addDocument(store, 'doc_a');
    const reopened = await GraphStore.open(persistence);
    expect(reopened.graph.toData()).toEqual(store.graph.toData());
    expect(reopened.segmentsOf('doc_a').map((s) => s.id)).toEqual(['doc_a:00000']);
  });
});

describe('SqlitePersistence', () => {
  it('round-trips the persisted state', async () => {
    const persistence = new SqlitePersistence(':memory:');
    expect(await persistence.load()).toBeNull();
    const store = await GraphStore.open(persistence);
    await addDocument(store, 'doc_a');
    await addDocument(store, 'doc_b');
    const loaded = await persistence.load();
    expect(loaded?.graph).toEqual(store.graph.toData());
    expect(loaded?.documents.map((d) => d.id)).toEqual(['doc_a', 'doc_b']);
    expect(loaded?.segments.map((s) => s.id)).toEqual(['doc_a:00000', 'doc_b:00000']);
    await store.close();
  });
});
