import { describe, it, expect } from 'vitest';
import { LOOK_BOOK, WAREHOUSE_SCRIPT, offlineService } from '../__fixtures__/film.js';
import { MemoryPersistence } from '../db/persistence.js';
import { OperationAborted } from '../errors.js';
import { GraphStore } from '../graph/store.js';
import type { VisualAnalyzer } from '../parser/index.js';
import { documentOfSegment, type PersistedState } from '../types.js';
import { IngestionPipeline, type IngestRequest } from './ingest.js';

const SCRIPT: IngestRequest = { kind: 'screenplay', content: WAREHOUSE_SCRIPT };
const BOARD: IngestRequest = { kind: 'moodboard', content: LOOK_BOOK };

/** The graph with ids replaced by names and segment ids by (title, ordinal). */
function canonicalView(store: GraphStore) {
  const titles = new Map(store.documents().map((d) => [d.id, d.title]));
  const where = (segmentId: string) => `${titles.get(documentOfSegment(segmentId))}#${store.segment(segmentId)?.ordinal}`;
  const graph = store.graph;
  const label = new Map(graph.entities().map((e) => [e.id, `${e.type}:${e.canonicalName}`]));
  return {
    entities: graph.entities()
      .map((e) => ({ key: `${e.type}:${e.canonicalName}`, aliases: e.aliases, support: e.support.map(where).sort() }))
      .sort((a, b) => a.key.localeCompare(b.key)),
    relations: graph.relations()
      .map((r) => `${label.get(r.source)} ${r.type} ${label.get(r.target)} ${r.weight} ${r.support.map(where).sort().join(',')}`)
      .sort(),
  };
}

describe('IngestionPipeline', () => {
  it('reports what a document added', async () => {
    const service = await offlineService();
    const report = await service.ingest(SCRIPT);
    expect(report).toMatchObject({
      kind: 'screenplay',
      title: 'Cold Storage',
      segments: 12,
      candidates: 6,
      entitiesCreated: 6,
      entitiesMatched: 0,
      discarded: [],
      conflicts: [],
      warnings: [],
      graphVersion: 1,
    });
    expect(report.documentId).toMatch(/^doc_[0-9a-f]+$/);
  });

  it('prefers the given title and falls back to a generic one', async () => {
    const service = await offlineService();
    const titled = await service.ingest({ ...SCRIPT, title: '  Draft 2  ' });
    expect(titled.title).toBe('Draft 2');
    const untitled = await service.ingest({ kind: 'screenplay', content: 'INT. ROOM - DAY\n\nBOB\nHi.\n' });
    expect(untitled.title).toBe('Untitled screenplay');
  });

  it('titles a file by its title page before its file name', async () => {
    const service = await offlineService();
    const embedded = await service.ingest({ ...SCRIPT, sourceName: 'cold_storage_v3' });
    expect(embedded.title).toBe('Cold Storage');
    const named = await service.ingest({ kind: 'screenplay', sourceName: 'room', content: 'INT. ROOM - DAY\n\nBOB\nHi.\n' });
    expect(named.title).toBe('room');
  });

  it('builds the same graph concurrently as sequentially, in either order', async () => {
    const concurrent = await offlineService();
    const summary = await concurrent.ingestMany([SCRIPT, BOARD]);
    expect(summary.failed).toEqual([]);
    expect(summary.succeeded.map((r) => r.title)).toEqual(['Cold Storage', 'Look Book']);
    expect(summary.graphVersion).toBe(2);

    const forward = await offlineService();
    await forward.ingest(SCRIPT);
    await forward.ingest(BOARD);
    const backward = await offlineService();
    await backward.ingest(BOARD);
    await backward.ingest(SCRIPT);

    const expected = canonicalView(forward.graphStore);
    expect(expected.entities).toHaveLength(8);
    expect(canonicalView(concurrent.graphStore)).toEqual(expected);
    expect(canonicalView(backward.graphStore)).toEqual(expected);
  });

  it('treats re-ingested content as a new document that matches existing entities', async () => {
    const service = await offlineService();
    await service.ingest(SCRIPT);
    const again = await service.ingest(SCRIPT);
    expect(again.entitiesCreated).toBe(0);
    expect(again.entitiesMatched).toBe(6);
    expect(service.status().documents).toHaveLength(2);
    const ada = service.graphStore.graph.entities('character').find((e) => e.canonicalName === 'ADA');
    expect(ada?.documents).toHaveLength(2);
    expect(ada?.support).toHaveLength(6);
  });

  it('keeps a failing document from affecting the rest of the batch', async () => {
    const service = await offlineService();
    const summary = await service.ingestMany([SCRIPT, { kind: 'moodboard', title: 'Broken', content: 'not json' }]);
    expect(summary.succeeded.map((r) => r.title)).toEqual(['Cold Storage']);
    expect(summary.failed).toHaveLength(1);
    expect(summary.failed[0]).toMatchObject({ index: 1, kind: 'moodboard', title: 'Broken', code: 'UNREADABLE_DOCUMENT' });
    expect(service.status().documents.map((d) => d.title)).toEqual(['Cold Storage']);
  });

  it('aborts a document that runs past its timeout and leaves the store untouched', async () => {
    const store = await GraphStore.open(new MemoryPersistence());
    const hanging: VisualAnalyzer = { describe: () => new Promise(() => undefined) };
    const pipeline = new IngestionPipeline(store, { analyzer: hanging, timeoutMs: 20 });
    const board = JSON.stringify({ pages: [{ regions: [{ image: { ref: 'a.jpg' } }] }] });

    const err = await pipeline.ingest({ kind: 'moodboard', content: board }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OperationAborted);
    expect(store.graph.version).toBe(0);
    expect(store.documents()).toEqual([]);
  });

  it('never reports a timeout for a document whose flush outlasts the deadline', async () => {
    class SlowPersistence extends MemoryPersistence {
      override async save(state: PersistedState): Promise<void> {
        await new Promise((resolve) => setTimeout(resolve, 250));
        await super.save(state);
      }
    }
    const persistence = new SlowPersistence();
    const store = await GraphStore.open(persistence);
    const pipeline = new IngestionPipeline(store, { timeoutMs: 100 });

    const report = await pipeline.ingest(SCRIPT);
    expect(report.graphVersion).toBe(1);
    expect(store.graph.version).toBe(1);
    expect(store.documents().map((d) => d.id)).toEqual([report.documentId]);
    expect(persistence.saves).toBe(1);
  });

  it('honours a caller abort', async () => {
    const service = await offlineService();
    const controller = new AbortController();
    controller.abort();
    const summary = await service.ingestMany([SCRIPT], controller.signal);
    expect(summary.failed.map((f) => f.code)).toEqual(['OPERATION_ABORTED']);
  });
});
