import { describe, it, expect } from 'vitest';
import { LOOK_BOOK, WAREHOUSE_SCRIPT, offlineService } from './__fixtures__/film.js';
import type { SimilarityFunction } from './align/similarity.js';
import type { Entity } from './types.js';

/** Scores the warehouse scene against the blue palette high, everything else low. */
const warehouseStub: SimilarityFunction = {
  name: 'stub',
  async score(a: Entity, b: Entity) {
    return a.canonicalName === 'INT. WAREHOUSE - NIGHT' && b.canonicalName === 'cold-blue-palette' ? 0.8 : 0.1;
  },
};

async function alignedFilm() {
  const service = await offlineService({ similarity: warehouseStub, alignThreshold: 0.6 });
  await service.ingest({ kind: 'screenplay', content: WAREHOUSE_SCRIPT });
  await service.ingest({ kind: 'moodboard', content: LOOK_BOOK });
  const alignment = await service.align();
  return { service, alignment };
}

const ordinal = (segmentId: string) => Number(segmentId.slice(segmentId.lastIndexOf(':') + 1));

describe('FusionService.status', () => {
  it('counts documents, entities and relations by type', async () => {
    const service = await offlineService();
    await service.ingest({ kind: 'screenplay', content: WAREHOUSE_SCRIPT });
    await service.ingest({ kind: 'moodboard', content: LOOK_BOOK });

    const status = service.status();
    expect(status.backend).toBe('memory');
    expect(status.graphVersion).toBe(2);
    // same ingest time under the fixed clock, so order by title
    const documents = status.documents.map((d) => [d.title, d.kind, d.segments]).sort();
    expect(documents).toEqual([
      ['Cold Storage', 'screenplay', 12],
      ['Look Book', 'moodboard', 1],
    ]);
    expect(status.entities).toEqual({
      character: 2, location: 2, scene: 2, 'color-palette': 1, 'lighting-style': 1,
    });
    expect(status.relations).toEqual({ APPEARS_IN: 3, SPEAKS_WITH: 1, LOCATED_AT: 2, EVOKES_MOOD: 1 });
    await service.close();
  });
});

describe('FusionService end to end', () => {
  it('grounds every entity and relation in stored segments after ingest, merge and align', async () => {
    const { service } = await alignedFilm();
    // a second copy of the script matches every screenplay entity
    const again = await service.ingest({ kind: 'screenplay', content: WAREHOUSE_SCRIPT });
    expect(again.entitiesMatched).toBe(6);
    const realigned = await service.align();
    expect(realigned.aligned).toHaveLength(1);

    const store = service.graphStore;
    const graph = store.graph;
    expect(graph.relations().some((r) => r.type === 'ALIGNED_WITH')).toBe(true);
    for (const e of graph.entities()) {
      expect(e.support.length, e.canonicalName).toBeGreaterThan(0);
      expect(e.support.filter((id) => !store.segment(id)), e.canonicalName).toEqual([]);
    }
    for (const r of graph.relations()) {
      expect(r.support.length, r.type).toBeGreaterThan(0);
      expect(r.support.filter((id) => !store.segment(id)), r.type).toEqual([]);
    }
  });

  it('answers the warehouse question on the aligned graph and still cites the screenplay', async () => {
    const { service } = await alignedFilm();
    const result = await service.query('Who appears in the warehouse scene?');

    expect(result.answer.split('\n').slice(0, 3)).toEqual([
      'Characters: ADA, BEN.',
      'ADA appears in INT. WAREHOUSE - NIGHT.',
      'BEN appears in INT. WAREHOUSE - NIGHT.',
    ]);
    expect(result.answer).toContain('INT. WAREHOUSE - NIGHT is visually aligned with cold-blue-palette (score 0.80).');
    expect(result.entities.map((e) => [e.canonicalName, e.hop])).toEqual([
      ['WAREHOUSE', 0],
      ['INT. WAREHOUSE - NIGHT', 0],
      ['ADA', 1],
      ['BEN', 1],
      ['cold-blue-palette', 1],
      ['EXT. HARBOR - DAWN', 2],
      ['rim light', 2],
    ]);
    // ADA's APPEARS_IN support is 2, 3 and 7
    const script = result.citations.filter((c) => c.documentTitle === 'Cold Storage').map((c) => ordinal(c.segmentId));
    expect(script).toEqual([1, 2, 3, 5, 7, 11, 10]);
    const board = result.citations.filter((c) => c.documentTitle === 'Look Book').map((c) => [ordinal(c.segmentId), c.hop]);
    expect(board).toEqual([[0, 1]]);
  });
});
