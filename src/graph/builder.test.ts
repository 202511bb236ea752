import { describe, it, expect } from 'vitest';
import { KnowledgeGraph } from './knowledgeGraph.js';
import { entityIdFor, GraphBuilder } from './builder.js';
import type { CandidateBatch, CandidateEntity, EntityType, GraphData } from '../types.js';

const empty = (): GraphData => KnowledgeGraph.empty().toData();

function candidate(documentId: string, type: EntityType, name: string, support: string[], aliases: string[] = []): CandidateEntity {
  return {
    localId: `${documentId}/${type}/${name.toLowerCase()}`,
    documentId, type, name, aliases, descriptions: [], support, confidence: 0.9,
  };
}

function scriptBatch(documentId: string): CandidateBatch {
  const ada = candidate(documentId, 'character', 'ADA', [`${documentId}:00003`]);
  const scene = candidate(documentId, 'scene', 'INT. WAREHOUSE - NIGHT', [`${documentId}:00001`]);
  return {
    documentId,
    entities: [scene, ada],
    relations: [{ source: ada.localId, target: scene.localId, type: 'APPEARS_IN', weight: 1, support: [`${documentId}:00003`] }],
  };
}

describe('GraphBuilder.integrate', () => {
  const builder = new GraphBuilder();

  it('assigns ids in type/name order and bumps the version', () => {
    const result = builder.integrate(empty(), scriptBatch('doc_a'));
    expect(result.changed).toBe(true);
    expect(result.data.version).toBe(1);
    expect(result.data.entities.map((e) => [e.id, e.canonicalName])).toEqual([
      ['ent_000000', 'ADA'],
      ['ent_000001', 'INT. WAREHOUSE - NIGHT'],
    ]);
    expect(result.data.relations).toEqual([
      { source: 'ent_000000', target: 'ent_000001', type: 'APPEARS_IN', weight: 1, support: ['doc_a:00003'] },
    ]);
    expect(result.data.entities[0]?.documents).toEqual(['doc_a']);
  });

  it('is idempotent: replaying a batch changes nothing', () => {
    const once = builder.integrate(empty(), scriptBatch('doc_a'));
    const twice = builder.integrate(once.data, scriptBatch('doc_a'));
    expect(twice.changed).toBe(false);
    expect(twice.data).toEqual(once.data);
  });

  it('merges the same entity from another document', () => {
    const first = builder.integrate(empty(), scriptBatch('doc_a'));
    const second = builder.integrate(first.data, {
      documentId: 'doc_b',
      entities: [candidate('doc_b', 'character', 'Ada', ['doc_b:00000'])],
      relations: [],
    });
    expect(second.matched).toBe(1);
    expect(second.created).toBe(0);
    const ada = second.data.entities.find((e) => e.id === 'ent_000000');
    expect(ada?.canonicalName).toBe('ADA');
    // case variants of the canonical name are not kept as aliases
    expect(ada?.aliases).toEqual([]);
    expect(ada?.support).toEqual(['doc_a:00003', 'doc_b:00000']);
    expect(ada?.documents).toEqual(['doc_a', 'doc_b']);
  });

  it('never matches across entity types', () => {
    const result = builder.integrate(empty(), {
      documentId: 'doc_a',
      entities: [
        candidate('doc_a', 'location', 'WAREHOUSE', ['doc_a:00001']),
        candidate('doc_a', 'visual-motif', 'warehouse', ['doc_a:00002']),
      ],
      relations: [],
    });
    expect(result.data.entities).toHaveLength(2);
  });

  it('fuzzy-matches near-identical names', () => {
    const first = builder.integrate(empty(), {
      documentId: 'doc_a', entities: [candidate('doc_a', 'character', 'ELIZABETH BENNET', ['doc_a:00001'])], relations: [],
    });
    const second = builder.integrate(first.data, {
      documentId: 'doc_b', entities: [candidate('doc_b', 'character', 'ELIZABETH BENNETT', ['doc_b:00001'])], relations: [],
    });
    expect(second.data.entities).toHaveLength(1);
    expect(second.data.entities[0]?.aliases).toEqual(['ELIZABETH BENNETT']);
  });

  it('keeps close names from the same document apart', () => {
    const result = builder.integrate(empty(), {
      documentId: 'doc_a',
      entities: [
        candidate('doc_a', 'scene', 'INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - NIGHT', ['doc_a:00001']),
        candidate('doc_a', 'scene', 'INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - DAY', ['doc_a:00009']),
      ],
      relations: [],
    });
    expect(result.data.entities.map((e) => [e.canonicalName, e.aliases])).toEqual([
      ['INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - DAY', []],
      ['INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - NIGHT', []],
    ]);
  });

  it('never fuzzy-merges scenes at another time of day or the other side of the door', () => {
    const first = builder.integrate(empty(), {
      documentId: 'doc_a',
      entities: [candidate('doc_a', 'scene', 'INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - NIGHT', ['doc_a:00001'])],
      relations: [],
    });
    const second = builder.integrate(first.data, {
      documentId: 'doc_b',
      entities: [
        candidate('doc_b', 'scene', 'INT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - DAY', ['doc_b:00001']),
        candidate('doc_b', 'scene', 'EXT. ABANDONED GRAIN WAREHOUSE LOADING DOCK - NIGHT', ['doc_b:00005']),
      ],
      relations: [],
    });
    expect(second.created).toBe(2);
    expect(second.data.entities).toHaveLength(3);
  });

  it('still fuzzy-merges the same scene spelled slightly differently elsewhere', () => {
    const first = builder.integrate(empty(), {
      documentId: 'doc_a', entities: [candidate('doc_a', 'scene', 'INT. GRAIN WAREHOUSE - NIGHT', ['doc_a:00001'])], relations: [],
    });
    const second = builder.integrate(first.data, {
      documentId: 'doc_b', entities: [candidate('doc_b', 'scene', 'INT. GRAIN WAREHOUSES - NIGHT', ['doc_b:00001'])], relations: [],
    });
    expect(second.matched).toBe(1);
    expect(second.data.entities.map((e) => e.aliases)).toEqual([['INT. GRAIN WAREHOUSES - NIGHT']]);
  });

  it('consolidates two entities a new alias ties together; the earlier one survives', () => {
    const first = builder.integrate(empty(), {
      documentId: 'doc_a',
      entities: [
        candidate('doc_a', 'character', 'THE DOCTOR', ['doc_a:00001']),
        candidate('doc_a', 'character', 'JOHN SMITH', ['doc_a:00002']),
      ],
      relations: [],
    });
    // ids: JOHN SMITH -> ent_000000, THE DOCTOR -> ent_000001
    const bridged = builder.integrate(first.data, {
      documentId: 'doc_b',
      entities: [candidate('doc_b', 'character', 'John Smith', ['doc_b:00004'], ['The Doctor'])],
      relations: [],
    });
    expect(bridged.data.entities.map((e) => e.id)).toEqual(['ent_000000']);
    expect(bridged.data.redirects).toEqual({ ent_000001: 'ent_000000' });
    expect(bridged.conflicts).toHaveLength(1);
    expect(bridged.conflicts[0]?.code).toBe('MERGE_CONFLICT');

    const graph = KnowledgeGraph.fromData(bridged.data);
    expect(graph.resolve('ent_000001')?.canonicalName).toBe('JOHN SMITH');
  });

  it('re-points relations of a merged entity and drops duplicates', () => {
    const first = builder.integrate(empty(), {
      documentId: 'doc_a',
      entities: [
        candidate('doc_a', 'character', 'KAY', ['doc_a:00001']),
        candidate('doc_a', 'character', 'KATHERINE', ['doc_a:00002']),
        candidate('doc_a', 'scene', 'INT. BAR - NIGHT', ['doc_a:00000']),
      ],
      relations: [
        { source: 'doc_a/character/kay', target: 'doc_a/scene/int. bar - night', type: 'APPEARS_IN', weight: 0.7, support: ['doc_a:00001'] },
        { source: 'doc_a/character/katherine', target: 'doc_a/scene/int. bar - night', type: 'APPEARS_IN', weight: 1, support: ['doc_a:00002'] },
      ],
    });
    // ids: KATHERINE ent_000000, KAY ent_000001, scene ent_000002
    const merged = builder.integrate(first.data, {
      documentId: 'doc_b',
      entities: [candidate('doc_b', 'character', 'Kay', ['doc_b:00000'], ['Katherine'])],
      relations: [],
    });
    expect(merged.data.relations).toEqual([
      { source: 'ent_000000', target: 'ent_000002', type: 'APPEARS_IN', weight: 1, support: ['doc_a:00001', 'doc_a:00002'] },
    ]);
  });
});

describe('entityIdFor', () => {
  it('pads base36 so lexical order is creation order', () => {
    expect(entityIdFor(0)).toBe('ent_000000');
    expect(entityIdFor(36)).toBe('ent_000010');
    expect(entityIdFor(35) < entityIdFor(36)).toBe(true);
  });
});
