/**
 * Breadth-first expansion from the candidate entities, following edges in both
 * directions, and the citation list derived from what was reached.
 */
import { relationKey, type Entity, type Relation } from '../types.js';
import type { KnowledgeGraph } from '../graph/knowledgeGraph.js';

export interface Reached {
  entity: Entity;
  hop: number;
}

export interface Traversed {
  relation: Relation;
  hop: number;
}

export interface Subgraph {
  entities: Reached[];
  relations: Traversed[];
}

export interface TraversalOptions {
  maxHops: number;
  minWeight: number;
}

export function traverse(graph: KnowledgeGraph, startIds: readonly string[], opts: TraversalOptions): Subgraph {
  const reached = new Map<string, number>();
  const traversed = new Map<string, Traversed>();

  let frontier = [...new Set(startIds)].filter((id) => graph.resolve(id)).sort();
  for (const id of frontier) reached.set(id, 0);

  for (let hop = 0; hop < opts.maxHops && frontier.length > 0; hop++) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const n of graph.neighbors(id)) {
        if (n.relation.weight < opts.minWeight) continue;
        const key = relationKey(n.relation);
        if (!traversed.has(key)) traversed.set(key, { relation: n.relation, hop: hop + 1 });
        if (!reached.has(n.other)) {
          reached.set(n.other, hop + 1);
          next.push(n.other);
        }
      }
    }
    frontier = next.sort();
  }

  const entities: Reached[] = [];
  for (const [id, hop] of reached) {
    const entity = graph.resolve(id);
    if (entity) entities.push({ entity, hop });
  }
  entities.sort((a, b) => a.hop - b.hop || a.entity.id.localeCompare(b.entity.id));
  const relations = [...traversed.values()]
    .sort((a, b) => a.hop - b.hop || relationKey(a.relation).localeCompare(relationKey(b.relation)));
  return { entities, relations };
}

/** Segment ids supporting the subgraph, closest elements first, then by id. */
export function citationOrder(subgraph: Subgraph, limit: number): { segmentId: string; hop: number }[] {
  const best = new Map<string, number>();
  const add = (ids: readonly string[], hop: number) => {
    for (const id of ids) {
      const seen = best.get(id);
      if (seen === undefined || hop < seen) best.set(id, hop);
    }
  };
  for (const e of subgraph.entities) add(e.entity.support, e.hop);
  for (const r of subgraph.relations) add(r.relation.support, r.hop);
  return [...best.entries()]
    .map(([segmentId, hop]) => ({ segmentId, hop }))
    .sort((a, b) => a.hop - b.hop || a.segmentId.localeCompare(b.segmentId))
    .slice(0, limit);
}
