/**
 * Immutable graph snapshot handed to readers. Built from GraphData; never
 * changed after construction.
 */
import { GraphDataSchema, relationKey, type Entity, type EntityType, type GraphData, type Relation } from '../types.js';

export interface Neighbor {
  relation: Relation;
  /** the entity on the other end */
  other: string;
  direction: 'out' | 'in';
}

function freezeEntity(e: Entity): Entity {
  return Object.freeze({
    ...e, aliases: [...e.aliases], descriptions: [...e.descriptions], support: [...e.support], documents: [...e.documents],
  });
}

function freezeRelation(r: Relation): Relation {
  return Object.freeze({ ...r, support: [...r.support] });
}

export class KnowledgeGraph {
  readonly version: number;
  readonly nextSeq: number;
  private readonly byId: ReadonlyMap<string, Entity>;
  private readonly byKey: ReadonlyMap<string, Relation>;
  private readonly redirects: ReadonlyMap<string, string>;
  private readonly adjacency: ReadonlyMap<string, readonly Neighbor[]>;

  private constructor(data: GraphData) {
    this.version = data.version;
    this.nextSeq = data.nextSeq;
    this.byId = new Map(
      [...data.entities].sort((a, b) => a.id.localeCompare(b.id)).map((e) => [e.id, freezeEntity(e)]),
    );
    this.byKey = new Map(
      data.relations.map(freezeRelation).sort((a, b) => relationKey(a).localeCompare(relationKey(b))).map((r) => [relationKey(r), r]),
    );
    this.redirects = new Map(Object.entries(data.redirects));

    const adjacency = new Map<string, Neighbor[]>();
    const push = (id: string, n: Neighbor) => {
      const list = adjacency.get(id) ?? [];
      list.push(n);
      adjacency.set(id, list);
    };
    for (const r of this.byKey.values()) {
      push(r.source, { relation: r, other: r.target, direction: 'out' });
      push(r.target, { relation: r, other: r.source, direction: 'in' });
    }
    this.adjacency = adjacency;
  }

  static empty(): KnowledgeGraph {
    return new KnowledgeGraph({ version: 0, nextSeq: 0, entities: [], relations: [], redirects: {} });
  }

  static fromData(data: GraphData): KnowledgeGraph {
    return new KnowledgeGraph(GraphDataSchema.parse(data));
  }

  get entityCount(): number { return this.byId.size; }
  get relationCount(): number { return this.byKey.size; }

  entities(type?: EntityType): Entity[] {
    const all = [...this.byId.values()];
    return type ? all.filter((e) => e.type === type) : all;
  }

  relations(): Relation[] {
    return [...this.byKey.values()];
  }

  /** Follows redirects left by merges; unknown ids resolve to undefined. */
  resolve(id: string): Entity | undefined {
    let current = id;
    const seen = new Set<string>();
    for (;;) {
      const entity = this.byId.get(current);
      if (entity) return entity;
      const next = this.redirects.get(current);
      if (!next || seen.has(next)) return undefined;
      seen.add(current);
      current = next;
    }
  }

  relation(key: string): Relation | undefined {
    return this.byKey.get(key);
  }

  neighbors(id: string): readonly Neighbor[] {
    return this.adjacency.get(id) ?? [];
  }

  toData(): GraphData {
    return {
      version: this.version,
      nextSeq: this.nextSeq,
      entities: this.entities().map((e) => ({
        ...e, aliases: [...e.aliases], descriptions: [...e.descriptions], support: [...e.support], documents: [...e.documents],
      })),
      relations: this.relations().map((r) => ({ ...r, support: [...r.support] })),
      redirects: Object.fromEntries(this.redirects),
    };
  }
}
