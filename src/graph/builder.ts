/**
 * Knowledge Graph Builder: folds a candidate batch into graph data.
 *
 * Works on a mutable draft copied from the current data and returns the next
 * data. Content that ends up identical to the input keeps the old version, so
 * replaying a batch is a no-op.
 */
import { MergeConflict } from '../errors.js';
import { logger } from '../utils/logger.js';
import { normalizeName, uniqueSorted } from '../utils/text.js';
import { labelsOf, MatcherChain } from './matcher.js';
import {
  documentOfSegment, relationKey,
  type CandidateBatch, type Entity, type EntityType, type GraphData, type Relation,
} from '../types.js';

const log = logger.child('Builder');

export function entityIdFor(seq: number): string {
  return `ent_${seq.toString(36).padStart(6, '0')}`;
}

function earlier(a: Entity, b: Entity): [Entity, Entity] {
  const aFirst = a.createdSeq < b.createdSeq || (a.createdSeq === b.createdSeq && a.id < b.id);
  return aFirst ? [a, b] : [b, a];
}

function withoutCanonical(aliases: Iterable<string>, canonicalName: string): string[] {
  const canonical = normalizeName(canonicalName);
  return uniqueSorted([...aliases].filter((a) => a.trim() && normalizeName(a) !== canonical));
}

/** Mutable working copy of GraphData. */
export class GraphDraft {
  readonly entities = new Map<string, Entity>();
  readonly relations = new Map<string, Relation>();
  readonly redirects = new Map<string, string>();
  readonly conflicts: MergeConflict[] = [];
  nextSeq: number;
  private readonly baseVersion: number;
  private readonly baseline: string;

  constructor(data: GraphData) {
    this.baseVersion = data.version;
    this.nextSeq = data.nextSeq;
    for (const e of data.entities) {
      this.entities.set(e.id, {
        ...e, aliases: [...e.aliases], descriptions: [...e.descriptions], support: [...e.support], documents: [...e.documents],
      });
    }
    for (const r of data.relations) this.relations.set(relationKey(r), { ...r, support: [...r.support] });
    for (const [from, to] of Object.entries(data.redirects)) this.redirects.set(from, to);
    this.baseline = this.fingerprint();
  }

  resolveId(id: string): string | undefined {
    let current = id;
    const seen = new Set<string>([id]);
    while (!this.entities.has(current)) {
      const next = this.redirects.get(current);
      if (!next) return undefined;
      if (seen.has(next)) {
        this.reportConflict([...seen], 'redirect chain forms a cycle');
        return undefined;
      }
      seen.add(next);
      current = next;
    }
    return current;
  }

  ofType(type: EntityType): Entity[] {
    return [...this.entities.values()].filter((e) => e.type === type).sort((a, b) => a.id.localeCompare(b.id));
  }

  create(type: EntityType, name: string): Entity {
    const seq = this.nextSeq++;
    const entity: Entity = {
      id: entityIdFor(seq), type, canonicalName: name, aliases: [], descriptions: [], support: [], documents: [], createdSeq: seq,
    };
    this.entities.set(entity.id, entity);
    return entity;
  }

  absorb(entity: Entity, part: { names: string[]; descriptions: string[]; support: string[] }): void {
    entity.aliases = withoutCanonical([...entity.aliases, ...part.names], entity.canonicalName);
    for (const d of part.descriptions) {
      if (!entity.descriptions.includes(d)) entity.descriptions.push(d);
    }
    entity.support = uniqueSorted([...entity.support, ...part.support]);
    entity.documents = uniqueSorted(entity.support.map(documentOfSegment));
  }

  upsertRelation(r: Relation): void {
    if (r.source === r.target || r.support.length === 0) return;
    const key = relationKey(r);
    const existing = this.relations.get(key);
    if (existing) {
      existing.weight = Math.max(existing.weight, r.weight);
      existing.support = uniqueSorted([...existing.support, ...r.support]);
    } else {
      this.relations.set(key, { ...r, support: uniqueSorted(r.support) });
    }
  }

  /** Replaces the relation under its key, weight and support included. */
  putRelation(r: Relation): void {
    if (r.source === r.target || r.support.length === 0) return;
    this.relations.set(relationKey(r), { ...r, support: uniqueSorted(r.support) });
  }

  deleteRelation(key: string): void {
    this.relations.delete(key);
  }

  /** Merges two live entities; the earlier-created one survives. Returns the survivor id. */
  merge(aId: string, bId: string): string {
    const a = this.entities.get(aId);
    const b = this.entities.get(bId);
    if (!a || !b || a === b) return a?.id ?? bId;
    const [survivor, loser] = earlier(a, b);

    this.absorb(survivor, {
      names: [loser.canonicalName, ...loser.aliases],
      descriptions: loser.descriptions,
      support: loser.support,
    });
    this.entities.delete(loser.id);
    this.redirects.set(loser.id, survivor.id);
    for (const [from, to] of this.redirects) {
      if (to === loser.id) this.redirects.set(from, survivor.id);
    }

    for (const [key, r] of [...this.relations]) {
      if (r.source !== loser.id && r.target !== loser.id) continue;
      this.relations.delete(key);
      this.upsertRelation({
        ...r,
        source: r.source === loser.id ? survivor.id : r.source,
        target: r.target === loser.id ? survivor.id : r.target,
      });
    }
    log.debug('merged entities', { survivor: survivor.id, merged: loser.id });
    return survivor.id;
  }

  /**
   * Merges live entities of one type that share a normalized label, repeating
   * until no label is claimed twice. `fresh` holds ids created in the current
   * batch; a merge between two older entities is reported as a conflict.
   */
  consolidate(fresh: ReadonlySet<string>): number {
    let merges = 0;
    for (;;) {
      const owner = new Map<string, string>();
      let pair: [string, string] | null = null;
      for (const entity of [...this.entities.values()].sort((x, y) => x.createdSeq - y.createdSeq || x.id.localeCompare(y.id))) {
        for (const label of labelsOf(entity)) {
          const key = `${entity.type}/${label}`;
          const claimed = owner.get(key);
          if (claimed && claimed !== entity.id) { pair = [claimed, entity.id]; break; }
          owner.set(key, entity.id);
        }
        if (pair) break;
      }
      if (!pair) return merges;
      const [first, second] = pair;
      if (!fresh.has(first) && !fresh.has(second)) {
        this.reportConflict([first, second], 'existing entities now share a name; keeping the earlier one');
      }
      this.merge(first, second);
      merges++;
    }
  }

  reportConflict(ids: string[], reason: string): void {
    const err = new MergeConflict(ids, reason);
    this.conflicts.push(err);
    log.warn(err.message, { entityIds: ids });
  }

  private fingerprint(): string {
    const entities = [...this.entities.values()].sort((a, b) => a.id.localeCompare(b.id));
    const relations = [...this.relations.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([, r]) => r);
    const redirects = [...this.redirects.entries()].sort(([a], [b]) => a.localeCompare(b));
    return JSON.stringify({ nextSeq: this.nextSeq, entities, relations, redirects });
  }

  get changed(): boolean {
    return this.fingerprint() !== this.baseline;
  }

  toData(): GraphData {
    const changed = this.changed;
    return {
      version: changed ? this.baseVersion + 1 : this.baseVersion,
      nextSeq: this.nextSeq,
      entities: [...this.entities.values()].sort((a, b) => a.id.localeCompare(b.id)),
      relations: [...this.relations.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([, r]) => r),
      redirects: Object.fromEntries([...this.redirects.entries()].sort(([a], [b]) => a.localeCompare(b))),
    };
  }
}

export interface IntegrationResult {
  data: GraphData;
  changed: boolean;
  created: number;
  matched: number;
  consolidated: number;
  relations: number;
  conflicts: MergeConflict[];
}

export class GraphBuilder {
  constructor(private readonly matchers: MatcherChain = MatcherChain.default()) {}

  integrate(current: GraphData, batch: CandidateBatch): IntegrationResult {
    const draft = new GraphDraft(current);
    const fresh = new Set<string>();
    const local = new Map<string, string>();
    let created = 0;
    let matched = 0;

    const candidates = [...batch.entities].sort((a, b) =>
      a.type.localeCompare(b.type) ||
      normalizeName(a.name).localeCompare(normalizeName(b.name)) ||
      a.localId.localeCompare(b.localId));

    for (const c of candidates) {
      const [best, ...others] = this.matchers.match(c, draft.ofType(c.type));
      let target: Entity | undefined = best ? draft.entities.get(best.entityId) : undefined;
      if (target) {
        matched++;
        // A candidate matching several entities bridges them.
        for (const other of others) {
          if (!fresh.has(target.id) && !fresh.has(other.entityId)) {
            draft.reportConflict([target.id, other.entityId], `"${c.name}" matches both; keeping the earlier one`);
          }
          const survivor = draft.merge(target.id, other.entityId);
          target = draft.entities.get(survivor);
          if (!target) break;
        }
      }
      if (!target) {
        target = draft.create(c.type, c.name);
        fresh.add(target.id);
        created++;
      }
      draft.absorb(target, { names: [c.name, ...c.aliases], descriptions: c.descriptions, support: c.support });
      local.set(c.localId, target.id);
    }

    let relations = 0;
    for (const r of batch.relations) {
      const sourceId = local.get(r.source);
      const targetId = local.get(r.target);
      const source = sourceId ? draft.resolveId(sourceId) : undefined;
      const target = targetId ? draft.resolveId(targetId) : undefined;
      if (!source || !target) continue;
      draft.upsertRelation({ source, target, type: r.type, weight: r.weight, support: r.support });
      relations++;
    }

    const consolidated = draft.consolidate(fresh);
    const changed = draft.changed;
    const data = draft.toData();
    log.info('batch integrated', {
      documentId: batch.documentId, created, matched, consolidated, relations, changed, version: data.version,
    });
    return { data, changed, created, matched, consolidated, relations, conflicts: draft.conflicts };
  }
}
