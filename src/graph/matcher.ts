/**
 * Entity matching. A chain of matchers is tried in order and the first one
 * that finds anything decides; within a matcher the highest score wins and
 * ties go to the lower entity id.
 */
import { MERGE } from '../config.js';
import { sceneHeadingParts } from '../parser/screenplay.js';
import { diceSimilarity, normalizeName } from '../utils/text.js';
import type { Entity, EntityType } from '../types.js';

export interface MatchCandidate {
  type: EntityType;
  name: string;
  aliases: readonly string[];
  /** document the candidate was extracted from */
  documentId?: string;
}

export interface Match {
  entityId: string;
  score: number;
  matcher: string;
}

export interface EntityMatcher {
  readonly name: string;
  /** All entities that match, best first. `pool` holds entities of the candidate's type only. */
  match(candidate: MatchCandidate, pool: readonly Entity[]): Match[];
}

export function labelsOf(item: { aliases: readonly string[] } & ({ name: string } | { canonicalName: string })): string[] {
  const primary = 'name' in item ? item.name : item.canonicalName;
  return [...new Set([primary, ...item.aliases].map(normalizeName).filter(Boolean))];
}

function rank(matches: Match[]): Match[] {
  return matches.sort((a, b) => b.score - a.score || a.entityId.localeCompare(b.entityId));
}

export class ExactNormalizedMatcher implements EntityMatcher {
  readonly name = 'exact';

  match(candidate: MatchCandidate, pool: readonly Entity[]): Match[] {
    const wanted = new Set(labelsOf(candidate));
    const out: Match[] = [];
    for (const entity of pool) {
      if (entity.type !== candidate.type) continue;
      if (labelsOf(entity).some((l) => wanted.has(l))) {
        out.push({ entityId: entity.id, score: 1, matcher: this.name });
      }
    }
    return rank(out);
  }
}

/** INT. DOCK - NIGHT and EXT. DOCK - DAY are different scenes however close the strings are. */
function sameSceneSetting(a: string, b: string): boolean {
  const pa = sceneHeadingParts(a);
  const pb = sceneHeadingParts(b);
  return normalizeName(pa.prefix) === normalizeName(pb.prefix)
    && normalizeName(pa.time ?? '') === normalizeName(pb.time ?? '');
}

/**
 * Near-identical names across documents. Entities already grounded in the
 * candidate's own document are left out: the extractor has merged that
 * document's surface forms already.
 */
export class FuzzyMatcher implements EntityMatcher {
  readonly name = 'fuzzy';

  constructor(private readonly threshold = MERGE.fuzzyThreshold) {}

  match(candidate: MatchCandidate, pool: readonly Entity[]): Match[] {
    const wanted = labelsOf(candidate);
    const out: Match[] = [];
    for (const entity of pool) {
      if (entity.type !== candidate.type) continue;
      if (candidate.documentId !== undefined && entity.documents.includes(candidate.documentId)) continue;
      if (entity.type === 'scene' && !sameSceneSetting(candidate.name, entity.canonicalName)) continue;
      let best = 0;
      for (const a of wanted) {
        for (const b of labelsOf(entity)) best = Math.max(best, diceSimilarity(a, b));
      }
      if (best >= this.threshold) out.push({ entityId: entity.id, score: best, matcher: this.name });
    }
    return rank(out);
  }
}

export class MatcherChain {
  constructor(private readonly matchers: readonly EntityMatcher[]) {}

  static default(fuzzyThreshold = MERGE.fuzzyThreshold): MatcherChain {
    return new MatcherChain([new ExactNormalizedMatcher(), new FuzzyMatcher(fuzzyThreshold)]);
  }

  match(candidate: MatchCandidate, pool: readonly Entity[]): Match[] {
    for (const matcher of this.matchers) {
      const found = matcher.match(candidate, pool);
      if (found.length > 0) return found;
    }
    return [];
  }
}
