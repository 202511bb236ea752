/**
 * Question → candidate entities. An entity's relevance is the best over its
 * labels of the share of the label's significant tokens that occur in the
 * question; a label occurring verbatim scores 1.
 */
import type { EmbeddingSimilarity } from '../align/similarity.js';
import { ignoredTokens } from '../extract/lexicon.js';
import { cosineSimilarity, normalizeName, tokenize } from '../utils/text.js';
import type { Entity } from '../types.js';

export interface Candidate {
  entity: Entity;
  relevance: number;
}

export function significantTokens(text: string): string[] {
  const ignored = ignoredTokens();
  return [...new Set(tokenize(text).filter((t) => !ignored.has(t)))];
}

export function labelRelevance(label: string, question: string): number {
  const significant = significantTokens(label);
  if (significant.length === 0) return 0;
  const normalized = normalizeName(label);
  if (` ${normalizeName(question)} `.includes(` ${normalized} `)) return 1;
  const asked = new Set(tokenize(question));
  return significant.filter((t) => asked.has(t)).length / significant.length;
}

export function entityRelevance(entity: Entity, question: string): number {
  let best = 0;
  for (const label of [entity.canonicalName, ...entity.aliases]) {
    best = Math.max(best, labelRelevance(label, question));
    if (best === 1) break;
  }
  return best;
}

export function findCandidates(entities: readonly Entity[], question: string, minRelevance: number): Candidate[] {
  return entities
    .map((entity) => ({ entity, relevance: entityRelevance(entity, question) }))
    .filter((c) => c.relevance >= minRelevance)
    .sort((a, b) => b.relevance - a.relevance || a.entity.id.localeCompare(b.entity.id));
}

/** Cosine relevance between the question and each entity's text, for questions with no lexical hit. */
export async function semanticCandidates(
  entities: readonly Entity[],
  question: string,
  embeddings: EmbeddingSimilarity,
  minRelevance: number,
  signal?: AbortSignal,
): Promise<Candidate[]> {
  const asked = await embeddings.embedText(question, signal);
  const out: Candidate[] = [];
  for (const entity of entities) {
    const vector = await embeddings.vectorOf(entity, signal);
    const relevance = cosineSimilarity(asked, vector);
    if (relevance >= minRelevance) out.push({ entity, relevance });
  }
  return out.sort((a, b) => b.relevance - a.relevance || a.entity.id.localeCompare(b.entity.id));
}
