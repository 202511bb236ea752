/**
 * Similarity between a narrative entity and a visual one, in [0, 1].
 */
import { getLexicon } from '../extract/lexicon.js';
import { cosineSimilarity, jaccardSimilarity, tokenize } from '../utils/text.js';
import type { LanguageModel } from '../ai/model.js';
import type { Entity } from '../types.js';

export interface SimilarityFunction {
  readonly name: string;
  score(a: Entity, b: Entity, signal?: AbortSignal): Promise<number>;
}

export function entityText(e: Entity): string {
  return [e.canonicalName, ...e.aliases, ...e.descriptions].join('. ');
}

/**
 * Significant tokens of the entity's names and descriptions plus the mood
 * terms the lexicon associates with them (NIGHT -> dark, low key, ...).
 */
export function moodTokens(e: Entity): Set<string> {
  const lex = getLexicon();
  const stop = new Set(lex.stopwords);
  const out = new Set<string>();
  for (const token of tokenize(entityText(e))) {
    if (stop.has(token)) continue;
    out.add(token);
    for (const term of lex.moodExpansions[token] ?? []) {
      for (const t of tokenize(term)) out.add(t);
    }
  }
  return out;
}

export class LexicalSimilarity implements SimilarityFunction {
  readonly name = 'lexical';

  async score(a: Entity, b: Entity): Promise<number> {
    return jaccardSimilarity(moodTokens(a), moodTokens(b));
  }
}

/** Cosine of model embeddings; embeddings are cached per text. */
export class EmbeddingSimilarity implements SimilarityFunction {
  readonly name = 'embedding';
  private readonly cache = new Map<string, Promise<number[]>>();

  constructor(private readonly model: LanguageModel) {}

  embedText(text: string, signal?: AbortSignal): Promise<number[]> {
    let pending = this.cache.get(text);
    if (!pending) {
      pending = this.model.embed(text, signal);
      this.cache.set(text, pending);
      // A failed embedding must not stay cached.
      void pending.catch(() => this.cache.delete(text));
    }
    return pending;
  }

  vectorOf(e: Entity, signal?: AbortSignal): Promise<number[]> {
    return this.embedText(entityText(e), signal);
  }

  async score(a: Entity, b: Entity, signal?: AbortSignal): Promise<number> {
    const [va, vb] = await Promise.all([this.vectorOf(a, signal), this.vectorOf(b, signal)]);
    return Math.max(0, cosineSimilarity(va, vb));
  }
}
