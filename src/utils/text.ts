/**
 * Text normalization and set-similarity helpers shared by the extractor,
 * the entity matcher, the aligner and the query engine.
 */

export function normalizeName(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9#\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  return normalizeName(text)
    .split(' ')
    .map((t) => t.replace(/^#/, ''))
    .filter((t) => t.length >= 2);
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function jaccardSimilarity(a: Iterable<string>, b: Iterable<string>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 0;
  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  const union = setA.size + setB.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/** Character n-grams of the normalized text, padded so short names still yield grams. */
export function charNgrams(text: string, n = 3): Set<string> {
  const padded = ` ${normalizeName(text)} `;
  const grams = new Set<string>();
  for (let i = 0; i <= padded.length - n; i++) {
    grams.add(padded.slice(i, i + n));
  }
  return grams;
}

/** Sørensen–Dice coefficient over character trigrams. */
export function diceSimilarity(a: string, b: string): number {
  const gramsA = charNgrams(a);
  const gramsB = charNgrams(b);
  if (gramsA.size === 0 || gramsB.size === 0) return 0;
  let intersection = 0;
  for (const g of gramsA) {
    if (gramsB.has(g)) intersection++;
  }
  return (2 * intersection) / (gramsA.size + gramsB.size);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return `${text.slice(0, Math.max(0, maxLen - 3)).trimEnd()}...`;
}

export function round(value: number, places = 4): number {
  const f = Math.pow(10, places);
  return Math.round(value * f) / f;
}
