/**
 * Word lists used by the rule-based recognizers, the aligner and the query
 * engine. Loaded once from data/lexicon.json at the project root.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';

const LexiconSchema = z.object({
  stopwords:       z.array(z.string()),
  slugWords:       z.array(z.string()),
  transitions:     z.array(z.string()),
  hues:            z.array(z.object({ name: z.string(), from: z.number(), to: z.number() })),
  colorWords:      z.array(z.string()),
  colorModifiers:  z.array(z.string()),
  lightingPhrases: z.array(z.string()),
  motifWords:      z.array(z.string()),
  moodExpansions:  z.record(z.array(z.string())),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

const LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

let cached: Lexicon | null = null;

export function getLexicon(): Lexicon {
  if (!cached) {
    cached = LexiconSchema.parse(JSON.parse(readFileSync(LEXICON_URL, 'utf8')));
  }
  return cached;
}

let ignored: Set<string> | null = null;

/** Stopwords plus screenplay slug words; ignored when matching names against questions. */
export function ignoredTokens(): Set<string> {
  if (!ignored) {
    const lex = getLexicon();
    ignored = new Set([...lex.stopwords, ...lex.slugWords]);
  }
  return ignored;
}
