/**
 * Answer composition. TemplateComposer states the facts of the subgraph in
 * fixed sentences; ModelComposer asks the language model to phrase an answer
 * from those facts and the cited segment text, and falls back to the template
 * when the model is unavailable.
 */
import { ModelUnavailable } from '../errors.js';
import { logger } from '../utils/logger.js';
import { tokenize, truncate } from '../utils/text.js';
import type { LanguageModel } from '../ai/model.js';
import type { Reached, Traversed } from './traversal.js';
import type { RelationType } from '../types.js';

export interface Citation {
  segmentId: string;
  documentId: string;
  documentTitle: string;
  hop: number;
  page: number | null;
  text: string;
}

export interface AnswerContext {
  question: string;
  entities: Reached[];
  relations: Traversed[];
  citations: Citation[];
}

export interface Composition {
  answer: string;
  degraded: boolean;
}

export interface AnswerComposer {
  readonly name: string;
  compose(ctx: AnswerContext, signal?: AbortSignal): Promise<Composition>;
}

const PHRASES: Record<RelationType, (s: string, t: string, weight: number) => string> = {
  APPEARS_IN:   (s, t) => `${s} appears in ${t}.`,
  LOCATED_AT:   (s, t) => `${s} takes place at ${t}.`,
  SPEAKS_WITH:  (s, t) => `${s} speaks with ${t}.`,
  EVOKES_MOOD:  (s, t) => `${s} evokes ${t}.`,
  ALIGNED_WITH: (s, t, w) => `${s} is visually aligned with ${t} (score ${w.toFixed(2)}).`,
};

const PEOPLE_FIRST: readonly RelationType[] = ['APPEARS_IN', 'SPEAKS_WITH'];

export function isWhoQuestion(question: string): boolean {
  return tokenize(question).includes('who');
}

/** One sentence per traversed relation, closest first. */
export function factLines(ctx: AnswerContext): string[] {
  const names = new Map(ctx.entities.map((r) => [r.entity.id, r.entity.canonicalName]));
  const who = isWhoQuestion(ctx.question);
  const ordered = [...ctx.relations].sort((a, b) => {
    if (who) {
      const pa = PEOPLE_FIRST.includes(a.relation.type) ? 0 : 1;
      const pb = PEOPLE_FIRST.includes(b.relation.type) ? 0 : 1;
      if (pa !== pb) return pa - pb;
    }
    return a.hop - b.hop;
  });
  const lines: string[] = [];
  for (const { relation } of ordered) {
    const source = names.get(relation.source);
    const target = names.get(relation.target);
    if (!source || !target) continue;
    lines.push(PHRASES[relation.type](source, target, relation.weight));
  }
  return lines;
}

export class TemplateComposer implements AnswerComposer {
  readonly name = 'template';

  async compose(ctx: AnswerContext): Promise<Composition> {
    const lines: string[] = [];
    if (isWhoQuestion(ctx.question)) {
      const characters = ctx.entities.filter((r) => r.entity.type === 'character').map((r) => r.entity.canonicalName);
      if (characters.length > 0) lines.push(`Characters: ${characters.join(', ')}.`);
    }
    const facts = factLines(ctx);
    if (facts.length > 0) {
      lines.push(...facts);
    } else {
      for (const { entity } of ctx.entities) {
        const description = entity.descriptions[0];
        lines.push(description
          ? `${entity.canonicalName} (${entity.type}): ${truncate(description, 160)}`
          : `${entity.canonicalName} (${entity.type}).`);
      }
    }
    return { answer: lines.join('\n'), degraded: false };
  }
}

export class ModelComposer implements AnswerComposer {
  readonly name = 'model';

  constructor(
    private readonly model: LanguageModel,
    private readonly fallback: AnswerComposer = new TemplateComposer(),
  ) {}

  async compose(ctx: AnswerContext, signal?: AbortSignal): Promise<Composition> {
    const sources = ctx.citations.map((c) => `[${c.segmentId}] ${truncate(c.text, 300)}`).join('\n');
    const prompt =
      `Answer the question using ONLY the facts and source excerpts below. ` +
      `Cite excerpts by their [segment id]. If they do not answer the question, say so.\n\n` +
      `QUESTION: ${ctx.question}\n\nFACTS:\n${factLines(ctx).join('\n')}\n\nSOURCES:\n${sources}`;
    try {
      const answer = await this.model.generate({
        system: 'You answer questions about a film project from its screenplay and mood boards.',
        prompt,
        signal,
      });
      if (answer.trim()) return { answer: answer.trim(), degraded: false };
      logger.warn('Composer: empty model answer; using template');
    } catch (err) {
      if (!(err instanceof ModelUnavailable)) throw err;
      logger.warn('Composer: model unavailable; using template', { error: err.message });
    }
    const fallback = await this.fallback.compose(ctx, signal);
    return { answer: fallback.answer, degraded: true };
  }
}
