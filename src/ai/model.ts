/**
 * Language-model capability. The core only depends on this contract; concrete
 * providers (Ollama, OpenAI, Anthropic) live beside it and are wrapped by
 * ResilientModel for timeouts and retries.
 */
import { ModelUnavailable } from '../errors.js';

export interface ImageInput {
  /** base64 payload without a data: prefix */
  data: string;
  mediaType: string;
}

export interface GenerateRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
  images?: ImageInput[];
  signal?: AbortSignal;
}

export interface LanguageModel {
  readonly name: string;
  generate(request: GenerateRequest): Promise<string>;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** Stand-in used when no provider is configured; every call reports the model as unavailable. */
export class NoModel implements LanguageModel {
  readonly name = 'none';

  async generate(): Promise<string> {
    throw new ModelUnavailable(this.name, 'no generation provider configured');
  }

  async embed(): Promise<number[]> {
    throw new ModelUnavailable(this.name, 'no embedding provider configured');
  }
}

/** Pulls the first JSON value out of a model reply, tolerating code fences and prose around it. */
export function extractJson(text: string): unknown {
  const clean = text.replace(/```(?:json)?/g, '').trim();
  const starts = [clean.indexOf('{'), clean.indexOf('[')].filter((i) => i !== -1);
  if (starts.length === 0) throw new Error('No JSON value in response');
  const start = Math.min(...starts);
  const closer = clean[start] === '{' ? '}' : ']';
  const end = clean.lastIndexOf(closer);
  if (end <= start) throw new Error('Unterminated JSON value in response');
  const value: unknown = JSON.parse(clean.slice(start, end + 1));
  return value;
}
