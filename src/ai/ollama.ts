/**
 * Local Ollama server over its HTTP API (/api/generate, /api/embeddings).
 */
import { z } from 'zod';
import { env } from '../config.js';
import { NonRetryableError } from '../utils/retry.js';
import type { GenerateRequest, LanguageModel } from './model.js';

const GenerateReply = z.object({ response: z.string() });
const EmbedReply = z.object({ embedding: z.array(z.number()) });

export interface OllamaOptions {
  url?: string;
  model?: string;
  embedModel?: string;
}

export class OllamaModel implements LanguageModel {
  readonly name = 'ollama';
  private readonly url: string;
  private readonly model: string;
  private readonly embedModel: string;

  constructor(opts: OllamaOptions = {}) {
    this.url = (opts.url ?? env.OLLAMA_URL).replace(/\/+$/, '');
    this.model = opts.model ?? env.OLLAMA_MODEL;
    this.embedModel = opts.embedModel ?? env.OLLAMA_EMBED_MODEL;
  }

  private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const res = await fetch(`${this.url}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    if (!res.ok) {
      const text = await res.text();
      const message = `Ollama ${path} returned ${res.status}: ${text.slice(0, 200)}`;
      // 404 means the model is not pulled; no point retrying.
      if (res.status < 500) throw new NonRetryableError(message);
      throw new Error(message);
    }
    return res.json();
  }

  async generate(req: GenerateRequest): Promise<string> {
    const reply = await this.post('/api/generate', {
      model: this.model,
      prompt: req.prompt,
      ...(req.system ? { system: req.system } : {}),
      ...(req.images?.length ? { images: req.images.map((i) => i.data) } : {}),
      stream: false,
      options: { num_predict: req.maxTokens ?? env.MODEL_MAX_TOKENS },
    }, req.signal);
    return GenerateReply.parse(reply).response.trim();
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const reply = await this.post('/api/embeddings', { model: this.embedModel, prompt: text }, signal);
    return EmbedReply.parse(reply).embedding;
  }
}
