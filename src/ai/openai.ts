import OpenAI from 'openai';
import { env } from '../config.js';
import { NonRetryableError } from '../utils/retry.js';
import type { GenerateRequest, LanguageModel } from './model.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

export class OpenAIModel implements LanguageModel {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(
    apiKey = env.OPENAI_API_KEY,
    private readonly model = env.OPENAI_MODEL,
    private readonly embedModel = env.OPENAI_EMBED_MODEL,
  ) {
    // The SDK retries on its own; ResilientModel owns retries here.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async generate(req: GenerateRequest): Promise<string> {
    const content: ContentPart[] = [
      { type: 'text', text: req.prompt },
      ...(req.images ?? []).map((img): ContentPart => ({
        type: 'image_url',
        image_url: { url: `data:${img.mediaType};base64,${img.data}` },
      })),
    ];
    const messages: ChatMessage[] = [];
    if (req.system) messages.push({ role: 'system', content: req.system });
    messages.push({ role: 'user', content });

    try {
      const res = await this.client.chat.completions.create(
        { model: this.model, max_tokens: req.maxTokens ?? env.MODEL_MAX_TOKENS, messages },
        { signal: req.signal },
      );
      return res.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      throw classify(err);
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const res = await this.client.embeddings.create({ model: this.embedModel, input: text }, { signal });
      return res.data[0]?.embedding ?? [];
    } catch (err) {
      throw classify(err);
    }
  }
}

function classify(err: unknown): unknown {
  if (err instanceof OpenAI.APIError && err.status !== undefined && err.status < 500 && err.status !== 429) {
    return new NonRetryableError(`OpenAI ${err.status}: ${err.message}`, err);
  }
  return err;
}
