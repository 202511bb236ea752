import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config.js';
import { ModelUnavailable } from '../errors.js';
import { NonRetryableError } from '../utils/retry.js';
import type { GenerateRequest, ImageInput, LanguageModel } from './model.js';

type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

function mediaTypeOf(img: ImageInput): ImageMediaType {
  switch (img.mediaType) {
    case 'image/png':  return 'image/png';
    case 'image/gif':  return 'image/gif';
    case 'image/webp': return 'image/webp';
    default:           return 'image/jpeg';
  }
}

/** Generation only; Anthropic has no embeddings endpoint. */
export class AnthropicModel implements LanguageModel {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(apiKey = env.ANTHROPIC_API_KEY, private readonly model = env.ANTHROPIC_MODEL) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(req: GenerateRequest): Promise<string> {
    try {
      const res = await this.client.messages.create({
        model: this.model,
        max_tokens: req.maxTokens ?? env.MODEL_MAX_TOKENS,
        ...(req.system ? { system: req.system } : {}),
        messages: [{ role: 'user', content: [
          ...(req.images ?? []).map((img) => ({
            type: 'image' as const,
            source: { type: 'base64' as const, media_type: mediaTypeOf(img), data: img.data },
          })),
          { type: 'text' as const, text: req.prompt },
        ]}],
      }, { signal: req.signal });
      return res.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (err) {
      if (err instanceof Anthropic.APIError && err.status !== undefined && err.status < 500 && err.status !== 429) {
        throw new NonRetryableError(`Anthropic ${err.status}: ${err.message}`, err);
      }
      throw err;
    }
  }

  async embed(): Promise<number[]> {
    throw new ModelUnavailable(this.name, 'embeddings are not offered by this provider');
  }
}
