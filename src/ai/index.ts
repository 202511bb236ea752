/**
 * Provider selection from the environment. Generation, embeddings and vision
 * are configured separately; a provider missing its API key falls back to
 * NoModel so everything keeps working offline.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { AnthropicModel } from './anthropic.js';
import { NoModel, type LanguageModel } from './model.js';
import { OllamaModel } from './ollama.js';
import { OpenAIModel } from './openai.js';
import { ResilientModel } from './resilient.js';

type Provider = 'ollama' | 'openai' | 'anthropic' | 'none';

export interface ModelSet {
  generation: LanguageModel;
  embedding: LanguageModel;
  vision: LanguageModel;
}

function build(provider: Provider, role: string): LanguageModel {
  switch (provider) {
    case 'ollama':
      return new ResilientModel(new OllamaModel());
    case 'openai':
      if (!env.OPENAI_API_KEY) {
        logger.warn(`OPENAI_API_KEY not set; ${role} disabled`);
        return new NoModel();
      }
      return new ResilientModel(new OpenAIModel());
    case 'anthropic':
      if (!env.ANTHROPIC_API_KEY) {
        logger.warn(`ANTHROPIC_API_KEY not set; ${role} disabled`);
        return new NoModel();
      }
      return new ResilientModel(new AnthropicModel());
    case 'none':
      return new NoModel();
  }
}

export function createModels(): ModelSet {
  const models: ModelSet = {
    generation: build(env.GENERATION_PROVIDER, 'generation'),
    embedding:  build(env.EMBEDDING_PROVIDER, 'embeddings'),
    vision:     build(env.VISION_PROVIDER, 'vision'),
  };
  logger.debug('Model providers', {
    generation: models.generation.name, embedding: models.embedding.name, vision: models.vision.name,
  });
  return models;
}

export { NoModel, extractJson, type LanguageModel, type GenerateRequest, type ImageInput } from './model.js';
export { ResilientModel } from './resilient.js';
