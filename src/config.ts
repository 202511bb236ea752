import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const unit = z.coerce.number().min(0).max(1);

const EnvSchema = z.object({
  LOG_LEVEL:  z.enum(['debug','info','warn','error','silent']).default('info'),
  LOG_FORMAT: z.enum(['text','json']).default('text'),

  SQLITE_PATH:          z.string().default('./data/reelgraph.db'),
  SUPABASE_URL:         z.string().url().optional().or(z.literal('').transform(() => undefined)),
  SUPABASE_SERVICE_KEY: z.string().optional(),
  STORE_MAX_ATTEMPTS:   z.coerce.number().int().min(1).default(3),
  STORE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(250),

  GENERATION_PROVIDER: z.enum(['ollama','openai','anthropic','none']).default('none'),
  EMBEDDING_PROVIDER:  z.enum(['ollama','openai','none']).default('none'),
  VISION_PROVIDER:     z.enum(['anthropic','openai','none']).default('none'),
  OLLAMA_URL:          z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL:        z.string().default('llama3.2:3b'),
  OLLAMA_EMBED_MODEL:  z.string().default('nomic-embed-text'),
  OPENAI_API_KEY:      z.string().optional(),
  OPENAI_MODEL:        z.string().default('gpt-4o-mini'),
  OPENAI_EMBED_MODEL:  z.string().default('text-embedding-3-small'),
  ANTHROPIC_API_KEY:   z.string().optional(),
  ANTHROPIC_MODEL:     z.string().default('claude-sonnet-4-6'),
  MODEL_TIMEOUT_MS:    z.coerce.number().int().min(100).default(15_000),
  MODEL_MAX_ATTEMPTS:  z.coerce.number().int().min(1).default(3),
  MODEL_RETRY_DELAY_MS:z.coerce.number().int().min(0).default(500),
  MODEL_MAX_TOKENS:    z.coerce.number().int().min(16).default(512),

  EXTRACTION_MIN_CONFIDENCE: unit.default(0.5),
  EXTRACT_WITH_MODEL:        z.enum(['true','false']).default('false').transform((v) => v === 'true'),
  MERGE_FUZZY_THRESHOLD:     unit.default(0.85),
  ALIGN_THRESHOLD:           unit.default(0.6),
  ALIGN_CONCURRENCY:         z.coerce.number().int().min(1).default(4),
  ALIGN_TIMEOUT_MS:          z.coerce.number().int().min(100).default(60_000),
  INGEST_TIMEOUT_MS:         z.coerce.number().int().min(100).default(30_000),
  PDF_MAX_PAGES:             z.coerce.number().int().min(1).default(300),
  QUERY_MIN_RELEVANCE:       unit.default(0.5),
  QUERY_MIN_WEIGHT:          unit.default(0.3),
  QUERY_MAX_HOPS:            z.coerce.number().int().min(0).max(6).default(2),
  QUERY_MAX_CITATIONS:       z.coerce.number().int().min(1).default(40),
  COMPOSE_WITH_MODEL:        z.enum(['true','false']).default('false').transform((v) => v === 'true'),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Invalid environment variables: ${invalid}`);
}

export const env: Env = parsed.data;

export const EXTRACTION = {
  minConfidence: env.EXTRACTION_MIN_CONFIDENCE,
  withModel: env.EXTRACT_WITH_MODEL,
  sceneDescriptionChars: 400,
} as const;

export const MERGE = {
  fuzzyThreshold: env.MERGE_FUZZY_THRESHOLD,
} as const;

export const ALIGNMENT = {
  threshold:   env.ALIGN_THRESHOLD,
  concurrency: env.ALIGN_CONCURRENCY,
  timeoutMs:   env.ALIGN_TIMEOUT_MS,
} as const;

export const INGESTION = {
  timeoutMs:   env.INGEST_TIMEOUT_MS,
  pdfMaxPages: env.PDF_MAX_PAGES,
} as const;

export const QUERY_DEFAULTS = {
  minRelevance: env.QUERY_MIN_RELEVANCE,
  minWeight:    env.QUERY_MIN_WEIGHT,
  maxHops:      env.QUERY_MAX_HOPS,
  maxCitations: env.QUERY_MAX_CITATIONS,
  composeWithModel: env.COMPOSE_WITH_MODEL,
} as const;

export const MODEL = {
  timeoutMs:    env.MODEL_TIMEOUT_MS,
  maxAttempts:  env.MODEL_MAX_ATTEMPTS,
  retryDelayMs: env.MODEL_RETRY_DELAY_MS,
  maxTokens:    env.MODEL_MAX_TOKENS,
} as const;

export const STORAGE = {
  sqlitePath:   env.SQLITE_PATH,
  maxAttempts:  env.STORE_MAX_ATTEMPTS,
  retryDelayMs: env.STORE_RETRY_DELAY_MS,
} as const;

// Mean grey level (0-255) cut-offs for brightness buckets.
export const BRIGHTNESS = {
  lowBelow:  70,
  highAbove: 180,
} as const;
