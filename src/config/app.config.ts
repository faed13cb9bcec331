import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) =>
      v == null || v.trim() === '' ? fallback : v.trim().toLowerCase() === 'true',
    );

const int = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z
  .object({
    PORT: int(3000, 1),
    DEV_MODE: flag(false),

    AWS_REGION: z.string().optional(),
    AWS_DEFAULT_REGION: z.string().optional(),
    BEDROCK_AWS_REGION: z.string().optional(),

    EMBEDDING_PROVIDER: z.enum(['bedrock', 'hashing']).default('bedrock'),
    BEDROCK_EMBED_MODEL: z.string().default('amazon.titan-embed-text-v2:0'),
    HASHING_EMBEDDING_DIMENSIONS: int(256, 8),

    BEDROCK_LLM_MODEL: z.string().default('amazon.nova-lite-v1:0'),
    AGENT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
    AGENT_MAX_TOKENS: int(1024, 1),

    TICKET_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().optional(),
    TICKETS_TABLE: z.string().default('support_tickets'),

    DATA_FOLDER: z.string().default('./data/knowledge-base'),
    KB_AUTO_INGEST: flag(false),
    KB_CHUNK_SIZE: int(1000, 1),
    KB_CHUNK_OVERLAP: int(200, 0),
    KB_SEARCH_RESULTS: int(5, 1),

    MAX_CHAT_HISTORY: int(50, 1),
    PROMPT_HISTORY_LIMIT: int(50, 0),
    REQUEST_TIMEOUT_MS: int(60_000, 1),
  })
  .superRefine((env, ctx) => {
    if (env.KB_CHUNK_OVERLAP >= env.KB_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['KB_CHUNK_OVERLAP'],
        message: 'KB_CHUNK_OVERLAP must be smaller than KB_CHUNK_SIZE',
      });
    }
    if (env.TICKET_STORE === 'postgres' && !env.DATABASE_URL?.trim()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when TICKET_STORE=postgres',
      });
    }
  });

export type AppConfig = {
  port: number;
  devMode: boolean;
  aws: { region: string };
  embedding: {
    provider: 'bedrock' | 'hashing';
    bedrockModel: string;
    hashingDimensions: number;
  };
  generation: { model: string; temperature: number; maxTokens: number };
  tickets: {
    store: 'memory' | 'postgres';
    databaseUrl?: string;
    table: string;
  };
  knowledgeBase: {
    dataFolder: string;
    autoIngest: boolean;
    chunkSize: number;
    chunkOverlap: number;
    searchResults: number;
  };
  conversations: {
    maxHistory: number;
    promptHistoryLimit: number;
    requestTimeoutMs: number;
  };
};

/**
 * Builds the typed configuration from environment variables.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(env)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    devMode: e.DEV_MODE,
    aws: {
      region:
        e.BEDROCK_AWS_REGION?.trim() ||
        e.AWS_REGION?.trim() ||
        e.AWS_DEFAULT_REGION?.trim() ||
        'us-east-1',
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      bedrockModel: e.BEDROCK_EMBED_MODEL,
      hashingDimensions: e.HASHING_EMBEDDING_DIMENSIONS,
    },
    generation: {
      model: e.BEDROCK_LLM_MODEL,
      temperature: e.AGENT_TEMPERATURE,
      maxTokens: e.AGENT_MAX_TOKENS,
    },
    tickets: {
      store: e.TICKET_STORE,
      databaseUrl: e.DATABASE_URL?.trim() || undefined,
      table: e.TICKETS_TABLE,
    },
    knowledgeBase: {
      dataFolder: e.DATA_FOLDER,
      autoIngest: e.KB_AUTO_INGEST,
      chunkSize: e.KB_CHUNK_SIZE,
      chunkOverlap: e.KB_CHUNK_OVERLAP,
      searchResults: e.KB_SEARCH_RESULTS,
    },
    conversations: {
      maxHistory: e.MAX_CHAT_HISTORY,
      promptHistoryLimit: e.PROMPT_HISTORY_LIMIT,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
  };
}
