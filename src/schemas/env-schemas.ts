import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { DEFAULT_HASHING_DIMENSIONS, DEFAULT_OPENAI_EMBEDDING_MODEL } from '../config/constants';

// Local feature-hashing embeddings
const LOCAL_CONFIG_SCHEMA = z.object({
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(DEFAULT_HASHING_DIMENSIONS),
});

// OpenAI embeddings configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_OPENAI_EMBEDDING_MODEL),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
});

// Discriminated union based on provider type
export const ENV_SCHEMA = z.discriminatedUnion('EMBEDDING_PROVIDER', [
  z.object({ EMBEDDING_PROVIDER: z.literal(ProviderType.Local) }).merge(LOCAL_CONFIG_SCHEMA),
  z.object({ EMBEDDING_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA),
]);

// Without EMBEDDING_PROVIDER the offline provider is used
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null && !('EMBEDDING_PROVIDER' in data)) {
      return { ...data, EMBEDDING_PROVIDER: ProviderType.Local };
    }
    return data;
  },
  ENV_SCHEMA
);

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
