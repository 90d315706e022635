import type { EmbeddingProvider } from './embedding-provider';
import { HashingEmbeddingProvider } from './hashing-embedding-provider';
import { OpenAIEmbeddingProvider, type OpenAIEmbeddingConfig } from './openai-embedding-provider';
import type { EnvConfig } from '../schemas/env-schemas';

export interface ProviderOptions {
  debug?: boolean;
}

export enum ProviderType {
  Local = 'local',
  OpenAI = 'openai',
}

/**
 * Creates the embedding provider selected by the environment configuration
 * @param envConfig - Validated environment configuration
 * @param options - Debug options
 * @returns Configured embedding provider instance
 */
export function createEmbeddingProvider(
  envConfig: EnvConfig,
  options: ProviderOptions = {}
): EmbeddingProvider {
  switch (envConfig.EMBEDDING_PROVIDER) {
    case ProviderType.Local:
      return new HashingEmbeddingProvider(envConfig.EMBEDDING_DIMENSIONS);

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIEmbeddingConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_EMBEDDING_MODEL,
        ...(envConfig.OPENAI_EMBEDDING_DIMENSIONS !== undefined && {
          dimensions: envConfig.OPENAI_EMBEDDING_DIMENSIONS,
        }),
        ...(options.debug !== undefined && { debug: options.debug }),
      };
      return new OpenAIEmbeddingProvider(openaiConfig);
    }
  }
}
