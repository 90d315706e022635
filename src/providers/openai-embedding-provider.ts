import OpenAI from 'openai';
import { z } from 'zod';
import type { EmbeddingProvider } from './embedding-provider';
import {
  OPENAI_EMBEDDING_RESPONSE_SCHEMA,
  type OpenAIEmbeddingResponse,
} from '../schemas/api-schemas';
import { DEFAULT_OPENAI_EMBEDDING_MODEL, LOG_PREFIX } from '../config/constants';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { log } from '../output/logger';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  debug?: boolean;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';

  private client: OpenAI;
  private model: string;
  private dimensions: number | undefined;
  private debug: boolean;

  constructor(config: OpenAIEmbeddingConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.model = config.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.dimensions = config.dimensions;
    this.debug = config.debug ?? false;
  }

  /**
   * Validates OpenAI API response using schema validation
   */
  private validateResponse(response: unknown): OpenAIEmbeddingResponse {
    try {
      return OPENAI_EMBEDDING_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new ProcessingError(`Invalid OpenAI embeddings response structure: ${e.message}`);
      }
      const err = handleUnknownError(e, 'OpenAI response validation');
      throw new ProcessingError(`OpenAI response validation failed: ${err.message}`);
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const params: OpenAI.EmbeddingCreateParams = {
      model: this.model,
      input: texts,
      ...(this.dimensions !== undefined && { dimensions: this.dimensions }),
    };

    if (this.debug) {
      log(`${LOG_PREFIX} Requesting ${texts.length} embeddings from OpenAI:`, {
        model: this.model,
        dimensions: this.dimensions,
      });
    }

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.embeddings.create(params);
    } catch (e: unknown) {
      // Handle specific OpenAI SDK errors - check more specific errors first
      if (e instanceof OpenAI.RateLimitError) {
        throw new Error(`OpenAI rate limit exceeded: ${e.message}`);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new Error(`OpenAI authentication failed: ${e.message}`);
      }
      if (e instanceof OpenAI.APIError) {
        throw new Error(`OpenAI API error (${e.status}): ${e.message}`);
      }

      const err = handleUnknownError(e, 'OpenAI API call');
      throw new Error(`OpenAI API call failed: ${err.message}`);
    }

    const response = this.validateResponse(rawResponse);

    if (this.debug && response.usage) {
      log(`${LOG_PREFIX} Embedding usage:`, {
        prompt_tokens: response.usage.prompt_tokens,
        total_tokens: response.usage.total_tokens,
      });
    }

    // The API may return items out of order; `index` refers to the input position
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
