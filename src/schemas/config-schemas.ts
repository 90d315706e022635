import { z } from 'zod';
import { DEFAULT_STRATEGY } from '../config/constants';
import { ProviderType } from '../providers/provider-factory';
import { CHUNKER_NAME_SCHEMA } from './chunker-schemas';

// Option blocks are checked for shape here; ranges are checked by the chunker itself
const WINDOW_BLOCK_SCHEMA = z
  .object({
    chunkSize: z.number().optional(),
    chunkOverlap: z.number().optional(),
  })
  .strict();

const SENTENCE_BLOCK_SCHEMA = z
  .object({
    chunkSize: z.number().optional(),
    chunkOverlap: z.number().optional(),
    minSentencesPerChunk: z.number().optional(),
    delimiters: z.array(z.string()).optional(),
    shortSentenceThreshold: z.number().optional(),
  })
  .strict();

const SEMANTIC_BLOCK_SCHEMA = z
  .object({
    chunkSize: z.number().optional(),
    threshold: z.union([z.literal('auto'), z.number()]).optional(),
    minSentences: z.number().optional(),
    minChunkSize: z.number().optional(),
    thresholdStep: z.number().optional(),
    similarityWindow: z.number().optional(),
    minCharsPerSentence: z.number().optional(),
    delimiters: z.array(z.string()).optional(),
  })
  .strict();

// Configuration file schema for .spanchunk.yaml validation
export const CONFIG_SCHEMA = z
  .object({
    strategy: CHUNKER_NAME_SCHEMA.default(DEFAULT_STRATEGY),
    token: WINDOW_BLOCK_SCHEMA.optional(),
    word: WINDOW_BLOCK_SCHEMA.optional(),
    sentence: SENTENCE_BLOCK_SCHEMA.optional(),
    semantic: SEMANTIC_BLOCK_SCHEMA.optional(),
    embeddings: z
      .object({
        provider: z.nativeEnum(ProviderType).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
