import { z } from 'zod';
import { OutputFormat } from '../cli/types';
import { CHUNKER_NAME_SCHEMA } from './chunker-schemas';

// Commander hands option values over as strings; numbers are coerced here
export const CHUNK_OPTIONS_SCHEMA = z.object({
  strategy: CHUNKER_NAME_SCHEMA.optional(),
  chunkSize: z.coerce.number().int().positive().optional(),
  chunkOverlap: z.coerce.number().nonnegative().optional(),
  minSentences: z.coerce.number().int().positive().optional(),
  delimiters: z.string().min(1).optional(),
  threshold: z.union([z.literal('auto'), z.coerce.number().min(0).max(1)]).optional(),
  similarityWindow: z.coerce.number().int().nonnegative().optional(),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  config: z.string().optional(),
  specialTokens: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

// Inferred types
export type ChunkCliOptions = z.infer<typeof CHUNK_OPTIONS_SCHEMA>;
