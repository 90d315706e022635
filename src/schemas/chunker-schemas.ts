import { z } from 'zod';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_FRACTIONAL_OVERLAP,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_SENTENCE_OVERLAP,
  DEFAULT_SHORT_SENTENCE_THRESHOLD,
  DEFAULT_SIMILARITY_WINDOW,
  DEFAULT_THRESHOLD_STEP,
} from '../config/constants';
import { DEFAULT_DELIMITERS } from '../chunking/sentence-splitter';

export const CHUNKER_NAMES = ['token', 'word', 'sentence', 'semantic'] as const;
export const CHUNKER_NAME_SCHEMA = z.enum(CHUNKER_NAMES);

const CHUNK_SIZE_SCHEMA = z.number().int().positive();
const DELIMITERS_SCHEMA = z
  .array(z.string().min(1, 'delimiters cannot be empty strings'))
  .min(1, 'delimiters must contain at least one element');

// Integer overlap counts tokens; any other number is a fraction of chunkSize
export const WINDOW_CHUNKER_OPTIONS_SCHEMA = z
  .object({
    chunkSize: CHUNK_SIZE_SCHEMA.default(DEFAULT_CHUNK_SIZE),
    chunkOverlap: z.number().nonnegative().default(DEFAULT_FRACTIONAL_OVERLAP),
  })
  .strict()
  .superRefine((opts, ctx) => {
    if (Number.isInteger(opts.chunkOverlap)) {
      if (opts.chunkOverlap >= opts.chunkSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['chunkOverlap'],
          message: 'chunkOverlap must be less than chunkSize',
        });
      }
    } else if (opts.chunkOverlap >= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkOverlap'],
        message: 'chunkOverlap percentage must be less than 1',
      });
    }
  })
  .transform((opts) => ({
    chunkSize: opts.chunkSize,
    chunkOverlap: Number.isInteger(opts.chunkOverlap)
      ? opts.chunkOverlap
      : Math.floor(opts.chunkOverlap * opts.chunkSize),
  }));

export const SENTENCE_CHUNKER_OPTIONS_SCHEMA = z
  .object({
    chunkSize: CHUNK_SIZE_SCHEMA.default(DEFAULT_CHUNK_SIZE),
    chunkOverlap: z.number().int().nonnegative().default(DEFAULT_SENTENCE_OVERLAP),
    minSentencesPerChunk: z.number().int().min(1).default(1),
    delimiters: DELIMITERS_SCHEMA.default([...DEFAULT_DELIMITERS]),
    shortSentenceThreshold: z.number().int().min(1).default(DEFAULT_SHORT_SENTENCE_THRESHOLD),
  })
  .strict()
  .refine((opts) => opts.chunkOverlap < opts.chunkSize, {
    path: ['chunkOverlap'],
    message: 'chunkOverlap must be less than chunkSize',
  });

export const SEMANTIC_CHUNKER_OPTIONS_SCHEMA = z
  .object({
    chunkSize: CHUNK_SIZE_SCHEMA.default(DEFAULT_CHUNK_SIZE),
    threshold: z
      .union([z.literal('auto'), z.number().min(0).max(1)])
      .default('auto'),
    minSentences: z.number().int().positive().default(1),
    minChunkSize: z.number().int().positive().default(DEFAULT_MIN_CHUNK_SIZE),
    thresholdStep: z.number().gt(0).lt(1).default(DEFAULT_THRESHOLD_STEP),
    similarityWindow: z.number().int().nonnegative().default(DEFAULT_SIMILARITY_WINDOW),
    minCharsPerSentence: z.number().int().nonnegative().default(0),
    delimiters: DELIMITERS_SCHEMA.default([...DEFAULT_DELIMITERS]),
  })
  .strict();

// Inferred types
export type WindowChunkerConfig = z.output<typeof WINDOW_CHUNKER_OPTIONS_SCHEMA>;
export type SentenceChunkerConfig = z.output<typeof SENTENCE_CHUNKER_OPTIONS_SCHEMA>;
export type SemanticChunkerConfig = z.output<typeof SEMANTIC_CHUNKER_OPTIONS_SCHEMA>;
