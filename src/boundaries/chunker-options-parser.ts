import { z } from 'zod';
import {
  SEMANTIC_CHUNKER_OPTIONS_SCHEMA,
  SENTENCE_CHUNKER_OPTIONS_SCHEMA,
  WINDOW_CHUNKER_OPTIONS_SCHEMA,
  type SemanticChunkerConfig,
  type SentenceChunkerConfig,
  type WindowChunkerConfig,
} from '../schemas/chunker-schemas';
import { ConfigurationError, handleUnknownError } from '../errors/index';

export function formatZodIssues(zodError: z.ZodError): string {
  return zodError.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  try {
    return schema.parse(raw ?? {});
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ConfigurationError(`Invalid ${label} options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, `${label} option parsing`);
    throw new ConfigurationError(`${label} option parsing failed: ${err.message}`);
  }
}

export function parseTokenChunkerOptions(raw: unknown): WindowChunkerConfig {
  return parseWith(WINDOW_CHUNKER_OPTIONS_SCHEMA, raw, 'token chunker');
}

export function parseWordChunkerOptions(raw: unknown): WindowChunkerConfig {
  return parseWith(WINDOW_CHUNKER_OPTIONS_SCHEMA, raw, 'word chunker');
}

export function parseSentenceChunkerOptions(raw: unknown): SentenceChunkerConfig {
  return parseWith(SENTENCE_CHUNKER_OPTIONS_SCHEMA, raw, 'sentence chunker');
}

export function parseSemanticChunkerOptions(raw: unknown): SemanticChunkerConfig {
  return parseWith(SEMANTIC_CHUNKER_OPTIONS_SCHEMA, raw, 'semantic chunker');
}
