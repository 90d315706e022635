import { z } from 'zod';
import { CHUNK_OPTIONS_SCHEMA, type ChunkCliOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './chunker-options-parser';

export function parseCliOptions(raw: unknown): ChunkCliOptions {
  try {
    return CHUNK_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`);
  }
}

const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t', '\\': '\\' };

/**
 * Splits a comma separated delimiter list. `\n`, `\r`, `\t` and `\\` are
 * unescaped; empty entries are dropped.
 */
export function parseDelimiterList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.replace(/\\([nrt\\])/g, (match, key: string) => ESCAPES[key] ?? match))
    .filter((entry) => entry.length > 0);
}
