/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.spanchunk.yaml';
export const LOG_PREFIX = '[spanchunk]';

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_FRACTIONAL_OVERLAP = 0.25;
export const DEFAULT_SENTENCE_OVERLAP = 128;
export const DEFAULT_SHORT_SENTENCE_THRESHOLD = 6;
export const DEFAULT_MIN_CHUNK_SIZE = 2;
export const DEFAULT_THRESHOLD_STEP = 0.01;
export const DEFAULT_SIMILARITY_WINDOW = 1;
export const MAX_THRESHOLD_ITERATIONS = 10;

export const DEFAULT_HASHING_DIMENSIONS = 256;
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

export const DEFAULT_STRATEGY = 'sentence';
export const PREVIEW_WIDTH = 60;
