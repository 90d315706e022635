export type {
  ByteSpan,
  Chunk,
  ChunkerName,
  ChunkingStrategy,
  EmbeddingFunction,
  Encoding,
  SemanticChunkerOptions,
  SentenceChunk,
  SentenceChunkerOptions,
  TokenChunkerOptions,
  Tokenizer,
  WordChunkerOptions,
} from './types';
export { createChunk, createSentenceChunk, type ChunkInit } from './chunk';
export { chunkText, isSentenceChunk, type ChunkRequest, type ChunkResult } from './chunk-text';
export { TokenChunker, tokenChunk } from './token-chunker';
export { WordChunker, wordChunk } from './word-chunker';
export { SentenceChunker, sentenceChunk } from './sentence-chunker';
export {
  SemanticChunker,
  semanticChunk,
  averageNeighborScores,
  computePairwiseSimilarities,
  findOptimalThreshold,
  findSplitRanges,
  type SplitRange,
} from './semantic-chunker';
export { buildContextWindows, prepareSentences } from './semantic-sentences';
export {
  DEFAULT_DELIMITERS,
  combineShortSentences,
  combineShortSentencesByChars,
  splitSentences,
} from './sentence-splitter';
export { resolveSentenceSpans, type SentenceSpan } from './span-resolver';
export { cosineSimilarity, mean, median, standardDeviation } from './statistics';
export { byteLength, isBlank, sliceBytes, splitIntoWords } from './utils';
export { RegexTokenizer, type RegexTokenizerOptions } from '../tokenizers/regex-tokenizer';
export {
  SpanchunkError,
  ConfigurationError,
  ValidationError,
  ProcessingError,
} from '../errors/index';
