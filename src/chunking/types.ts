/** Half-open UTF-8 byte span `[start, end)`. */
export type ByteSpan = readonly [start: number, end: number];

export interface Chunk {
  readonly text: string;
  readonly startByte: number;
  readonly endByte: number;
  readonly tokenCount: number;
  readonly embedding: ReadonlyArray<number> | null;
}

export interface SentenceChunk {
  readonly text: string;
  readonly startByte: number;
  readonly endByte: number;
  readonly tokenCount: number;
  readonly sentences: ReadonlyArray<Chunk>;
}

/**
 * Result of encoding a text. `length` counts every token, including special
 * tokens that map to no text; those carry a zero-width offset.
 */
export interface Encoding {
  readonly length: number;
  readonly offsets: ReadonlyArray<ByteSpan>;
}

export interface Tokenizer {
  encode(text: string): Encoding;
}

export type EmbeddingFunction = (
  texts: string[]
) => number[][] | Promise<number[][]>;

export type ChunkerName = 'token' | 'word' | 'sentence' | 'semantic';

export interface ChunkingStrategy<TOptions, TResult> {
  readonly name: ChunkerName;
  chunk(text: string, tokenizer: Tokenizer, options?: TOptions): TResult;
}

export interface TokenChunkerOptions {
  chunkSize?: number; // Maximum tokens per chunk
  chunkOverlap?: number; // Integer token count, or fraction of chunkSize when not an integer
}

export type WordChunkerOptions = TokenChunkerOptions;

export interface SentenceChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number; // Token count shared with the previous chunk
  minSentencesPerChunk?: number;
  delimiters?: string[];
  shortSentenceThreshold?: number; // Fragments below this byte length join the previous one
}

export interface SemanticChunkerOptions {
  chunkSize?: number;
  threshold?: number | 'auto';
  minSentences?: number;
  minChunkSize?: number; // Minimum tokens per group during the threshold search
  thresholdStep?: number;
  similarityWindow?: number; // Neighbours joined on each side for the context embedding
  minCharsPerSentence?: number;
  delimiters?: string[];
}
