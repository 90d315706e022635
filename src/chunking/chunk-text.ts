import { SemanticChunker } from './semantic-chunker';
import { SentenceChunker } from './sentence-chunker';
import { TokenChunker } from './token-chunker';
import type {
  Chunk,
  EmbeddingFunction,
  SemanticChunkerOptions,
  SentenceChunk,
  SentenceChunkerOptions,
  TokenChunkerOptions,
  Tokenizer,
  WordChunkerOptions,
} from './types';
import { WordChunker } from './word-chunker';

export type ChunkRequest =
  | { strategy: 'token'; options?: TokenChunkerOptions }
  | { strategy: 'word'; options?: WordChunkerOptions }
  | { strategy: 'sentence'; options?: SentenceChunkerOptions }
  | { strategy: 'semantic'; options?: SemanticChunkerOptions; embed: EmbeddingFunction };

export type ChunkResult = ReadonlyArray<Chunk | SentenceChunk>;

/**
 * Runs the requested strategy. Only the semantic strategy does asynchronous
 * work; the others resolve with the chunker's synchronous result.
 */
export async function chunkText(
  text: string,
  tokenizer: Tokenizer,
  request: ChunkRequest
): Promise<ChunkResult> {
  switch (request.strategy) {
    case 'token':
      return new TokenChunker().chunk(text, tokenizer, request.options);
    case 'word':
      return new WordChunker().chunk(text, tokenizer, request.options);
    case 'sentence':
      return new SentenceChunker().chunk(text, tokenizer, request.options);
    case 'semantic':
      return new SemanticChunker(request.embed).chunk(text, tokenizer, request.options);
  }
}

export function isSentenceChunk(chunk: Chunk | SentenceChunk): chunk is SentenceChunk {
  return 'sentences' in chunk;
}
