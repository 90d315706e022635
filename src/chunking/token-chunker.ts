import { parseTokenChunkerOptions } from '../boundaries/chunker-options-parser';
import { createChunk } from './chunk';
import type { ByteSpan, Chunk, ChunkingStrategy, TokenChunkerOptions, Tokenizer } from './types';

/**
 * Fixed windows of `chunkSize` tokens advancing by `chunkSize - overlap`.
 * Chunk text is the raw source between the first and last token of the
 * window, so bytes the tokenizer skips are kept.
 */
export class TokenChunker implements ChunkingStrategy<TokenChunkerOptions, Chunk[]> {
  readonly name = 'token';

  chunk(text: string, tokenizer: Tokenizer, options?: TokenChunkerOptions): Chunk[] {
    const { chunkSize, chunkOverlap } = parseTokenChunkerOptions(options);

    const offsets = tokenizer
      .encode(text)
      .offsets.filter(([start, end]) => end > start);
    if (offsets.length === 0) return [];

    const source = Buffer.from(text, 'utf8');
    const step = chunkSize - chunkOverlap;
    const chunks: Chunk[] = [];

    for (let start = 0; start < offsets.length; start += step) {
      const end = Math.min(start + chunkSize, offsets.length);
      chunks.push(this.createWindowChunk(source, offsets.slice(start, end)));
    }

    return chunks;
  }

  private createWindowChunk(source: Buffer, window: ReadonlyArray<ByteSpan>): Chunk {
    const first = window[0];
    const last = window[window.length - 1];
    const startByte = first ? first[0] : 0;
    const endByte = last ? last[1] : startByte;

    return createChunk({
      text: source.subarray(startByte, endByte).toString('utf8'),
      startByte,
      endByte,
      tokenCount: window.length,
    });
  }
}

export function tokenChunk(text: string, tokenizer: Tokenizer, options?: TokenChunkerOptions): Chunk[] {
  return new TokenChunker().chunk(text, tokenizer, options);
}
