import { parseSentenceChunkerOptions } from '../boundaries/chunker-options-parser';
import type { SentenceChunkerConfig } from '../schemas/chunker-schemas';
import { createChunk, createSentenceChunk } from './chunk';
import { combineShortSentences, splitSentences } from './sentence-splitter';
import type {
  Chunk,
  ChunkingStrategy,
  SentenceChunk,
  SentenceChunkerOptions,
  Tokenizer,
} from './types';
import { byteLength, isBlank } from './utils';

/**
 * Packs delimiter-bounded sentences into chunks of at most `chunkSize`
 * tokens. A chunk always holds `minSentencesPerChunk` sentences, even when
 * that takes it past the budget.
 */
export class SentenceChunker implements ChunkingStrategy<SentenceChunkerOptions, SentenceChunk[]> {
  readonly name = 'sentence';

  chunk(text: string, tokenizer: Tokenizer, options?: SentenceChunkerOptions): SentenceChunk[] {
    const config = parseSentenceChunkerOptions(options);
    if (isBlank(text)) return [];

    const sentences = this.prepareSentences(text, tokenizer, config);
    return this.pack(sentences, config);
  }

  private prepareSentences(text: string, tokenizer: Tokenizer, config: SentenceChunkerConfig): Chunk[] {
    const fragments = combineShortSentences(
      splitSentences(text, config.delimiters),
      config.shortSentenceThreshold
    );

    const sentences: Chunk[] = [];
    let cursor = 0;
    for (const fragment of fragments) {
      const endByte = cursor + byteLength(fragment);
      sentences.push(
        createChunk({
          text: fragment,
          startByte: cursor,
          endByte,
          tokenCount: tokenizer.encode(fragment).length,
        })
      );
      cursor = endByte;
    }
    return sentences;
  }

  private pack(sentences: ReadonlyArray<Chunk>, config: SentenceChunkerConfig): SentenceChunk[] {
    const chunks: SentenceChunk[] = [];
    let position = 0;

    while (position < sentences.length) {
      const splitIndex = this.findChunkEnd(sentences, position, config);
      chunks.push(createSentenceChunk(sentences.slice(position, splitIndex)));
      position = this.findOverlapStart(sentences, position, splitIndex, config);
    }

    return chunks;
  }

  // Index one past the last sentence of the chunk starting at `start`
  private findChunkEnd(
    sentences: ReadonlyArray<Chunk>,
    start: number,
    config: SentenceChunkerConfig
  ): number {
    let total = 0;
    let end = start;

    for (const sentence of sentences.slice(start)) {
      const included = end - start;
      if (total + sentence.tokenCount > config.chunkSize && included >= config.minSentencesPerChunk) {
        break;
      }
      total += sentence.tokenCount;
      end++;
    }

    return end;
  }

  /**
   * Start of the next chunk: walks back from the end of the current chunk
   * and stops at the first sentence that pushes the total past the overlap.
   * The overlap leaves room for the sentence at `splitIndex`, so the next
   * chunk always ends past this one. Always lands after `start`.
   */
  private findOverlapStart(
    sentences: ReadonlyArray<Chunk>,
    start: number,
    splitIndex: number,
    config: SentenceChunkerConfig
  ): number {
    const next = sentences[splitIndex];
    if (config.chunkOverlap === 0 || next === undefined) return splitIndex;

    const budget = Math.min(config.chunkOverlap, config.chunkSize - next.tokenCount);
    if (budget <= 0) return splitIndex;

    let total = 0;
    for (let i = splitIndex - 1; i >= start; i--) {
      total += sentences[i]?.tokenCount ?? 0;
      if (total > budget) return i + 1;
    }
    return start + 1;
  }
}

export function sentenceChunk(
  text: string,
  tokenizer: Tokenizer,
  options?: SentenceChunkerOptions
): SentenceChunk[] {
  return new SentenceChunker().chunk(text, tokenizer, options);
}
