import { parseWordChunkerOptions } from '../boundaries/chunker-options-parser';
import { createChunk } from './chunk';
import type { Chunk, ChunkingStrategy, Tokenizer, WordChunkerOptions } from './types';
import { byteLength, isBlank, splitIntoWords } from './utils';

interface WordUnit {
  text: string;
  startByte: number;
  endByte: number;
  tokenCount: number;
}

/**
 * Packs whitespace-led words into chunks of at most `chunkSize` tokens. Each
 * new chunk repeats trailing words of the previous one worth up to
 * `chunkOverlap` tokens.
 */
export class WordChunker implements ChunkingStrategy<WordChunkerOptions, Chunk[]> {
  readonly name = 'word';

  chunk(text: string, tokenizer: Tokenizer, options?: WordChunkerOptions): Chunk[] {
    const { chunkSize, chunkOverlap } = parseWordChunkerOptions(options);
    if (isBlank(text)) return [];

    const units = this.measureWords(splitIntoWords(text), tokenizer);
    return this.pack(units, chunkSize, chunkOverlap);
  }

  private measureWords(words: ReadonlyArray<string>, tokenizer: Tokenizer): WordUnit[] {
    // Scoped to one call: repeated words are encoded once
    const tokenCounts = new Map<string, number>();
    const units: WordUnit[] = [];
    let cursor = 0;

    for (const word of words) {
      let tokenCount = tokenCounts.get(word);
      if (tokenCount === undefined) {
        tokenCount = tokenizer.encode(word).length;
        tokenCounts.set(word, tokenCount);
      }
      const endByte = cursor + byteLength(word);
      units.push({ text: word, startByte: cursor, endByte, tokenCount });
      cursor = endByte;
    }

    return units;
  }

  private pack(units: ReadonlyArray<WordUnit>, chunkSize: number, chunkOverlap: number): Chunk[] {
    const chunks: Chunk[] = [];
    let current: WordUnit[] = [];
    let currentTokens = 0;

    for (const unit of units) {
      if (current.length === 0 || currentTokens + unit.tokenCount <= chunkSize) {
        current.push(unit);
        currentTokens += unit.tokenCount;
        continue;
      }

      chunks.push(this.createWordChunk(current, currentTokens));

      const overlapBudget = Math.min(chunkOverlap, chunkSize - unit.tokenCount);
      const overlap = this.collectOverlap(current, overlapBudget);
      current = [...overlap, unit];
      currentTokens = current.reduce((total, u) => total + u.tokenCount, 0);
    }

    if (current.length > 0) {
      chunks.push(this.createWordChunk(current, currentTokens));
    }

    return chunks;
  }

  // Trailing units of `units`, in source order, summing to at most `budget` tokens
  private collectOverlap(units: ReadonlyArray<WordUnit>, budget: number): WordUnit[] {
    const overlap: WordUnit[] = [];
    let total = 0;

    for (let i = units.length - 1; i >= 0; i--) {
      const unit = units[i];
      if (!unit || total + unit.tokenCount > budget) break;
      overlap.unshift(unit);
      total += unit.tokenCount;
    }

    return overlap;
  }

  private createWordChunk(units: ReadonlyArray<WordUnit>, tokenCount: number): Chunk {
    const first = units[0];
    const last = units[units.length - 1];
    return createChunk({
      text: units.map((unit) => unit.text).join(''),
      startByte: first?.startByte ?? 0,
      endByte: last?.endByte ?? 0,
      tokenCount,
    });
  }
}

export function wordChunk(text: string, tokenizer: Tokenizer, options?: WordChunkerOptions): Chunk[] {
  return new WordChunker().chunk(text, tokenizer, options);
}
