import { describe, it, expect, vi } from 'vitest';
import {
  SemanticChunker,
  averageNeighborScores,
  computePairwiseSimilarities,
  findOptimalThreshold,
  findSplitRanges,
  semanticChunk,
} from '../../src/chunking/semantic-chunker';
import { buildContextWindows } from '../../src/chunking/semantic-sentences';
import { createChunk } from '../../src/chunking/chunk';
import { RegexTokenizer } from '../../src/tokenizers/regex-tokenizer';
import type { Chunk } from '../../src/chunking/types';
import { ConfigurationError, ProcessingError } from '../../src/errors/index';

const tokenizer = new RegexTokenizer();

// Four sentences of 3 tokens each: two about cats, two about cars
const TEXT = 'Cats purr. Cats meow. Cars honk. Cars race.';

// Topic vectors: [cat, car]
function topicEmbed(texts: string[]): number[][] {
  return texts.map((text) => [text.includes('Cat') ? 1 : 0, text.includes('Car') ? 1 : 0]);
}

function spans(chunks: ReadonlyArray<{ text: string; startByte: number; endByte: number }>) {
  return chunks.map(({ text, startByte, endByte }) => [text, startByte, endByte]);
}

function sentencesOf(tokenCounts: number[]): Chunk[] {
  let cursor = 0;
  return tokenCounts.map((tokenCount) => {
    const chunk = createChunk({ text: 'ab', startByte: cursor, endByte: cursor + 2, tokenCount });
    cursor += 2;
    return chunk;
  });
}

describe('semantic scoring', () => {
  it('computes the similarity of each adjacent pair', () => {
    const sentences = [[1, 0], [1, 0], [0, 1]].map((embedding, i) =>
      createChunk({ text: 'a', startByte: i, endByte: i + 1, tokenCount: 1, embedding })
    );
    expect(computePairwiseSimilarities(sentences)).toEqual([1, 0]);
  });

  it('averages each sentence with its neighbours', () => {
    expect(averageNeighborScores([1, 0, 1])).toEqual([1, 0.5, 0.5, 1]);
    expect(averageNeighborScores([])).toEqual([]);
  });

  it('cuts after scores at or below the threshold and after the last sentence', () => {
    expect(findSplitRanges([1, 0.5, 0.5, 1], 0.6, 1)).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 3 },
      { start: 3, end: 4 },
    ]);
    expect(findSplitRanges([1, 0.5, 0.5, 1], 0.4, 1)).toEqual([{ start: 0, end: 4 }]);
  });

  it('drops ranges with fewer than the minimum sentences', () => {
    expect(findSplitRanges([1, 0.5, 0.5, 1], 0.6, 2)).toEqual([{ start: 0, end: 2 }]);
  });

  it('joins each sentence with its neighbours for embedding', () => {
    expect(buildContextWindows(['a', 'b', 'c'], 1)).toEqual(['ab', 'abc', 'bc']);
    expect(buildContextWindows(['a', 'b', 'c'], 0)).toEqual(['a', 'b', 'c']);
  });
});

describe('findOptimalThreshold', () => {
  const config = { chunkSize: 512, minChunkSize: 2, minSentences: 1, thresholdStep: 0.01 };

  it('accepts the first midpoint whose groups all fit', () => {
    const pairs = [1, 0, 1];
    const threshold = findOptimalThreshold(sentencesOf([3, 3, 3, 3]), pairs, averageNeighborScores(pairs), config);

    // median 1, population standard deviation sqrt(2)/3
    const low = 1 - Math.sqrt(2) / 3;
    expect(threshold).toBeCloseTo((low + 1) / 2, 10);
  });

  it('returns the median when the similarities do not spread', () => {
    const pairs = [0.5, 0.5];
    expect(findOptimalThreshold(sentencesOf([3, 3, 3]), pairs, averageNeighborScores(pairs), config)).toBe(0.5);
  });

  it('stays inside the unit interval when no threshold fits', () => {
    const pairs = [0.9, 0.1, 0.8, 0.2];
    const threshold = findOptimalThreshold(
      sentencesOf([50, 50, 50, 50, 50]),
      pairs,
      averageNeighborScores(pairs),
      { ...config, chunkSize: 10 }
    );
    expect(threshold).toBeGreaterThanOrEqual(0);
    expect(threshold).toBeLessThanOrEqual(1);
  });
});

describe('SemanticChunker', () => {
  it('splits where the topic changes under a fixed threshold', async () => {
    const chunks = await semanticChunk(TEXT, tokenizer, topicEmbed, {
      threshold: 0.6,
      similarityWindow: 0,
    });

    expect(spans(chunks)).toEqual([
      ['Cats purr. Cats meow.', 0, 21],
      [' Cars honk.', 21, 32],
      [' Cars race.', 32, 43],
    ]);
    expect(chunks[0]?.sentences.map((s) => s.embedding)).toEqual([
      [1, 0],
      [1, 0],
    ]);
  });

  it('keeps everything together under a low threshold', async () => {
    const chunks = await semanticChunk(TEXT, tokenizer, topicEmbed, {
      threshold: 0.4,
      similarityWindow: 0,
    });
    expect(spans(chunks)).toEqual([[TEXT, 0, 43]]);
    expect(chunks[0]?.tokenCount).toBe(12);
  });

  it('never yields fewer chunks for a higher threshold', async () => {
    const options = { similarityWindow: 0 };
    const low = await semanticChunk(TEXT, tokenizer, topicEmbed, { ...options, threshold: 0.1 });
    const high = await semanticChunk(TEXT, tokenizer, topicEmbed, { ...options, threshold: 0.9 });

    expect(high.length).toBeGreaterThanOrEqual(low.length);
  });

  it('repacks a group that exceeds the chunk size', async () => {
    const chunks = await semanticChunk(TEXT, tokenizer, topicEmbed, {
      threshold: 0.4,
      similarityWindow: 0,
      chunkSize: 3,
    });
    expect(chunks.map((c) => c.tokenCount)).toEqual([3, 3, 3, 3]);
    expect(chunks.map((c) => c.startByte)).toEqual([0, 10, 21, 32]);
  });

  it('finds a threshold automatically', async () => {
    const chunks = await semanticChunk(TEXT, tokenizer, topicEmbed, { similarityWindow: 0 });
    expect(spans(chunks)).toEqual([
      ['Cats purr. Cats meow.', 0, 21],
      [' Cars honk.', 21, 32],
      [' Cars race.', 32, 43],
    ]);
  });

  it('embeds context windows in a single call', async () => {
    const embed = vi.fn(topicEmbed);
    await new SemanticChunker(embed).chunk('A. B. C.', tokenizer, { threshold: 0.5 });

    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledWith(['A. B.', 'A. B. C.', ' B. C.']);
  });

  it('accepts an asynchronous embedding function', async () => {
    const embed = (texts: string[]) => Promise.resolve(topicEmbed(texts));
    const chunks = await semanticChunk(TEXT, tokenizer, embed, { threshold: 0.4, similarityWindow: 0 });
    expect(chunks).toHaveLength(1);
  });

  it('returns one chunk for a single sentence', async () => {
    const chunks = await semanticChunk('Just one sentence', tokenizer, topicEmbed);
    expect(spans(chunks)).toEqual([['Just one sentence', 0, 17]]);
  });

  it('returns no chunks for blank text without embedding anything', async () => {
    const embed = vi.fn(topicEmbed);
    await expect(semanticChunk('   ', tokenizer, embed)).resolves.toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });

  it('validates options before any work starts', () => {
    expect(() => semanticChunk(TEXT, tokenizer, topicEmbed, { threshold: 1.5 })).toThrow(
      ConfigurationError
    );
  });

  it('rejects an embedding function that returns the wrong number of vectors', async () => {
    await expect(semanticChunk(TEXT, tokenizer, () => [])).rejects.toBeInstanceOf(ProcessingError);
  });

  it('rejects vectors of different dimensions', async () => {
    const ragged = (texts: string[]) => texts.map((_, i) => (i === 0 ? [1, 0] : [1]));
    await expect(semanticChunk(TEXT, tokenizer, ragged)).rejects.toThrow(
      'Embedding 1 has dimension 1, expected 2'
    );
  });

  it('passes embedding errors through unchanged', async () => {
    const failure = new Error('embedding service unavailable');
    const failing = () => {
      throw failure;
    };
    await expect(semanticChunk(TEXT, tokenizer, failing)).rejects.toBe(failure);
  });
});
