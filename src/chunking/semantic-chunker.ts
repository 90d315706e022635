import { parseSemanticChunkerOptions } from '../boundaries/chunker-options-parser';
import { MAX_THRESHOLD_ITERATIONS } from '../config/constants';
import type { SemanticChunkerConfig } from '../schemas/chunker-schemas';
import { createSentenceChunk } from './chunk';
import { prepareSentences } from './semantic-sentences';
import { cosineSimilarity, mean, median, standardDeviation } from './statistics';
import type {
  Chunk,
  ChunkingStrategy,
  EmbeddingFunction,
  SemanticChunkerOptions,
  SentenceChunk,
  Tokenizer,
} from './types';
import { isBlank } from './utils';

export interface SplitRange {
  start: number;
  end: number;
}

/** Similarity of each sentence to the next one; one entry per adjacent pair. */
export function computePairwiseSimilarities(sentences: ReadonlyArray<Chunk>): number[] {
  const similarities: number[] = [];
  for (let i = 1; i < sentences.length; i++) {
    const previous = sentences[i - 1]?.embedding ?? [];
    const current = sentences[i]?.embedding ?? [];
    similarities.push(cosineSimilarity(previous, current));
  }
  return similarities;
}

/**
 * Per-sentence score: the mean similarity to its neighbours. Sentences at
 * either end have a single neighbour.
 */
export function averageNeighborScores(pairSimilarities: ReadonlyArray<number>): number[] {
  if (pairSimilarities.length === 0) return [];
  const scores: number[] = [];
  for (let i = 0; i <= pairSimilarities.length; i++) {
    const neighbours = [pairSimilarities[i - 1], pairSimilarities[i]].filter(
      (value): value is number => value !== undefined
    );
    scores.push(mean(neighbours));
  }
  return scores;
}

/**
 * Cuts after every sentence whose score is at or below `threshold` and
 * keeps the ranges holding at least `minSentences` sentences.
 */
export function findSplitRanges(
  scores: ReadonlyArray<number>,
  threshold: number,
  minSentences: number
): SplitRange[] {
  const ranges: SplitRange[] = [];
  let start = 0;
  scores.forEach((score, index) => {
    if (index === scores.length - 1 || score <= threshold) {
      ranges.push({ start, end: index + 1 });
      start = index + 1;
    }
  });
  return ranges.filter((range) => range.end - range.start >= minSentences);
}

function sumTokens(sentences: ReadonlyArray<Chunk>): number {
  return sentences.reduce((total, sentence) => total + sentence.tokenCount, 0);
}

/**
 * Binary search for a threshold whose groups all fall within
 * `[minChunkSize, chunkSize]` tokens. Group sizes do not shrink monotonically
 * with the threshold, so this is a heuristic: after the iteration cap the
 * midpoint of the remaining interval is returned.
 */
export function findOptimalThreshold(
  sentences: ReadonlyArray<Chunk>,
  pairSimilarities: ReadonlyArray<number>,
  scores: ReadonlyArray<number>,
  config: Pick<SemanticChunkerConfig, 'chunkSize' | 'minChunkSize' | 'minSentences' | 'thresholdStep'>
): number {
  const center = median(pairSimilarities);
  const spread = standardDeviation(pairSimilarities);
  let low = Math.max(center - spread, 0);
  let high = Math.min(center + spread, 1);

  for (
    let iteration = 0;
    iteration < MAX_THRESHOLD_ITERATIONS && Math.abs(high - low) > config.thresholdStep;
    iteration++
  ) {
    const threshold = (low + high) / 2;
    const tokenCounts = findSplitRanges(scores, threshold, config.minSentences).map((range) =>
      sumTokens(sentences.slice(range.start, range.end))
    );

    if (tokenCounts.every((count) => count >= config.minChunkSize && count <= config.chunkSize)) {
      return threshold;
    }
    if (tokenCounts.some((count) => count > config.chunkSize)) {
      // Groups too large: a higher threshold cuts more often
      low = threshold + config.thresholdStep;
    } else {
      high = threshold - config.thresholdStep;
    }
  }

  return Math.min(Math.max((low + high) / 2, 0), 1);
}

/**
 * Groups consecutive sentences whose context embeddings stay similar, then
 * packs each group into chunks of at most `chunkSize` tokens.
 */
export class SemanticChunker
  implements ChunkingStrategy<SemanticChunkerOptions, Promise<SentenceChunk[]>>
{
  readonly name = 'semantic';

  constructor(private readonly embed: EmbeddingFunction) {}

  // Options are checked before any asynchronous work starts
  chunk(text: string, tokenizer: Tokenizer, options?: SemanticChunkerOptions): Promise<SentenceChunk[]> {
    const config = parseSemanticChunkerOptions(options);
    return this.run(text, tokenizer, config);
  }

  private async run(
    text: string,
    tokenizer: Tokenizer,
    config: SemanticChunkerConfig
  ): Promise<SentenceChunk[]> {
    if (isBlank(text)) return [];

    const sentences = await prepareSentences(text, tokenizer, this.embed, config);
    if (sentences.length <= config.minSentences) {
      return [createSentenceChunk(sentences)];
    }

    const pairSimilarities = computePairwiseSimilarities(sentences);
    const scores = averageNeighborScores(pairSimilarities);
    const threshold =
      config.threshold === 'auto'
        ? findOptimalThreshold(sentences, pairSimilarities, scores, config)
        : config.threshold;

    return findSplitRanges(scores, threshold, config.minSentences).flatMap((range) =>
      this.packGroup(sentences.slice(range.start, range.end), config)
    );
  }

  private packGroup(group: ReadonlyArray<Chunk>, config: SemanticChunkerConfig): SentenceChunk[] {
    const chunks: SentenceChunk[] = [];
    let current: Chunk[] = [];
    let currentTokens = 0;

    for (const sentence of group) {
      const nextTokens = currentTokens + sentence.tokenCount;
      if (nextTokens <= config.chunkSize || current.length < config.minSentences) {
        current.push(sentence);
        currentTokens = nextTokens;
        continue;
      }
      chunks.push(createSentenceChunk(current));
      current = [sentence];
      currentTokens = sentence.tokenCount;
    }

    if (current.length > 0) {
      chunks.push(createSentenceChunk(current));
    }
    return chunks;
  }
}

export function semanticChunk(
  text: string,
  tokenizer: Tokenizer,
  embed: EmbeddingFunction,
  options?: SemanticChunkerOptions
): Promise<SentenceChunk[]> {
  return new SemanticChunker(embed).chunk(text, tokenizer, options);
}
