import { ProcessingError } from '../errors/index';
import { createChunk } from './chunk';
import { combineShortSentencesByChars, splitSentences } from './sentence-splitter';
import { resolveSentenceSpans } from './span-resolver';
import type { Chunk, EmbeddingFunction, Tokenizer } from './types';

export interface SentencePreparationOptions {
  delimiters: ReadonlyArray<string>;
  minCharsPerSentence: number;
  similarityWindow: number;
}

/**
 * Joins every sentence with up to `window` neighbours on each side. The
 * result is what gets embedded, one entry per sentence.
 */
export function buildContextWindows(sentences: ReadonlyArray<string>, window: number): string[] {
  if (window === 0) return [...sentences];
  return sentences.map((_, index) =>
    sentences.slice(Math.max(0, index - window), index + window + 1).join('')
  );
}

function checkEmbeddings(vectors: ReadonlyArray<ReadonlyArray<number>>, expected: number): void {
  if (vectors.length !== expected) {
    throw new ProcessingError(
      `Embedding function returned ${vectors.length} vectors for ${expected} inputs`
    );
  }
  const dimension = vectors[0]?.length ?? 0;
  if (dimension === 0) {
    throw new ProcessingError('Embedding function returned empty vectors');
  }
  vectors.forEach((vector, index) => {
    if (vector.length !== dimension) {
      throw new ProcessingError(
        `Embedding ${index} has dimension ${vector.length}, expected ${dimension}`
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new ProcessingError(`Embedding ${index} contains non-finite values`);
    }
  });
}

/**
 * Splits text into sentences with exact byte spans and token counts, and
 * attaches to each one the embedding of its context window. The embedding
 * function is called once with every window.
 */
export async function prepareSentences(
  text: string,
  tokenizer: Tokenizer,
  embed: EmbeddingFunction,
  options: SentencePreparationOptions
): Promise<Chunk[]> {
  const sentences = combineShortSentencesByChars(
    splitSentences(text, options.delimiters),
    options.minCharsPerSentence
  );
  const spans = resolveSentenceSpans(text, sentences);
  const tokenCounts = sentences.map((sentence) => tokenizer.encode(sentence).length);

  const embeddings = await embed(buildContextWindows(sentences, options.similarityWindow));
  checkEmbeddings(embeddings, sentences.length);

  return spans.map((span, index) =>
    createChunk({
      ...span,
      tokenCount: tokenCounts[index] ?? 0,
      embedding: embeddings[index] ?? null,
    })
  );
}
