import { ValidationError } from '../errors/index';
import type { Chunk, SentenceChunk } from './types';
import { byteLength } from './utils';

export interface ChunkInit {
  text: string;
  startByte: number;
  endByte: number;
  /** May be 0 for text the tokenizer yields nothing for, such as a lone newline. */
  tokenCount: number;
  embedding?: ReadonlyArray<number> | null;
}

function isByteOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Builds a frozen chunk after checking that its span is well formed and
 * matches the byte length of its text.
 */
export function createChunk(init: ChunkInit): Chunk {
  const { text, startByte, endByte, tokenCount } = init;

  if (!isByteOffset(startByte) || !isByteOffset(endByte) || endByte < startByte) {
    throw new ValidationError(`Invalid chunk span [${startByte}, ${endByte})`);
  }
  if (byteLength(text) !== endByte - startByte) {
    throw new ValidationError(
      `Chunk text is ${byteLength(text)} bytes but its span [${startByte}, ${endByte}) covers ${endByte - startByte}`
    );
  }
  if (!Number.isInteger(tokenCount) || tokenCount < 0) {
    throw new ValidationError(`Invalid chunk token count: ${tokenCount}`);
  }

  return Object.freeze({
    text,
    startByte,
    endByte,
    tokenCount,
    embedding: init.embedding ? Object.freeze([...init.embedding]) : null,
  });
}

/**
 * Builds a frozen sentence chunk from contiguous sentence chunks. Text, span
 * and token count are derived from the sentences.
 */
export function createSentenceChunk(sentences: ReadonlyArray<Chunk>): SentenceChunk {
  const first = sentences[0];
  const last = sentences[sentences.length - 1];
  if (!first || !last) {
    throw new ValidationError('A sentence chunk needs at least one sentence');
  }

  let text = '';
  let tokenCount = 0;
  let cursor = first.startByte;
  for (const sentence of sentences) {
    if (sentence.startByte !== cursor) {
      throw new ValidationError(
        `Sentences are not contiguous: expected start ${cursor}, got ${sentence.startByte}`
      );
    }
    text += sentence.text;
    tokenCount += sentence.tokenCount;
    cursor = sentence.endByte;
  }

  return Object.freeze({
    text,
    startByte: first.startByte,
    endByte: last.endByte,
    tokenCount,
    sentences: Object.freeze([...sentences]),
  });
}
