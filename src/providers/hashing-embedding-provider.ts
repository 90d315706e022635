import { createHash } from 'crypto';
import { DEFAULT_HASHING_DIMENSIONS } from '../config/constants';
import type { EmbeddingProvider } from './embedding-provider';

const FEATURE_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Offline embeddings by feature hashing: every lowercased word adds +1 or -1
 * to one of `dimensions` buckets, picked by its SHA-256 digest. Vectors are
 * L2-normalized; text without words maps to the zero vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local';

  constructor(private readonly dimensions: number = DEFAULT_HASHING_DIMENSIONS) {}

  embed(texts: string[]): Promise<number[][]> {
    return Promise.resolve(texts.map((text) => this.embedOne(text)));
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const [feature] of text.toLowerCase().matchAll(FEATURE_PATTERN)) {
      const digest = createHash('sha256').update(feature, 'utf8').digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
