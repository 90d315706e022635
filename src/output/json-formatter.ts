import type { Chunk, ChunkerName, SentenceChunk } from '../chunking/types';
import { isSentenceChunk } from '../chunking/chunk-text';
import { getPackageInfo } from '../config/package-info';

export interface SpanRecord {
  text: string;
  startByte: number;
  endByte: number;
  tokenCount: number;
}

export interface ChunkRecord extends SpanRecord {
  index: number;
  sentences?: SpanRecord[];
}

export interface Result {
  chunks: ChunkRecord[];
  summary: {
    chunks: number;
    tokens: number;
    strategy: ChunkerName;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

function toSpanRecord(chunk: Chunk | SentenceChunk): SpanRecord {
  return {
    text: chunk.text,
    startByte: chunk.startByte,
    endByte: chunk.endByte,
    tokenCount: chunk.tokenCount,
  };
}

// Sentence embeddings are left out of the document
export class JsonFormatter {
  private chunks: ChunkRecord[] = [];
  private tokenCount = 0;

  constructor(private readonly strategy: ChunkerName) {}

  addChunk(chunk: Chunk | SentenceChunk): void {
    const record: ChunkRecord = { index: this.chunks.length, ...toSpanRecord(chunk) };
    if (isSentenceChunk(chunk)) {
      record.sentences = chunk.sentences.map(toSpanRecord);
    }
    this.chunks.push(record);
    this.tokenCount += chunk.tokenCount;
  }

  toResult(now: Date = new Date()): Result {
    return {
      chunks: this.chunks,
      summary: {
        chunks: this.chunks.length,
        tokens: this.tokenCount,
        strategy: this.strategy,
      },
      metadata: {
        version: getPackageInfo().version,
        timestamp: now.toISOString(),
      },
    };
  }

  toJson(): string {
    return JSON.stringify(this.toResult(), null, 2);
  }
}
