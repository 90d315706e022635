import { describe, it, expect } from 'vitest';
import { TokenChunker, tokenChunk } from '../../src/chunking/token-chunker';
import { RegexTokenizer } from '../../src/tokenizers/regex-tokenizer';
import { ConfigurationError } from '../../src/errors/index';

const tokenizer = new RegexTokenizer();

function spans(chunks: ReadonlyArray<{ text: string; startByte: number; endByte: number }>) {
  return chunks.map(({ text, startByte, endByte }) => [text, startByte, endByte]);
}

describe('TokenChunker', () => {
  it('windows tokens with overlap and keeps the text between them', () => {
    const chunks = tokenChunk('Some text to split', tokenizer, { chunkSize: 3, chunkOverlap: 1 });

    expect(spans(chunks)).toEqual([
      ['Some text to', 0, 12],
      ['to split', 10, 18],
    ]);
    expect(chunks.map((c) => c.tokenCount)).toEqual([3, 2]);
  });

  it('keeps stepping until the start passes the last token', () => {
    const chunks = tokenChunk('a b c d e', tokenizer, { chunkSize: 3, chunkOverlap: 1 });

    expect(spans(chunks)).toEqual([
      ['a b c', 0, 5],
      ['c d e', 4, 9],
      ['e', 8, 9],
    ]);
  });

  it('reads a fractional overlap as a share of the chunk size', () => {
    // floor(0.5 * 2) = 1 token of overlap, so a stride of 1
    const chunks = tokenChunk('one two three', tokenizer, { chunkSize: 2, chunkOverlap: 0.5 });

    expect(spans(chunks)).toEqual([
      ['one two', 0, 7],
      ['two three', 4, 13],
      ['three', 8, 13],
    ]);
  });

  it('reports byte spans for multi-byte text', () => {
    const chunks = tokenChunk('héllo wörld', tokenizer, { chunkSize: 1, chunkOverlap: 0 });

    expect(spans(chunks)).toEqual([
      ['héllo', 0, 6],
      ['wörld', 7, 13],
    ]);
  });

  it('drops zero-width special tokens', () => {
    const special = new RegexTokenizer({ specialTokens: true });
    const chunks = tokenChunk('Some text', special, { chunkSize: 2, chunkOverlap: 0 });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ text: 'Some text', startByte: 0, endByte: 9, tokenCount: 2 });
  });

  it('returns no chunks for empty or whitespace-only text', () => {
    expect(tokenChunk('', tokenizer)).toEqual([]);
    expect(tokenChunk('  \n ', tokenizer)).toEqual([]);
  });

  it('returns the input as a single chunk when it fits', () => {
    const chunks = new TokenChunker().chunk('just a few words', tokenizer);
    expect(spans(chunks)).toEqual([['just a few words', 0, 16]]);
  });

  it('rejects invalid options before reading the text', () => {
    expect(() => tokenChunk('x', tokenizer, { chunkSize: 3, chunkOverlap: 3 })).toThrow(
      ConfigurationError
    );
    expect(() => tokenChunk('x', tokenizer, { chunkSize: 3, chunkOverlap: 1.5 })).toThrow(
      ConfigurationError
    );
    expect(() => tokenChunk('x', tokenizer, { chunkSize: 0 })).toThrow(ConfigurationError);
  });
});
