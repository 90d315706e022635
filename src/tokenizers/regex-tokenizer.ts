import type { ByteSpan, Encoding, Tokenizer } from '../chunking/types';
import { byteLength } from '../chunking/utils';

// A run of letters, digits or underscores, or any single other visible character
const DEFAULT_PATTERN = /[\p{L}\p{N}_]+|[^\p{L}\p{N}_\s]/gu;

export interface RegexTokenizerOptions {
  pattern?: RegExp;
  // Adds zero-width tokens at both ends, the way BERT-style tokenizers add [CLS] and [SEP]
  specialTokens?: boolean;
}

export class RegexTokenizer implements Tokenizer {
  private readonly pattern: RegExp;
  private readonly specialTokens: boolean;

  constructor(options: RegexTokenizerOptions = {}) {
    const pattern = options.pattern ?? DEFAULT_PATTERN;
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    this.pattern = new RegExp(pattern.source, flags);
    this.specialTokens = options.specialTokens ?? false;
  }

  encode(text: string): Encoding {
    const offsets: ByteSpan[] = [];
    let charCursor = 0;
    let byteCursor = 0;

    for (const match of text.matchAll(this.pattern)) {
      const index = match.index ?? charCursor;
      const start = byteCursor + byteLength(text.slice(charCursor, index));
      const end = start + byteLength(match[0]);
      offsets.push([start, end]);
      charCursor = index + match[0].length;
      byteCursor = end;
    }

    if (this.specialTokens) {
      const total = byteLength(text);
      offsets.unshift([0, 0]);
      offsets.push([total, total]);
    }

    return { length: offsets.length, offsets };
  }
}
