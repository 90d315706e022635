import { byteLength } from './utils';

export interface SentenceSpan {
  text: string;
  startByte: number;
  endByte: number;
}

/**
 * Locates each sentence in `text`, searching only past the end of the
 * previous match so repeated sentences map to their own occurrence. A
 * sentence that cannot be found is placed at the cursor.
 */
export function resolveSentenceSpans(text: string, sentences: ReadonlyArray<string>): SentenceSpan[] {
  const source = Buffer.from(text, 'utf8');
  const spans: SentenceSpan[] = [];
  let cursor = 0;

  for (const sentence of sentences) {
    const found = source.indexOf(sentence, cursor, 'utf8');
    const startByte = found === -1 ? cursor : found;
    const endByte = startByte + byteLength(sentence);
    spans.push({ text: sentence, startByte, endByte });
    cursor = endByte;
  }

  return spans;
}
