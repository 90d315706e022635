const WORD_PATTERN = /\s*\S+/g;

/**
 * Splits text into words, each carrying the whitespace that precedes it.
 * Trailing whitespace becomes a final unit so the result joins back to `text`.
 */
export function splitIntoWords(text: string): string[] {
  const words: string[] = [...(text.match(WORD_PATTERN) ?? [])];
  const covered = words.reduce((total, word) => total + word.length, 0);
  if (covered < text.length) {
    words.push(text.slice(covered));
  }
  return words;
}

export function isBlank(text: string): boolean {
  return text.trim() === '';
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

export function sliceBytes(source: string | Buffer, start: number, end: number): string {
  const bytes = typeof source === 'string' ? Buffer.from(source, 'utf8') : source;
  return bytes.subarray(start, end).toString('utf8');
}
