import { byteLength } from './utils';

export const DEFAULT_DELIMITERS: ReadonlyArray<string> = ['.', '!', '?', '\n'];

/**
 * Cuts text right after every occurrence of every delimiter. Delimiters stay
 * at the end of their sentence and whitespace after them opens the next one,
 * so the fragments always join back to `text`.
 */
export function splitSentences(text: string, delimiters: ReadonlyArray<string>): string[] {
  const cuts = new Set<number>([text.length]);
  for (const delimiter of delimiters) {
    if (!delimiter) continue;
    let index = text.indexOf(delimiter);
    while (index !== -1) {
      cuts.add(index + delimiter.length);
      index = text.indexOf(delimiter, index + delimiter.length);
    }
  }

  const fragments: string[] = [];
  let start = 0;
  for (const cut of [...cuts].sort((a, b) => a - b)) {
    if (cut > start) {
      fragments.push(text.slice(start, cut));
    }
    start = cut;
  }
  return fragments;
}

/**
 * Appends fragments shorter than `threshold` bytes to the fragment before
 * them. A short leading fragment stays on its own. Single pass.
 */
export function combineShortSentences(fragments: ReadonlyArray<string>, threshold: number): string[] {
  const sentences: string[] = [];
  for (const fragment of fragments) {
    const previous = sentences.pop();
    if (previous === undefined) {
      sentences.push(fragment);
    } else if (byteLength(fragment) < threshold) {
      sentences.push(previous + fragment);
    } else {
      sentences.push(previous, fragment);
    }
  }
  return sentences;
}

/**
 * Appends fragments whose trimmed text has fewer than `minChars` characters
 * to the sentence being built.
 */
export function combineShortSentencesByChars(fragments: ReadonlyArray<string>, minChars: number): string[] {
  const sentences: string[] = [];
  let current = '';
  for (const fragment of fragments) {
    if ([...fragment.trim()].length < minChars) {
      current += fragment;
      continue;
    }
    if (current !== '') sentences.push(current);
    current = fragment;
  }
  if (current !== '') sentences.push(current);
  return sentences;
}
