import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import { isSentenceChunk } from '../chunking/chunk-text';
import type { Chunk, ChunkerName, SentenceChunk } from '../chunking/types';
import { PREVIEW_WIDTH } from '../config/constants';

const INDEX_WIDTH = 6;
const SPAN_WIDTH = 16;
const COUNT_WIDTH = 24;

function padVisible(text: string, width: number): string {
  const pad = Math.max(0, width - stripAnsi(text).length);
  return text + ' '.repeat(pad);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Quoted, escaped chunk text cut to `width` characters with a trailing ellipsis.
 */
export function formatPreview(text: string, width: number = PREVIEW_WIDTH): string {
  const quoted = JSON.stringify(text);
  return quoted.length <= width ? quoted : `${quoted.slice(0, width - 1)}…`;
}

export function formatChunkRow(
  index: number,
  chunk: Chunk | SentenceChunk,
  previewWidth: number = PREVIEW_WIDTH
): string {
  const indexCell = padVisible(chalk.cyan(`#${index + 1}`), INDEX_WIDTH);
  const spanCell = padVisible(`[${chunk.startByte}, ${chunk.endByte})`, SPAN_WIDTH);
  const counts = isSentenceChunk(chunk)
    ? `${plural(chunk.tokenCount, 'token')}, ${plural(chunk.sentences.length, 'sentence')}`
    : plural(chunk.tokenCount, 'token');
  const countCell = padVisible(chalk.dim(counts), COUNT_WIDTH);
  return `  ${indexCell}${spanCell}${countCell}${formatPreview(chunk.text, previewWidth)}`;
}

export function printChunkRow(index: number, chunk: Chunk | SentenceChunk): void {
  console.log(formatChunkRow(index, chunk));
}

export function printFileHeader(fileRelPath: string, strategy: ChunkerName): void {
  console.log(`${chalk.underline(fileRelPath)} ${chalk.dim(`(${strategy})`)}`);
}

export function formatChunkSummary(chunks: number, tokens: number, bytes: number): string {
  const mark = chunks > 0 ? chalk.green('✓') : chalk.yellow('∅');
  return `${mark} ${plural(chunks, 'chunk')}, ${plural(tokens, 'token')} over ${plural(bytes, 'byte')}.`;
}

export function printChunkSummary(chunks: number, tokens: number, bytes: number): void {
  console.log('');
  console.log(formatChunkSummary(chunks, tokens, bytes));
}
