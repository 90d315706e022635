import type { Command } from 'commander';
import { readFileSync } from 'fs';
import * as path from 'path';
import { chunkText, type ChunkResult } from '../chunking/chunk-text';
import type { EmbeddingFunction } from '../chunking/types';
import { RegexTokenizer } from '../tokenizers/regex-tokenizer';
import { createEmbeddingProvider } from '../providers/provider-factory';
import { loadConfig, parseCliOptions, parseEnvironment } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { LOG_PREFIX } from '../config/constants';
import { log, setSilentMode, warn } from '../output/logger';
import { printChunkRow, printChunkSummary, printFileHeader } from '../output/reporter';
import { JsonFormatter } from '../output/json-formatter';
import type { ChunkCliOptions } from '../schemas/cli-schemas';
import type { Config } from '../schemas/config-schemas';
import { buildChunkRequest, ignoredFlags, resolveStrategy } from './chunk-request';
import { OutputFormat } from './types';

function readEnvironment(config: Config): NodeJS.ProcessEnv {
  const provider = config.embeddings?.provider;
  // Environment variables take precedence over the config file
  return provider ? { EMBEDDING_PROVIDER: provider, ...process.env } : process.env;
}

/*
 * Registers the chunk command with Commander.
 * Reads one file, chunks it with the selected strategy and prints the chunks.
 */
export function registerChunkCommand(program: Command): void {
  program
    .option('-s, --strategy <name>', 'Chunking strategy: token, word, sentence (default) or semantic')
    .option('--chunk-size <n>', 'Maximum tokens per chunk')
    .option('--chunk-overlap <n>', 'Tokens shared with the previous chunk (a fraction below 1 for token and word)')
    .option('--min-sentences <n>', 'Minimum sentences per chunk (sentence, semantic)')
    .option('--delimiters <list>', 'Comma separated sentence delimiters; \\n is a newline (sentence, semantic)')
    .option('--threshold <value>', 'Similarity threshold between 0 and 1, or auto (semantic)')
    .option('--similarity-window <n>', 'Neighbouring sentences embedded with each sentence (semantic)')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a .spanchunk.yaml config file')
    .option('--special-tokens', 'Count zero-width start and end tokens')
    .option('-v, --verbose', 'Enable verbose logging')
    .argument('<file>', 'text file to chunk')
    .action(async (file: string) => {
      // Parse and validate CLI options
      let cliOptions: ChunkCliOptions;
      try {
        cliOptions = parseCliOptions(program.opts());
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (cliOptions.output === OutputFormat.Json) {
        setSilentMode(true);
      }

      let config: Config;
      try {
        config = loadConfig(process.cwd(), cliOptions.config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      let text: string;
      try {
        text = readFileSync(path.resolve(process.cwd(), file), 'utf-8');
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Reading ${file}`);
        console.error(`Error: failed to read ${file}: ${err.message}`);
        process.exit(1);
      }

      const strategy = resolveStrategy(cliOptions, config);
      for (const flag of ignoredFlags(strategy, cliOptions)) {
        warn(`${LOG_PREFIX} Warning: --${flag.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)} has no effect with the ${strategy} strategy`);
      }

      const verbose = cliOptions.verbose;
      const resolveEmbed = (): EmbeddingFunction => {
        const env = parseEnvironment(readEnvironment(config));
        const provider = createEmbeddingProvider(env, { debug: verbose });
        if (verbose) {
          log(`${LOG_PREFIX} Embedding provider: ${provider.name}`);
        }
        return (texts) => provider.embed(texts);
      };

      let chunks: ChunkResult;
      try {
        const request = buildChunkRequest(cliOptions, config, resolveEmbed);
        if (verbose) {
          log(`${LOG_PREFIX} Strategy: ${request.strategy}`, request.options ?? {});
        }
        const tokenizer = new RegexTokenizer({ specialTokens: cliOptions.specialTokens });
        chunks = await chunkText(text, tokenizer, request);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Chunking');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (cliOptions.output === OutputFormat.Json) {
        const formatter = new JsonFormatter(strategy);
        chunks.forEach((chunk) => formatter.addChunk(chunk));
        console.log(formatter.toJson());
        return;
      }

      printFileHeader(path.relative(process.cwd(), file) || file, strategy);
      chunks.forEach((chunk, index) => printChunkRow(index, chunk));
      printChunkSummary(
        chunks.length,
        chunks.reduce((total, chunk) => total + chunk.tokenCount, 0),
        Buffer.byteLength(text, 'utf8')
      );
    });
}
