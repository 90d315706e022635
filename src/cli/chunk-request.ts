import type { ChunkRequest } from '../chunking/chunk-text';
import type {
  ChunkerName,
  EmbeddingFunction,
  SemanticChunkerOptions,
  SentenceChunkerOptions,
  TokenChunkerOptions,
} from '../chunking/types';
import { parseDelimiterList } from '../boundaries/cli-parser';
import type { ChunkCliOptions } from '../schemas/cli-schemas';
import type { Config } from '../schemas/config-schemas';

// Flags each strategy has no option for
const UNUSED_FLAGS: Record<ChunkerName, ReadonlyArray<keyof ChunkCliOptions>> = {
  token: ['minSentences', 'delimiters', 'threshold', 'similarityWindow'],
  word: ['minSentences', 'delimiters', 'threshold', 'similarityWindow'],
  sentence: ['threshold', 'similarityWindow'],
  semantic: ['chunkOverlap'],
};

export function resolveStrategy(cli: ChunkCliOptions, config: Config): ChunkerName {
  return cli.strategy ?? config.strategy;
}

/**
 * Names of the flags that were given but do not apply to `strategy`.
 */
export function ignoredFlags(strategy: ChunkerName, cli: ChunkCliOptions): string[] {
  return UNUSED_FLAGS[strategy].filter((flag) => cli[flag] !== undefined);
}

function windowFlags(cli: ChunkCliOptions): TokenChunkerOptions {
  return {
    ...(cli.chunkSize !== undefined && { chunkSize: cli.chunkSize }),
    ...(cli.chunkOverlap !== undefined && { chunkOverlap: cli.chunkOverlap }),
  };
}

/**
 * Merges the config file block for the selected strategy with the CLI
 * flags, flags winning. `resolveEmbed` is only called for the semantic
 * strategy.
 */
export function buildChunkRequest(
  cli: ChunkCliOptions,
  config: Config,
  resolveEmbed: () => EmbeddingFunction
): ChunkRequest {
  const strategy = resolveStrategy(cli, config);
  const delimiters = cli.delimiters !== undefined ? parseDelimiterList(cli.delimiters) : undefined;

  switch (strategy) {
    case 'token':
      return { strategy, options: { ...config.token, ...windowFlags(cli) } };

    case 'word':
      return { strategy, options: { ...config.word, ...windowFlags(cli) } };

    case 'sentence': {
      const options: SentenceChunkerOptions = {
        ...config.sentence,
        ...windowFlags(cli),
        ...(cli.minSentences !== undefined && { minSentencesPerChunk: cli.minSentences }),
        ...(delimiters !== undefined && { delimiters }),
      };
      return { strategy, options };
    }

    case 'semantic': {
      const options: SemanticChunkerOptions = {
        ...config.semantic,
        ...(cli.chunkSize !== undefined && { chunkSize: cli.chunkSize }),
        ...(cli.minSentences !== undefined && { minSentences: cli.minSentences }),
        ...(cli.threshold !== undefined && { threshold: cli.threshold }),
        ...(cli.similarityWindow !== undefined && { similarityWindow: cli.similarityWindow }),
        ...(delimiters !== undefined && { delimiters }),
      };
      return { strategy, options, embed: resolveEmbed() };
    }
  }
}
