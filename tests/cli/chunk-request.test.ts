import { describe, it, expect, vi } from 'vitest';
import { buildChunkRequest, ignoredFlags, resolveStrategy } from '../../src/cli/chunk-request';
import { parseCliOptions } from '../../src/boundaries/cli-parser';
import type { Config } from '../../src/schemas/config-schemas';
import type { EmbeddingFunction } from '../../src/chunking/types';

const embed: EmbeddingFunction = (texts) => texts.map(() => [1]);

describe('buildChunkRequest', () => {
  it('uses the config file strategy when no flag is given', () => {
    const config: Config = { strategy: 'token', token: { chunkSize: 32 } };
    const request = buildChunkRequest(parseCliOptions({}), config, () => embed);

    expect(request).toEqual({ strategy: 'token', options: { chunkSize: 32 } });
  });

  it('lets flags override the config file block', () => {
    const config: Config = { strategy: 'sentence', word: { chunkSize: 64, chunkOverlap: 8 } };
    const cli = parseCliOptions({ strategy: 'word', chunkSize: '10' });

    expect(resolveStrategy(cli, config)).toBe('word');
    expect(buildChunkRequest(cli, config, () => embed)).toEqual({
      strategy: 'word',
      options: { chunkSize: 10, chunkOverlap: 8 },
    });
  });

  it('maps sentence flags to sentence options', () => {
    const cli = parseCliOptions({ minSentences: '2', delimiters: '\\n' });
    const request = buildChunkRequest(cli, { strategy: 'sentence' }, () => embed);

    expect(request).toEqual({
      strategy: 'sentence',
      options: { minSentencesPerChunk: 2, delimiters: ['\n'] },
    });
  });

  it('resolves the embedding function only for the semantic strategy', () => {
    const resolveEmbed = vi.fn(() => embed);

    buildChunkRequest(parseCliOptions({}), { strategy: 'word' }, resolveEmbed);
    expect(resolveEmbed).not.toHaveBeenCalled();

    const request = buildChunkRequest(
      parseCliOptions({ strategy: 'semantic', threshold: '0.3', minSentences: '2' }),
      { strategy: 'sentence', semantic: { similarityWindow: 0 } },
      resolveEmbed
    );
    expect(resolveEmbed).toHaveBeenCalledTimes(1);
    expect(request).toEqual({
      strategy: 'semantic',
      options: { similarityWindow: 0, threshold: 0.3, minSentences: 2 },
      embed,
    });
  });
});

describe('ignoredFlags', () => {
  it('lists flags the strategy has no option for', () => {
    const cli = parseCliOptions({ threshold: 'auto', chunkOverlap: '2', delimiters: '.' });

    expect(ignoredFlags('word', cli)).toEqual(['delimiters', 'threshold']);
    expect(ignoredFlags('sentence', cli)).toEqual(['threshold']);
    expect(ignoredFlags('semantic', cli)).toEqual(['chunkOverlap']);
  });
});
