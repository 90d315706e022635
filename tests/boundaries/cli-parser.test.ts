import { describe, it, expect } from 'vitest';
import { parseCliOptions, parseDelimiterList } from '../../src/boundaries/cli-parser';
import { ValidationError } from '../../src/errors/index';

describe('CLI Parser', () => {
  it('applies defaults', () => {
    expect(parseCliOptions({})).toEqual({ output: 'line', specialTokens: false, verbose: false });
  });

  it('coerces numeric flags given as strings', () => {
    const options = parseCliOptions({
      strategy: 'semantic',
      chunkSize: '64',
      threshold: '0.5',
      similarityWindow: '0',
    });

    expect(options.strategy).toBe('semantic');
    expect(options.chunkSize).toBe(64);
    expect(options.threshold).toBe(0.5);
    expect(options.similarityWindow).toBe(0);
  });

  it('accepts auto as a threshold', () => {
    expect(parseCliOptions({ threshold: 'auto' }).threshold).toBe('auto');
  });

  it('keeps a fractional overlap', () => {
    expect(parseCliOptions({ chunkOverlap: '0.25' }).chunkOverlap).toBe(0.25);
  });

  it('rejects invalid values', () => {
    expect(() => parseCliOptions({ chunkSize: 'many' })).toThrow(ValidationError);
    expect(() => parseCliOptions({ strategy: 'paragraph' })).toThrow(ValidationError);
    expect(() => parseCliOptions({ output: 'xml' })).toThrow(ValidationError);
    expect(() => parseCliOptions({ threshold: '2' })).toThrow(ValidationError);
  });
});

describe('parseDelimiterList', () => {
  it('splits on commas and unescapes newlines and tabs', () => {
    expect(parseDelimiterList('.,!,\\n,\\t')).toEqual(['.', '!', '\n', '\t']);
  });

  it('drops empty entries', () => {
    expect(parseDelimiterList(',,?')).toEqual(['?']);
  });

  it('keeps unknown escapes as written', () => {
    expect(parseDelimiterList('\\x')).toEqual(['\\x']);
  });
});
