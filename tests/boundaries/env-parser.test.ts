import { describe, it, expect } from 'vitest';
import { parseEnvironment } from '../../src/boundaries/env-parser';
import { ValidationError } from '../../src/errors/index';

describe('Environment Parser', () => {
  describe('Local Configuration', () => {
    it('defaults to the local provider', () => {
      expect(parseEnvironment({})).toEqual({ EMBEDDING_PROVIDER: 'local', EMBEDDING_DIMENSIONS: 256 });
    });

    it('coerces the embedding dimensions', () => {
      const result = parseEnvironment({ EMBEDDING_PROVIDER: 'local', EMBEDDING_DIMENSIONS: '64' });
      expect(result).toEqual({ EMBEDDING_PROVIDER: 'local', EMBEDDING_DIMENSIONS: 64 });
    });

    it('ignores unrelated variables', () => {
      expect(parseEnvironment({ HOME: '/home/test', PATH: '/usr/bin' })).toEqual({
        EMBEDDING_PROVIDER: 'local',
        EMBEDDING_DIMENSIONS: 256,
      });
    });
  });

  describe('OpenAI Configuration', () => {
    it('parses valid OpenAI environment variables', () => {
      const result = parseEnvironment({
        EMBEDDING_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-key',
        OPENAI_EMBEDDING_MODEL: 'text-embedding-3-large',
        OPENAI_EMBEDDING_DIMENSIONS: '512',
      });

      expect(result.EMBEDDING_PROVIDER).toBe('openai');
      if (result.EMBEDDING_PROVIDER === 'openai') {
        expect(result.OPENAI_API_KEY).toBe('test-key');
        expect(result.OPENAI_EMBEDDING_MODEL).toBe('text-embedding-3-large');
        expect(result.OPENAI_EMBEDDING_DIMENSIONS).toBe(512);
      }
    });

    it('uses default values for optional OpenAI fields', () => {
      const result = parseEnvironment({ EMBEDDING_PROVIDER: 'openai', OPENAI_API_KEY: 'test-key' });

      if (result.EMBEDDING_PROVIDER === 'openai') {
        expect(result.OPENAI_EMBEDDING_MODEL).toBe('text-embedding-3-small');
        expect(result.OPENAI_EMBEDDING_DIMENSIONS).toBeUndefined();
      }
    });

    it('throws validation error for a missing API key', () => {
      expect(() => parseEnvironment({ EMBEDDING_PROVIDER: 'openai' })).toThrow(ValidationError);
      expect(() => parseEnvironment({ EMBEDDING_PROVIDER: 'openai' })).toThrow(
        'Missing required OpenAI environment variables: OPENAI_API_KEY'
      );
    });
  });

  it('throws validation error for an unknown provider', () => {
    expect(() => parseEnvironment({ EMBEDDING_PROVIDER: 'cohere' })).toThrow(
      "EMBEDDING_PROVIDER must be either 'local' or 'openai'. Received: cohere"
    );
  });

  it('reports invalid values by field', () => {
    expect(() => parseEnvironment({ EMBEDDING_DIMENSIONS: '-4' })).toThrow(
      'Invalid environment variable values: EMBEDDING_DIMENSIONS:'
    );
  });
});
