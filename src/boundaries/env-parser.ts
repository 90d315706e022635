import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatProviderValidationError(e, env)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType =
    typeof env === 'object' && env !== null && 'EMBEDDING_PROVIDER' in env
      ? String(env.EMBEDDING_PROVIDER)
      : undefined;

  // Check for discriminated union errors (invalid provider type)
  const discriminatorIssue = issues.find(
    (issue) =>
      issue.code === 'invalid_union_discriminator' ||
      (issue.path.length === 1 && issue.path[0] === 'EMBEDDING_PROVIDER')
  );
  if (discriminatorIssue) {
    return `EMBEDDING_PROVIDER must be either 'local' or 'openai'. Received: ${providerType ?? 'undefined'}`;
  }

  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (providerType === 'openai' && missingFields.some((field) => field.startsWith('OPENAI_'))) {
    return `Missing required OpenAI environment variables: ${missingFields.join(', ')}. When using EMBEDDING_PROVIDER=openai, ensure OPENAI_API_KEY is set.`;
  }

  const fieldErrors = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
}
