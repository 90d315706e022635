import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigurationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { formatZodIssues } from './chunker-options-parser';

/**
 * Load and validate configuration from .spanchunk.yaml. Without an explicit
 * path a missing file yields the defaults.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const filePath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(filePath)) {
    if (configPath) {
      throw new ConfigurationError(`Missing configuration file at ${filePath}`);
    }
    return CONFIG_SCHEMA.parse({});
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(filePath, 'utf-8')) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ConfigurationError(`Failed to parse ${filePath}: ${err.message}`);
  }

  try {
    return CONFIG_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ConfigurationError(`Invalid configuration in ${filePath}: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Configuration validation');
    throw new ConfigurationError(`Configuration validation failed: ${err.message}`);
  }
}
