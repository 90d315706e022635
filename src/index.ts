#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { registerChunkCommand } from './cli/commands';
import { getPackageInfo } from './config/package-info';
import { LOG_PREFIX } from './config/constants';

/*
 * Best-effort .env loader without external dependencies.
 * Loads environment variables from .env or .env.local files.
 */
function loadDotEnv(): void {
  const candidates = ['.env', '.env.local'];
  for (const filename of candidates) {
    const full = path.resolve(process.cwd(), filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || !match[2]) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
      break; // stop after first found
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Loading .env file');
      console.warn(`${LOG_PREFIX} Warning: ${err.message}`);
    }
  }
}

loadDotEnv();

program
  .name('spanchunk')
  .description('Split text into byte-addressed chunks by token, word, sentence or semantic boundaries')
  .version(getPackageInfo().version);

registerChunkCommand(program);

program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running spanchunk');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
