import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const REQUIRE = createRequire(import.meta.url);

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PACKAGE_JSON_SCHEMA>;

// src/config/ when run from sources, dist/ when run from the build
const CANDIDATES = ['../../package.json', '../package.json'];

let cached: PackageInfo | undefined;

export function getPackageInfo(): PackageInfo {
  if (cached) return cached;

  for (const candidate of CANDIDATES) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(file)) continue;
    // Using require to load JSON in ESM
    const raw: unknown = REQUIRE(file);
    const parsed = PACKAGE_JSON_SCHEMA.safeParse(raw);
    if (parsed.success && parsed.data.name === 'spanchunk') {
      cached = parsed.data;
      return cached;
    }
  }

  cached = { name: 'spanchunk', version: '0.0.0' };
  return cached;
}
