import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageVersion = z.object({ version: z.string() });

function readVersion(relative: string): string | null {
  const pkgPath = new URL(relative, import.meta.url);
  const parsed = PackageVersion.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8')));
  return parsed.success ? parsed.data.version : null;
}

/**
 * Generator version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Written into every exported flow document's metadata.
 *
 * Uses import.meta.url for path resolution to work in both:
 * - Dev mode: tsx src/cli.ts (executes .ts from src/)
 * - Prod mode: node dist/src/cli.js (executes .js from dist/src/)
 */
export const GENERATOR_VERSION =
  process.env.GENERATOR_VERSION ??
  ((): string => {
    try {
      // From src/version.ts: ../ goes to root (where package.json lives)
      return readVersion('../package.json') ?? '0.0.0';
    } catch {
      // dist/src/version.js sits one level deeper
      try {
        return readVersion('../../package.json') ?? '0.0.0';
      } catch {
        return '0.0.0';
      }
    }
  })();

/** Version of the flow document format */
export const EXPORT_VERSION = '1.1';
