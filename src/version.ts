import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJson = z.object({ version: z.string().default('0.0.0') });

function readVersion(relativePath: string): string {
  const pkgPath = new URL(relativePath, import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
  return PackageJson.parse(raw).version;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override. Resolved
 * relative to THIS FILE:
 * - src/version.ts (tsx, vitest): ../package.json
 * - dist/src/version.js (node): ../../package.json
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readVersion('../package.json');
    } catch {
      try {
        return readVersion('../../package.json');
      } catch {
        return '0.0.0';
      }
    }
  })();
