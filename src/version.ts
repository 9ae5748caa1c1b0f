import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageManifest = z.object({ version: z.string() });

function readPackageVersion(relative: string): string | undefined {
  try {
    const pkgPath = new URL(relative, import.meta.url);
    const parsed = PackageManifest.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8')));
    return parsed.success ? parsed.data.version : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Tool version (single source of truth)
 *
 * Reads from package.json, resolved relative to this file so it works both
 * from src/version.ts (vitest) and dist/src/version.js (built bin).
 */
export const TOOL_VERSION: string =
  readPackageVersion('../package.json') ?? readPackageVersion('../../package.json') ?? '0.0.0';
