/**
 * bifgen version constants.
 *
 * Reads version from @bifgen/core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Version field of the package.json one directory above `dir`, which is
 * the package root from both `src/` and `dist/`. A missing or unreadable
 * manifest reads as "0.0.0".
 */
export function readPackageVersion(dir: string): string {
  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(join(dir, '..', 'package.json'), 'utf-8'));
  } catch {
    return '0.0.0';
  }
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full bifgen version string (e.g., "0.1.0-beta") */
export const GENERATOR_VERSION: string = readPackageVersion(__dirname);

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.1.0-beta" → "0.1.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
