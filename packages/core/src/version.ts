/**
 * Version constants.
 *
 * Reads the version from the core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const packageDir = join(dirname(fileURLToPath(import.meta.url)), '..');
const pkg: unknown = JSON.parse(readFileSync(join(packageDir, 'package.json'), 'utf-8'));

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full version string (e.g., "0.3.0-beta") */
export const LAYOUTFORGE_VERSION: string = readVersion(pkg);

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.3.0-beta" → "0.3.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
