import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Get the package version.
 * Reads package.json once and caches the result. The relative path holds for
 * both src/utils and dist/utils.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const version =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg ? pkg.version : undefined;
    cachedVersion = typeof version === 'string' ? version : '0.0.0';
  } catch {
    // Running from an unusual layout (bundled, copied)
    cachedVersion = '0.0.0';
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
