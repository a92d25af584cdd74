import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'strategic-claude-basic';

let cachedVersion: string | undefined;

/**
 * Walk up from this module until the CLI's own package.json is found.
 * Works both from src/ (tsx) and from dist/src/ (built).
 */
function findPackageJson(): string | undefined {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && parsed.name === PACKAGE_NAME) {
        return candidate;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  const packageJsonPath = findPackageJson();
  if (!packageJsonPath) {
    return '0.0.0';
  }
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  cachedVersion =
    typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
      ? parsed.version
      : '0.0.0';
  return cachedVersion;
}
