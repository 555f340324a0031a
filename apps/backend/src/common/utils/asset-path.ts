import { existsSync } from 'fs';
import { resolve } from 'path';

/**
 * Finds a non-TypeScript asset (prompt text, SQL) that lives beside the
 * sources of a module. Works from the repo root, from apps/backend, and from
 * compiled output next to src.
 */
export const resolveAssetPath = (moduleDir: string, relativePath: string): string => {
  const candidates = [
    resolve(process.cwd(), 'apps', 'backend', 'src', moduleDir, relativePath),
    resolve(process.cwd(), 'src', moduleDir, relativePath),
    resolve(__dirname, '..', '..', moduleDir, relativePath),
    resolve(__dirname, '..', '..', '..', 'src', moduleDir, relativePath),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(`Missing ${moduleDir} asset: ${relativePath}`);
};
