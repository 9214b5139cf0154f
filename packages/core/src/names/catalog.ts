import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const CatalogSchema = z.array(z.string().trim().min(1)).min(1).refine(
  (names) => new Set(names).size === names.length,
  { message: 'Catalog names must be unique' },
);

export class CatalogLoadError extends Error {
  name = 'CatalogLoadError';
  constructor(message: string, public readonly filePath?: string) {
    super(message);
  }
}

function getCatalogPath(): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    // packages/core/src/names
    resolve(thisDir, '..', '..', 'data', 'names.json'),
    // packages/cli/dist, bundled by tsup
    resolve(thisDir, '..', '..', 'core', 'data', 'names.json'),
    // dist/packages/core/src/names, emitted by tsc
    resolve(thisDir, '..', '..', '..', '..', '..', 'packages', 'core', 'data', 'names.json'),
  ];
  return candidates.find(existsSync) ?? candidates[0];
}

/** Parse and validate a catalog file. */
export function readNameCatalog(filePath: string): readonly string[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new CatalogLoadError(
      `Failed to read name catalog: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CatalogLoadError(
      `Failed to parse name catalog: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  const result = CatalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogLoadError(
      `Invalid name catalog: ${result.error.issues.map(i => i.message).join('; ')}`,
      filePath,
    );
  }
  return Object.freeze(result.data);
}

let defaultCatalog: readonly string[] | null = null;

/** The bundled catalog, read once per process. */
export function loadNameCatalog(): readonly string[] {
  if (!defaultCatalog) {
    defaultCatalog = readNameCatalog(getCatalogPath());
  }
  return defaultCatalog;
}
