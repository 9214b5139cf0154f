import { loadNameCatalog } from './catalog.js';

export interface NameAllocation {
  name: string;
  /** True when the catalog was exhausted and the name was derived from the session id. */
  synthesized: boolean;
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function synthesizeName(sessionId: string): string {
  return `Session ${sessionId}`;
}

/**
 * Hands out display names from a fixed catalog.
 *
 * A session id always hashes to the same starting slot, and allocation
 * walks the catalog from there to the first free name, so the same id
 * tends to get the same name back across restarts.
 */
export class NamePool {
  private readonly catalog: readonly string[];
  private readonly catalogSet: ReadonlySet<string>;
  private readonly held = new Set<string>();

  constructor(catalog: readonly string[] = loadNameCatalog()) {
    this.catalog = catalog;
    this.catalogSet = new Set(catalog);
  }

  get size(): number {
    return this.catalog.length;
  }

  get available(): number {
    return this.catalog.length - this.held.size;
  }

  isHeld(name: string): boolean {
    return this.held.has(name);
  }

  allocate(sessionId: string): NameAllocation {
    const count = this.catalog.length;
    if (count > 0) {
      const start = fnv1a(sessionId) % count;
      for (let offset = 0; offset < count; offset++) {
        const name = this.catalog[(start + offset) % count];
        if (!this.held.has(name)) {
          this.held.add(name);
          return { name, synthesized: false };
        }
      }
    }
    return { name: synthesizeName(sessionId), synthesized: true };
  }

  /** Return a catalog name to the pool. Unknown and synthesized names are ignored. */
  release(name: string): void {
    if (this.catalogSet.has(name)) {
      this.held.delete(name);
    }
  }
}
