export { NamePool, synthesizeName } from './pool.js';
export type { NameAllocation } from './pool.js';
export { loadNameCatalog, readNameCatalog, CatalogLoadError } from './catalog.js';
