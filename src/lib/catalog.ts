import { Catalog, CatalogEntry, CatalogRecord, ModelMetadata } from '../types/model-metadata';

/**
 * Location of the shared catalog in the catalog repository
 */
export const CATALOG_PATH = 'models/model-map.json';

export interface ParsedCatalog {
  catalog: Catalog;
  problem: string | null;   // Why the stored content was discarded, if it was
}

export interface MergeResult {
  catalog: Catalog;
  replaced: boolean;        // true = an entry with the same path was updated
  index: number;            // Position of the new entry
}

export function emptyCatalog(): Catalog {
  return { models: [] };
}

function isRecord(value: unknown): value is CatalogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse stored catalog text.
 * Invalid JSON, or JSON without a `models` array, yields an empty catalog
 * together with a description of the problem. Other top-level keys are kept.
 */
export function parseCatalog(text: string): ParsedCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { catalog: emptyCatalog(), problem: `model map is not valid JSON (${reason})` };
  }

  const models: unknown = isRecord(parsed) ? parsed.models : undefined;
  if (!isRecord(parsed) || !Array.isArray(models)) {
    return { catalog: emptyCatalog(), problem: 'model map has no "models" array' };
  }

  const records = models.filter(isRecord);
  const dropped = models.length - records.length;

  return {
    catalog: { ...parsed, models: records },
    problem: dropped > 0 ? `dropped ${dropped} malformed model map entr${dropped === 1 ? 'y' : 'ies'}` : null,
  };
}

/**
 * Project metadata into a catalog entry stored under `path`
 */
export function toCatalogEntry(metadata: ModelMetadata, path: string): CatalogEntry {
  return {
    name: metadata.name,
    author: metadata.author,
    description: metadata.description,
    tags: [...metadata.tags],
    ipfs_cid: metadata.ipfs_cid,
    size_mb: metadata.size_mb,
    created_at: metadata.created_at,
    path,
  };
}

/**
 * Insert an entry keyed by its path.
 * An existing entry with the same path is replaced in place; otherwise the
 * entry is appended. The input catalog is not modified.
 */
export function mergeCatalogEntry(catalog: Catalog, entry: CatalogEntry): MergeResult {
  const models = [...catalog.models];
  const index = models.findIndex((model) => model.path === entry.path);

  if (index >= 0) {
    models[index] = entry;
    return { catalog: { ...catalog, models }, replaced: true, index };
  }

  models.push(entry);
  return { catalog: { ...catalog, models }, replaced: false, index: models.length - 1 };
}

/**
 * Serialize as stored in the repository (2-space indentation)
 */
export function serializeCatalog(catalog: Catalog): string {
  return JSON.stringify(catalog, null, 2);
}
