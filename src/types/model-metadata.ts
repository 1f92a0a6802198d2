/**
 * Metadata record written to metadata.json and embedded in the catalog.
 * Field names match the JSON written to the catalog repository.
 */
export interface ModelMetadata {
  readonly name: string;
  readonly description: string;
  readonly author: string;          // GitHub login or "anonymous"
  readonly tags: readonly string[];
  readonly ipfs_cid: string;
  readonly size_mb: number;         // Rounded to 2 decimals
  readonly created_at: string;      // ISO-8601, UTC
}

/**
 * Catalog entry (one per published model, keyed by path)
 */
export type CatalogEntry = {
  name: string;
  author: string;
  description: string;
  tags: string[];
  ipfs_cid: string;
  size_mb: number;
  created_at: string;
  path: string;                     // models/<author>/<model-slug>
};

/**
 * A catalog entry as stored. Entries written by other tools are kept
 * verbatim; only `path` is interpreted.
 */
export type CatalogRecord = Record<string, unknown>;

/**
 * Contents of models/model-map.json
 */
export interface Catalog {
  models: CatalogRecord[];
}

/**
 * One regular file of an uploaded model directory (tree.json)
 */
export interface ModelTreeEntry {
  path: string;                     // Relative, '/'-separated
  size: number;                     // Bytes
}

/**
 * User-supplied description of a model submission
 */
export interface ModelSubmission {
  name: string;
  description: string;
  tags: string[];
  cid: string;
  modelPath?: string;               // Local directory, used for size and tree
}
