import type { ResolvedSpecModel } from "../../server/spec/resolvedModel";

export type SpecCatalogEntry = Readonly<{
  model: ResolvedSpecModel;
  checksum: string;
  registeredAt: string;
}>;

/**
 * SpecCatalog is a storage-only abstraction over accepted documents.
 *
 * Rules:
 * - One entry per document id: the latest accepted revision, never a history
 * - No validation; callers register only fully resolved models
 */
export interface SpecCatalog {
  get(id: string): Promise<SpecCatalogEntry | null>;

  list(): Promise<SpecCatalogEntry[]>;

  put(entry: SpecCatalogEntry): Promise<void>;
}
