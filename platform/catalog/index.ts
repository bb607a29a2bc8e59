/**
 * Spec Catalog Module
 *
 * Keeps the latest accepted resolved model per document id.
 *
 * @module platform/catalog
 */

export type { SpecCatalog, SpecCatalogEntry } from "./SpecCatalog";
export { InMemorySpecCatalog } from "./InMemorySpecCatalog";
export { DrizzleSpecCatalog, toCatalogEntry, toSpecDocumentColumns } from "./DrizzleSpecCatalog";
