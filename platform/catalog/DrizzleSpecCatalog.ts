import { asc, eq } from "drizzle-orm";
import {
  insertSpecDocumentSchema,
  specDocuments,
  type InsertSpecDocument,
  type SpecDocumentRow,
} from "@shared/schema";
import type { Database } from "../../server/db";
import { processSpecDocument } from "../../server/spec/specEngine";
import { serializeSpecModel } from "../../server/spec/specSerializer";
import { SpecEngineError } from "../../server/spec/specErrors";
import type { SpecCatalog, SpecCatalogEntry } from "./SpecCatalog";

/** Column values for an entry; the document itself is stored separately. */
export function toSpecDocumentColumns(entry: SpecCatalogEntry): InsertSpecDocument {
  return insertSpecDocumentSchema.parse({
    id: entry.model.id,
    title: entry.model.title,
    revision: entry.model.revision,
    checksum: entry.checksum,
    registeredAt: new Date(entry.registeredAt),
  });
}

/**
 * Rebuild an entry by running the stored canonical document back through
 * the engine. A row the engine now rejects is reported, never repaired.
 */
export function toCatalogEntry(row: SpecDocumentRow): SpecCatalogEntry {
  const result = processSpecDocument(row.document);
  if (!result.ok) {
    throw new SpecEngineError(
      "CORRUPT_ENTRY",
      `Stored spec "${row.id}" no longer validates (${result.diagnostics.length} diagnostic(s))`,
    );
  }
  return { model: result.model, checksum: row.checksum, registeredAt: row.registeredAt.toISOString() };
}

export class DrizzleSpecCatalog implements SpecCatalog {
  constructor(private readonly db: Database) {}

  async get(id: string): Promise<SpecCatalogEntry | null> {
    const [row] = await this.db.select().from(specDocuments).where(eq(specDocuments.id, id));
    return row ? toCatalogEntry(row) : null;
  }

  async list(): Promise<SpecCatalogEntry[]> {
    const rows = await this.db.select().from(specDocuments).orderBy(asc(specDocuments.id));
    return rows.map(toCatalogEntry);
  }

  async put(entry: SpecCatalogEntry): Promise<void> {
    const columns = toSpecDocumentColumns(entry);
    const document = serializeSpecModel(entry.model);
    await this.db
      .insert(specDocuments)
      .values({ ...columns, document })
      .onConflictDoUpdate({
        target: specDocuments.id,
        set: { ...columns, document },
      });
  }
}
