import type { SpecCatalog, SpecCatalogEntry } from "./SpecCatalog";

export class InMemorySpecCatalog implements SpecCatalog {
  private readonly entries = new Map<string, SpecCatalogEntry>();

  async get(id: string): Promise<SpecCatalogEntry | null> {
    return this.entries.get(id) ?? null;
  }

  async list(): Promise<SpecCatalogEntry[]> {
    // Code-unit order, independent of locale.
    return Array.from(this.entries.values()).sort((a, b) =>
      a.model.id < b.model.id ? -1 : a.model.id > b.model.id ? 1 : 0,
    );
  }

  async put(entry: SpecCatalogEntry): Promise<void> {
    this.entries.set(entry.model.id, entry);
  }
}
