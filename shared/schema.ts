import { bigint, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// --- Type kinds ---

export const PRIMITIVE_KINDS = [
  "null",
  "bool",
  "i32",
  "u32",
  "i64",
  "u64",
  "f64",
  "bytes",
  "string",
] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

export const CONTAINER_KINDS = ["optional", "array", "struct", "enum", "namedType"] as const;

export type ContainerKind = (typeof CONTAINER_KINDS)[number];

export function isPrimitiveKind(value: string): value is PrimitiveKind {
  return PRIMITIVE_KINDS.some((kind) => kind === value);
}

export function isContainerKind(value: string): value is ContainerKind {
  return CONTAINER_KINDS.some((kind) => kind === value);
}

// --- Document fields ---

export const SPEC_ENVELOPE_KEY = "inversionApiSpec";

export const specIdSchema = z.string().min(1);
export const specTitleSchema = z.string();
// Revisions and member indices are unsigned 32-bit values.
export const U32_MAX = 0xffffffff;

export const specRevisionSchema = z.number().int().nonnegative().max(U32_MAX);
export const specTypeNameSchema = z.string().min(1);
export const specUniqueSchema = z.boolean().optional();

/** The raw mapping namespaces of a document, read entry by entry. */
export const SPEC_NAMESPACES = [
  "features",
  "unstableFeatures",
  "types",
  "callsOut",
  "callsIn",
] as const;

export type SpecNamespace = (typeof SPEC_NAMESPACES)[number];

export const stableFeatureSchema = z.object({
  doc: z.string().optional(),
  stablizedRevision: specRevisionSchema,
  deprecated: z.boolean().optional(),
});

export const unstableFeatureSchema = z.object({
  doc: z.string().optional(),
});

export const callSchema = z.object({
  feature: z.string().min(1),
  input: specTypeNameSchema,
  output: specTypeNameSchema,
});

/** Head of a type definition; `content` is read per kind by the graph builder. */
export const typeDefinitionHeadSchema = z.object({
  type: z.string().min(1),
  doc: z.string().optional(),
});

export const memberIndexSchema = z.number().int().nonnegative().max(U32_MAX);

export type StableFeatureInput = z.infer<typeof stableFeatureSchema>;
export type UnstableFeatureInput = z.infer<typeof unstableFeatureSchema>;
export type CallInput = z.infer<typeof callSchema>;
export type TypeDefinitionHead = z.infer<typeof typeDefinitionHeadSchema>;

export type CallDirection = "callsIn" | "callsOut";

export const CALL_DIRECTIONS: readonly CallDirection[] = ["callsOut", "callsIn"];

// --- Canonical (serialized) document shape ---

export type CanonicalTypeDefinition =
  | { type: PrimitiveKind; doc?: string }
  | { type: "optional" | "array"; doc?: string; content: CanonicalTypeDefinition }
  | {
      type: "struct" | "enum";
      doc?: string;
      content: Record<string, { index: number; content: CanonicalTypeDefinition }>;
    }
  | { type: "namedType"; doc?: string; content: string };

export interface CanonicalSpec {
  id: string;
  title: string;
  revision: number;
  errorType: string;
  unique?: boolean;
  features: Record<string, StableFeatureInput>;
  unstableFeatures: Record<string, UnstableFeatureInput>;
  types: Record<string, CanonicalTypeDefinition>;
  callsOut: Record<string, CallInput>;
  callsIn: Record<string, CallInput>;
}

export interface CanonicalSpecDocument {
  inversionApiSpec: CanonicalSpec;
}

// --- Catalog storage ---

export const specDocuments = pgTable("spec_documents", {
  id: text("id").primaryKey(),
  title: text("title").notNull(),
  revision: bigint("revision", { mode: "number" }).notNull(),
  checksum: text("checksum").notNull(),
  document: jsonb("document").$type<CanonicalSpecDocument>().notNull(),
  registeredAt: timestamp("registered_at").defaultNow().notNull(),
});

// The document column is written from the serializer's typed output.
export const insertSpecDocumentSchema = createInsertSchema(specDocuments, {
  id: specIdSchema,
  revision: specRevisionSchema,
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
}).omit({
  document: true,
});

export type InsertSpecDocument = z.infer<typeof insertSpecDocumentSchema>;
export type SpecDocumentRow = typeof specDocuments.$inferSelect;
