import type { CallDirection, CanonicalSpecDocument } from "@shared/schema";
import type { SpecCatalog, SpecCatalogEntry } from "../../platform/catalog";
import { processSpecDocument } from "../spec/specEngine";
import type { SpecEngineOptions } from "../spec/specEngine";
import { computeSpecChecksum, serializeSpecModel } from "../spec/specSerializer";
import type { FeatureStability, ResolvedTypeNode, SpecDiagnostic } from "../spec/specContracts";
import type { ResolvedSpecModel } from "../spec/resolvedModel";

export class SpecServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly diagnostics: SpecDiagnostic[];

  constructor(code: string, message: string, statusCode = 400, diagnostics: SpecDiagnostic[] = []) {
    super(message);
    this.name = "SpecServiceError";
    this.code = code;
    this.statusCode = statusCode;
    this.diagnostics = diagnostics;
  }
}

export interface SpecValidationResponse {
  valid: boolean;
  diagnostics: SpecDiagnostic[];
  checksum?: string;
}

export interface SpecCallSummary {
  direction: CallDirection;
  name: string;
  feature: string;
  input: string;
  output: string;
  result: { ok: string; err: string };
}

export interface SpecSummary {
  id: string;
  title: string;
  revision: number;
  unique?: boolean;
  errorType: string;
  checksum: string;
  registeredAt: string;
  types: string[];
  features: Array<{ name: string } & FeatureStability>;
  calls: SpecCallSummary[];
}

export interface SpecTypeView {
  name: string;
  kind: ResolvedTypeNode["kind"];
  expression: string;
  /** Kind after following aliases. */
  concreteKind: ResolvedTypeNode["kind"];
  node: ResolvedTypeNode;
}

export interface RegisterSpecResult {
  summary: SpecSummary;
  /** False when the identical document was already registered. */
  created: boolean;
}

export function summarizeSpec(entry: SpecCatalogEntry): SpecSummary {
  const { model } = entry;
  return {
    id: model.id,
    title: model.title,
    revision: model.revision,
    ...(model.unique !== undefined ? { unique: model.unique } : {}),
    errorType: model.errorTypeName,
    checksum: entry.checksum,
    registeredAt: entry.registeredAt,
    types: model.listTypeNames(),
    features: model.listFeatures().map((f) => ({ name: f.name, ...f.stability })),
    calls: model.listCalls().map((call) => {
      const result = model.callResultType(call.direction, call.name);
      return {
        direction: call.direction,
        name: call.name,
        feature: call.feature,
        input: call.inputName,
        output: call.outputName,
        result: {
          ok: result ? model.formatType(result.ok) : call.outputName,
          err: result ? model.formatType(result.err) : model.errorTypeName,
        },
      };
    }),
  };
}

/** Validate without registering. */
export function validateSpecDocument(
  raw: unknown,
  options: SpecEngineOptions = {},
): SpecValidationResponse {
  const result = processSpecDocument(raw, options);
  if (!result.ok) {
    return { valid: false, diagnostics: result.diagnostics };
  }
  return { valid: true, diagnostics: [], checksum: computeSpecChecksum(result.model) };
}

// Pending registrations per catalog and document id.
const registrationQueues = new WeakMap<SpecCatalog, Map<string, Promise<void>>>();

/** Run `task` after every earlier registration of the same id has settled. */
async function withRegistrationLock<T>(
  catalog: SpecCatalog,
  id: string,
  task: () => Promise<T>,
): Promise<T> {
  let queues = registrationQueues.get(catalog);
  if (!queues) {
    queues = new Map<string, Promise<void>>();
    registrationQueues.set(catalog, queues);
  }

  const previous = queues.get(id) ?? Promise.resolve();
  const run = previous.then(task);
  const tail = run.then(
    () => undefined,
    () => undefined,
  );
  queues.set(id, tail);

  try {
    return await run;
  } finally {
    if (queues.get(id) === tail) queues.delete(id);
  }
}

/**
 * Validate and store the latest revision of a document.
 *
 * Lower revisions than the stored one are stale. At the same revision the
 * identical document is a no-op and a different one is a conflict.
 * Registrations of one id run one at a time, so the check and the write
 * cannot interleave with another registration in this process.
 */
export async function registerSpecDocument(
  catalog: SpecCatalog,
  raw: unknown,
  options: SpecEngineOptions = {},
): Promise<RegisterSpecResult> {
  const result = processSpecDocument(raw, options);
  if (!result.ok) {
    throw new SpecServiceError(
      "INVALID_SPEC",
      `Spec document has ${result.diagnostics.length} diagnostic(s)`,
      422,
      result.diagnostics,
    );
  }

  const model = result.model;
  const checksum = computeSpecChecksum(model);

  return withRegistrationLock(catalog, model.id, async () => {
    const existing = await catalog.get(model.id);

    if (existing) {
      if (model.revision < existing.model.revision) {
        throw new SpecServiceError(
          "STALE_REVISION",
          `Spec "${model.id}" is already at revision ${existing.model.revision}; got revision ${model.revision}`,
          409,
        );
      }
      if (model.revision === existing.model.revision) {
        if (checksum === existing.checksum) {
          return { summary: summarizeSpec(existing), created: false };
        }
        throw new SpecServiceError(
          "REVISION_CONFLICT",
          `Spec "${model.id}" revision ${model.revision} is already registered with different content`,
          409,
        );
      }
    }

    const entry: SpecCatalogEntry = { model, checksum, registeredAt: new Date().toISOString() };
    await catalog.put(entry);
    return { summary: summarizeSpec(entry), created: true };
  });
}

async function requireEntry(catalog: SpecCatalog, id: string): Promise<SpecCatalogEntry> {
  const entry = await catalog.get(id);
  if (!entry) {
    throw new SpecServiceError("SPEC_NOT_FOUND", `Spec "${id}" not found`, 404);
  }
  return entry;
}

export async function listSpecs(catalog: SpecCatalog): Promise<SpecSummary[]> {
  const entries = await catalog.list();
  return entries.map(summarizeSpec);
}

export async function getSpec(
  catalog: SpecCatalog,
  id: string,
): Promise<{ summary: SpecSummary; document: CanonicalSpecDocument }> {
  const entry = await requireEntry(catalog, id);
  return { summary: summarizeSpec(entry), document: serializeSpecModel(entry.model) };
}

function describeType(model: ResolvedSpecModel, name: string): SpecTypeView | null {
  const node = model.getType(name);
  const concrete = model.resolveConcrete(name);
  if (!node || !concrete) return null;
  return {
    name,
    kind: node.kind,
    expression: model.formatType(node.id, true),
    concreteKind: concrete.kind,
    node,
  };
}

export async function getSpecType(
  catalog: SpecCatalog,
  id: string,
  name: string,
): Promise<SpecTypeView> {
  const entry = await requireEntry(catalog, id);
  const view = describeType(entry.model, name);
  if (!view) {
    throw new SpecServiceError("TYPE_NOT_FOUND", `Type "${name}" not found in spec "${id}"`, 404);
  }
  return view;
}
