import { describe, it, expect } from "vitest";
import {
  validateCallBindings,
  validateErrorType,
  validateFeatureNamespaces,
  validateMemberIndices,
  validateSpec,
  validateStabilityRevisions,
} from "../spec/schemaValidator";
import { analyzeSpec, loadKeyValueSpec, makeSpec } from "./helpers/specFixtures";

function errorTypeDiagnostics(raw: unknown) {
  const { document, built, resolution } = analyzeSpec(raw);
  return validateErrorType(built.graph, resolution, document);
}

describe("schemaValidator: pure validators", () => {
  describe("validateMemberIndices", () => {
    it("returns no errors for distinct indices", () => {
      const { built } = analyzeSpec(loadKeyValueSpec());
      expect(validateMemberIndices(built.graph)).toEqual([]);
    });

    it("reports each member that reuses an earlier index", () => {
      const { built } = analyzeSpec(
        makeSpec({
          types: {
            pair: {
              type: "struct",
              content: {
                a: { index: 0, content: { type: "bool" } },
                b: { index: 0, content: { type: "bool" } },
                c: { index: 0, content: { type: "bool" } },
                d: { index: 1, content: { type: "bool" } },
              },
            },
          },
        }),
      );

      expect(validateMemberIndices(built.graph)).toEqual([
        {
          kind: "DuplicateIndexError",
          message: 'struct "pair" assigns index 0 to both "a" and "b"',
          path: ["types", "pair"],
          details: { typeName: "pair", index: 0, members: ["a", "b"] },
        },
        {
          kind: "DuplicateIndexError",
          message: 'struct "pair" assigns index 0 to both "a" and "c"',
          path: ["types", "pair"],
          details: { typeName: "pair", index: 0, members: ["a", "c"] },
        },
      ]);
    });

    it("checks inline enums too", () => {
      const { built } = analyzeSpec(
        makeSpec({
          types: {
            wrapper: {
              type: "array",
              content: {
                type: "enum",
                content: {
                  on: { index: 4, content: { type: "null" } },
                  off: { index: 4, content: { type: "null" } },
                },
              },
            },
          },
        }),
      );

      const errors = validateMemberIndices(built.graph);
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('enum "types.wrapper.content" assigns index 4 to both "on" and "off"');
      expect(errors[0].path).toEqual(["types", "wrapper", "content"]);
    });

    it("ignores members whose index is malformed", () => {
      const { built } = analyzeSpec(
        makeSpec({
          types: {
            rec: {
              type: "struct",
              content: {
                a: { index: -1, content: { type: "bool" } },
                b: { index: -1, content: { type: "bool" } },
              },
            },
          },
        }),
      );
      expect(validateMemberIndices(built.graph)).toEqual([]);
    });
  });

  describe("validateErrorType", () => {
    it("accepts a struct error type", () => {
      expect(errorTypeDiagnostics(loadKeyValueSpec())).toEqual([]);
    });

    it("accepts an alias that resolves to a struct", () => {
      expect(
        errorTypeDiagnostics(
          makeSpec({
            errorType: "failure",
            types: { failure: { type: "namedType", content: "errorItem" } },
          }),
        ),
      ).toEqual([]);
    });

    it("rejects an enum error type", () => {
      const spec = loadKeyValueSpec();
      spec.inversionApiSpec.errorType = "enumItem";

      expect(errorTypeDiagnostics(spec)).toEqual([
        {
          kind: "InvalidErrorTypeError",
          message: 'errorType "enumItem" must resolve to a struct, found enum',
          path: ["errorType"],
          details: { errorType: "enumItem", resolvedKind: "enum" },
        },
      ]);
    });

    it("reports the concrete kind behind an alias", () => {
      const spec = loadKeyValueSpec();
      spec.inversionApiSpec.errorType = "namedTypeItem";
      expect(errorTypeDiagnostics(spec)[0].details).toEqual({
        errorType: "namedTypeItem",
        resolvedKind: "enum",
      });
    });

    it("names the primitive kind", () => {
      const spec = loadKeyValueSpec();
      spec.inversionApiSpec.errorType = "intItem";
      expect(errorTypeDiagnostics(spec)[0].message).toBe(
        'errorType "intItem" must resolve to a struct, found i32',
      );
    });

    it("leaves an unresolved error type to the resolver", () => {
      expect(errorTypeDiagnostics(makeSpec({ errorType: "missing" }))).toEqual([]);
    });
  });

  describe("validateFeatureNamespaces", () => {
    it("reports a feature declared stable and unstable", () => {
      const { document } = analyzeSpec(
        makeSpec({
          features: { get: { stablizedRevision: 0 } },
          unstableFeatures: { get: {}, scan: {} },
        }),
      );

      expect(validateFeatureNamespaces(document)).toEqual([
        {
          kind: "DuplicateFeatureError",
          message: 'Feature "get" is declared in both features and unstableFeatures',
          path: ["unstableFeatures", "get"],
          details: { feature: "get" },
        },
      ]);
    });

    it("returns no errors for disjoint namespaces", () => {
      const { document } = analyzeSpec(loadKeyValueSpec());
      expect(validateFeatureNamespaces(document)).toEqual([]);
    });
  });

  describe("validateCallBindings", () => {
    it("reports a call bound to an undeclared feature", () => {
      const { document } = analyzeSpec(
        makeSpec({
          callsOut: { ping: { feature: "pinging", input: "errorItem", output: "errorItem" } },
        }),
      );

      expect(validateCallBindings(document)).toEqual([
        {
          kind: "UnboundCallError",
          message: 'Call "ping" in callsOut is bound to undeclared feature "pinging"',
          path: ["callsOut", "ping", "feature"],
          details: { direction: "callsOut", call: "ping", feature: "pinging" },
        },
      ]);
    });

    it("accepts calls bound to unstable features", () => {
      const { document } = analyzeSpec(
        makeSpec({
          unstableFeatures: { preview: {} },
          callsIn: { peek: { feature: "preview", input: "errorItem", output: "errorItem" } },
        }),
      );
      expect(validateCallBindings(document)).toEqual([]);
    });

    it("does not look at input or output types", () => {
      const { document } = analyzeSpec(
        makeSpec({
          features: { put: { stablizedRevision: 0 } },
          callsIn: { put: { feature: "put", input: "ghost", output: "ghost" } },
        }),
      );
      expect(validateCallBindings(document)).toEqual([]);
    });
  });

  describe("validateStabilityRevisions", () => {
    it("reports a stabilization beyond the document revision", () => {
      const { document } = analyzeSpec(
        makeSpec({
          revision: 1,
          features: { now: { stablizedRevision: 1 }, later: { stablizedRevision: 2 } },
        }),
      );

      expect(validateStabilityRevisions(document)).toEqual([
        {
          kind: "FutureStabilizationError",
          message: 'Feature "later" claims stabilization at revision 2, but the document is at revision 1',
          path: ["features", "later", "stablizedRevision"],
          details: { feature: "later", stablizedRevision: 2, revision: 1 },
        },
      ]);
    });

    it("skips the check when the revision is malformed", () => {
      const { document } = analyzeSpec(
        makeSpec({ revision: "two", features: { later: { stablizedRevision: 9 } } }),
      );
      expect(validateStabilityRevisions(document)).toEqual([]);
    });
  });

  describe("validateSpec", () => {
    it("returns an empty array for a valid document", () => {
      const { document, built, resolution } = analyzeSpec(loadKeyValueSpec());
      expect(validateSpec(built.graph, resolution, document)).toEqual([]);
    });

    it("collects findings from every check", () => {
      const { document, built, resolution } = analyzeSpec(
        makeSpec({
          revision: 0,
          features: { f: { stablizedRevision: 3 } },
          unstableFeatures: { f: {} },
          callsOut: { x: { feature: "unknown", input: "errorItem", output: "errorItem" } },
          types: {
            pair: {
              type: "enum",
              content: {
                a: { index: 0, content: { type: "null" } },
                b: { index: 0, content: { type: "null" } },
              },
            },
          },
        }),
      );

      expect(validateSpec(built.graph, resolution, document).map((d) => d.kind)).toEqual([
        "DuplicateIndexError",
        "DuplicateFeatureError",
        "UnboundCallError",
        "FutureStabilizationError",
      ]);
    });
  });
});
