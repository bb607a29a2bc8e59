import { readFileSync } from "node:fs";
import { processSpecDocument } from "../server/spec";
import { computeSpecChecksum } from "../server/spec/specSerializer";

function main() {
  const file = process.argv[2];
  if (!file) {
    throw new Error("Usage: tsx script/spec_smoke.ts <spec.json>");
  }

  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  const result = processSpecDocument(raw);

  if (!result.ok) {
    console.error(`[spec-smoke] ${file}: ${result.diagnostics.length} diagnostic(s)`);
    for (const d of result.diagnostics) {
      console.error(`  ${d.kind} at ${d.path.join(".") || "<document>"}: ${d.message}`);
    }
    process.exitCode = 1;
    return;
  }

  const { model } = result;
  console.log(`[spec-smoke] ${model.title} (${model.id}) revision ${model.revision}`);
  console.log(`  checksum  ${computeSpecChecksum(model)}`);
  console.log(`  errorType ${model.errorTypeName}`);
  for (const name of model.listTypeNames()) {
    const node = model.getType(name);
    if (node) console.log(`  type ${name} = ${model.formatType(node.id, true)}`);
  }
  for (const feature of model.listFeatures()) {
    const stability =
      feature.stability.status === "stable"
        ? `stable since revision ${feature.stability.stablizedRevision}`
        : "unstable";
    console.log(`  feature ${feature.name} (${stability})`);
  }
  for (const call of model.listCalls()) {
    const union = model.callResultType(call.direction, call.name);
    const err = union ? model.formatType(union.err) : model.errorTypeName;
    console.log(`  ${call.direction} ${call.name}: ${call.inputName} -> ${call.outputName} | ${err}`);
  }
}

main();
