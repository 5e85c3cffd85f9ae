import { indexContract } from "./contract.js";
import { diffFieldSets } from "./diff.js";
import type { DriftReport } from "./protocol.js";
import { extractFields, type RecordKind } from "./sast.js";
import { type SchemaNamer, suffixNamer, validateChanges } from "./validate.js";

export type DriftInput = {
  before: string;
  after: string;
  contract: string;
  fileNames?: { before?: string; after?: string; contract?: string };
};

export type DriftOptions = {
  schemaName?: SchemaNamer;
  recordKinds?: readonly RecordKind[];
};

/**
 * Extract both snapshots, diff them, and check the changes against the contract.
 *
 * Throws ParseError if any input fails to parse; no partial report is produced.
 */
export function checkDrift(input: DriftInput, options: DriftOptions = {}): DriftReport {
  const names = input.fileNames ?? {};
  const before = extractFields(input.before, { fileName: names.before ?? "before.ts", recordKinds: options.recordKinds });
  const after = extractFields(input.after, { fileName: names.after ?? "after.ts", recordKinds: options.recordKinds });
  const changes = diffFieldSets(before, after);
  const index = indexContract(input.contract, { fileName: names.contract });
  const violations = validateChanges(changes, index, { schemaName: options.schemaName ?? suffixNamer() });
  return Object.freeze({ changes, violations, schemaCount: index.size });
}
