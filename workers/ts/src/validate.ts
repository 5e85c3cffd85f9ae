import { getLogger } from "./logger.js";
import type { ChangeRecord, SchemaIndex, ViolationRecord } from "./protocol.js";

/** Maps a record type name to the contract schema that documents it. */
export type SchemaNamer = (typeName: string) => string;

export function suffixNamer(suffix = "Schema"): SchemaNamer {
  return (typeName) => `${typeName}${suffix}`;
}

export type ValidateOptions = {
  schemaName?: SchemaNamer;
};

/** Schema names that more than one distinct type name maps to. */
export function findSchemaCollisions(
  typeNames: Iterable<string>,
  schemaName: SchemaNamer = suffixNamer()
): Map<string, string[]> {
  const bySchema = new Map<string, Set<string>>();
  for (const typeName of typeNames) {
    const schema = schemaName(typeName);
    const owners = bySchema.get(schema) ?? new Set<string>();
    owners.add(typeName);
    bySchema.set(schema, owners);
  }
  const collisions = new Map<string, string[]>();
  for (const [schema, owners] of bySchema) {
    if (owners.size > 1) collisions.set(schema, [...owners]);
  }
  return collisions;
}

export function validateChanges(
  changes: readonly ChangeRecord[],
  index: SchemaIndex,
  options: ValidateOptions = {}
): ViolationRecord[] {
  const schemaName = options.schemaName ?? suffixNamer();
  const log = getLogger("validate");
  const violations: ViolationRecord[] = [];

  for (const [schema, typeNames] of findSchemaCollisions(changes.map((c) => c.typeName), schemaName)) {
    log.warn({ schema, typeNames }, "several record types map to one schema");
  }

  const skipped = new Set<string>();
  for (const change of changes) {
    const schema = schemaName(change.typeName);
    const schemaFields = index.get(schema);
    if (!schemaFields) {
      if (!skipped.has(schema)) {
        skipped.add(schema);
        log.info({ schema, typeName: change.typeName }, "schema not in contract, skipping");
      }
      continue;
    }

    const documented = schemaFields.includes(change.field);
    if (change.kind === "DELETE" && documented) {
      violations.push(
        Object.freeze({
          kind: "OUTDATED",
          field: change.field,
          schema,
          details: `Field deleted in code but remains in contract (${schema}).`,
        })
      );
    } else if (change.kind === "ADD" && !documented) {
      violations.push(
        Object.freeze({
          kind: "MISMATCH",
          field: change.field,
          schema,
          details: `Field added in code but missing from contract (${schema}).`,
        })
      );
    }
  }

  log.debug({ changes: changes.length, violations: violations.length }, "validated changes");
  return violations;
}
