import { getLogger } from "./logger.js";
import type { ChangeKind, ChangeRecord, FieldMap, FieldSet } from "./protocol.js";

const EMPTY: FieldSet = new Set();

export function diffFieldSets(before: FieldMap, after: FieldMap): ChangeRecord[] {
  const typeNames = new Set([...before.keys(), ...after.keys()]);
  const changes: ChangeRecord[] = [];

  for (const typeName of typeNames) {
    const beforeSet = before.get(typeName) ?? EMPTY;
    const afterSet = after.get(typeName) ?? EMPTY;

    for (const field of beforeSet) {
      if (!afterSet.has(field)) changes.push(change("DELETE", field, typeName));
    }
    for (const field of afterSet) {
      if (!beforeSet.has(field)) changes.push(change("ADD", field, typeName));
    }
  }

  getLogger("diff").debug({ types: typeNames.size, changes: changes.length }, "diffed field sets");
  return changes;
}

function change(kind: ChangeKind, field: string, typeName: string): ChangeRecord {
  return Object.freeze({ kind, field, typeName });
}
