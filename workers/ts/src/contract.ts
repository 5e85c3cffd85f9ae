import { type Document, type YAMLMap, isAlias, isMap, isScalar, isSeq, parseDocument } from "yaml";
import { ParseError } from "./errors.js";
import { getLogger } from "./logger.js";
import type { SchemaIndex } from "./protocol.js";

const SCHEMAS_PATH = ["components", "schemas"] as const;
const MERGE_KEY = "<<";

export type IndexContractOptions = {
  fileName?: string;
};

/**
 * Build the schema index of an OpenAPI-style document: each entry under
 * `components.schemas` maps to its `properties` keys in document order.
 *
 * A document without that path yields an empty index. `$ref` is not followed.
 *
 * @throws ParseError when the document is not valid YAML
 */
export function indexContract(documentText: string, options: IndexContractOptions = {}): SchemaIndex {
  const fileName = options.fileName ?? "contract.yaml";
  const log = getLogger("contract");
  const doc = parseDocument(documentText, { merge: true });

  if (doc.errors.length > 0) {
    throw new ParseError("contract", fileName, doc.errors.map((e) => e.message));
  }
  for (const warning of doc.warnings) {
    log.warn({ fileName, warning: warning.message }, "contract parse warning");
  }

  const index = new Map<string, readonly string[]>();
  let schemas: unknown = doc.contents;
  for (const key of SCHEMAS_PATH) {
    schemas = isMap(schemas) ? mapEntries(doc, schemas).get(key) : undefined;
  }
  const entries = isMap(schemas) ? mapEntries(doc, schemas) : new Map<string, unknown>();
  if (entries.size === 0) {
    log.warn({ fileName }, "no schemas found in contract");
    return index;
  }

  for (const [schemaName, entry] of entries) {
    const properties = isMap(entry) ? mapEntries(doc, entry).get("properties") : undefined;
    index.set(schemaName, Object.freeze(isMap(properties) ? [...mapEntries(doc, properties).keys()] : []));
  }

  log.debug({ fileName, schemas: index.size }, "indexed contract");
  return index;
}

function resolve(doc: Document, node: unknown): unknown {
  return isAlias(node) ? node.resolve(doc) : node;
}

/**
 * Entries of a mapping with aliases resolved and `<<` merge keys expanded. Merged keys
 * come first; an explicit key overrides the merged value but keeps the merged position.
 */
function mapEntries(doc: Document, map: YAMLMap, seen: ReadonlySet<YAMLMap> = new Set()): Map<string, unknown> {
  const merged = new Map<string, unknown>();
  const own = new Map<string, unknown>();
  const visiting = new Set([...seen, map]);

  for (const pair of map.items) {
    if (!isScalar(pair.key)) continue;
    if (isMergeKey(pair.key.value)) {
      for (const source of mergeSources(doc, pair.value)) {
        if (visiting.has(source)) continue;
        for (const [key, value] of mapEntries(doc, source, visiting)) {
          if (!merged.has(key)) merged.set(key, value);
        }
      }
      continue;
    }
    own.set(String(pair.key.value), resolve(doc, pair.value));
  }

  for (const [key, value] of own) merged.set(key, value);
  return merged;
}

// Newer yaml releases resolve the merge key to a symbol.
function isMergeKey(key: unknown): boolean {
  return key === MERGE_KEY || (typeof key === "symbol" && key.description === MERGE_KEY);
}

function mergeSources(doc: Document, node: unknown): YAMLMap[] {
  const value = resolve(doc, node);
  if (isMap(value)) return [value];
  if (isSeq(value)) return value.items.map((item) => resolve(doc, item)).filter((item): item is YAMLMap => isMap(item));
  return [];
}
