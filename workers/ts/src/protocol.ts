import { z } from "zod";

export type FieldSet = ReadonlySet<string>;
export type FieldMap = ReadonlyMap<string, FieldSet>;

export type ChangeKind = "ADD" | "DELETE";
export type ChangeRecord = Readonly<{ kind: ChangeKind; field: string; typeName: string }>;

export type SchemaIndex = ReadonlyMap<string, readonly string[]>;

export type ViolationKind = "OUTDATED" | "MISMATCH";
export type ViolationRecord = Readonly<{
  kind: ViolationKind;
  field: string;
  schema: string;
  details: string;
}>;

export type DriftReport = Readonly<{
  changes: readonly ChangeRecord[];
  violations: readonly ViolationRecord[];
  schemaCount: number;
}>;

// Wire shapes for the JSON-RPC worker.

export const FileSchema = z.object({ path: z.string(), content: z.string() });
export const SnapshotSchema = z.object({ files: z.array(FileSchema), project: z.string().nullish() });

export type File = z.infer<typeof FileSchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;

export const ChangeRecordSchema = z.object({
  kind: z.enum(["ADD", "DELETE"]),
  field: z.string(),
  typeName: z.string(),
});

export const ExtractFieldsParamsSchema = z.object({
  source: z.string(),
  fileName: z.string().optional(),
});

export const DiffParamsSchema = z.object({ before: SnapshotSchema, after: SnapshotSchema });

export const IndexContractParamsSchema = z.object({ document: z.string() });

export const ValidateParamsSchema = z.object({
  changes: z.array(ChangeRecordSchema),
  schemas: z.record(z.array(z.string())),
  schemaSuffix: z.string().min(1).optional(),
});

export const CheckParamsSchema = z.object({
  before: z.string(),
  after: z.string(),
  contract: z.string(),
  schemaSuffix: z.string().min(1).optional(),
});

export type ExtractFieldsResult = { types: Record<string, string[]> };
export type DiffResult = { changes: ChangeRecord[] };
export type IndexContractResult = { schemas: Record<string, string[]> };
export type ValidateResult = { violations: ViolationRecord[] };
export type CheckResult = { changes: ChangeRecord[]; violations: ViolationRecord[]; schemaCount: number };

export type RpcError = { code: number; message: string; data?: unknown };
export type RpcResponse =
  | { jsonrpc: "2.0"; id: number | string | null; result: unknown }
  | { jsonrpc: "2.0"; id: number | string | null; error: RpcError };

export const RpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string(), z.null()]),
  method: z.string(),
  params: z.unknown().optional(),
});

export function fieldMapToRecord(map: FieldMap): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [typeName, fields] of map) out[typeName] = [...fields];
  return out;
}

export function schemaIndexToRecord(index: SchemaIndex): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [schema, fields] of index) out[schema] = [...fields];
  return out;
}

export function schemaIndexFromRecord(record: Record<string, string[]>): SchemaIndex {
  return new Map(Object.entries(record).map(([schema, fields]) => [schema, Object.freeze([...fields])]));
}
