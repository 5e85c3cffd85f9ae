import { ZodError } from "zod";
import { indexContract } from "./contract.js";
import { diffFieldSets } from "./diff.js";
import { isParseError } from "./errors.js";
import { getLogger } from "./logger.js";
import { checkDrift } from "./pipeline.js";
import {
  CheckParamsSchema,
  DiffParamsSchema,
  ExtractFieldsParamsSchema,
  IndexContractParamsSchema,
  RpcRequestSchema,
  ValidateParamsSchema,
  fieldMapToRecord,
  schemaIndexFromRecord,
  schemaIndexToRecord,
  type CheckResult,
  type DiffResult,
  type ExtractFieldsResult,
  type IndexContractResult,
  type RpcResponse,
  type ValidateResult,
} from "./protocol.js";
import { extractFields, extractSnapshot } from "./sast.js";
import { suffixNamer, validateChanges } from "./validate.js";

export const ErrorCodes = {
  parseJson: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32000,
  sourceParse: -32001,
} as const;

type Id = number | string | null;
type Handler = (params: unknown) => unknown;

const handlers: Record<string, Handler> = {
  extractFields(params): ExtractFieldsResult {
    const { source, fileName } = ExtractFieldsParamsSchema.parse(params);
    return { types: fieldMapToRecord(extractFields(source, { fileName })) };
  },
  diff(params): DiffResult {
    const { before, after } = DiffParamsSchema.parse(params);
    return { changes: diffFieldSets(extractSnapshot(before.files), extractSnapshot(after.files)) };
  },
  indexContract(params): IndexContractResult {
    const { document } = IndexContractParamsSchema.parse(params);
    return { schemas: schemaIndexToRecord(indexContract(document)) };
  },
  validate(params): ValidateResult {
    const { changes, schemas, schemaSuffix } = ValidateParamsSchema.parse(params);
    const violations = validateChanges(changes, schemaIndexFromRecord(schemas), {
      schemaName: suffixNamer(schemaSuffix),
    });
    return { violations };
  },
  check(params): CheckResult {
    const { before, after, contract, schemaSuffix } = CheckParamsSchema.parse(params);
    const report = checkDrift({ before, after, contract }, { schemaName: suffixNamer(schemaSuffix) });
    return { changes: [...report.changes], violations: [...report.violations], schemaCount: report.schemaCount };
  },
};

/** Handle one line of input. Blank lines produce no response. */
export function handleLine(line: string): RpcResponse | null {
  if (!line.trim()) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return error(null, ErrorCodes.parseJson, err instanceof Error ? err.message : String(err));
  }
  return handleRequest(raw);
}

export function handleRequest(raw: unknown): RpcResponse {
  const parsed = RpcRequestSchema.safeParse(raw);
  if (!parsed.success) return error(null, ErrorCodes.invalidRequest, "Invalid request");

  const req = parsed.data;
  const handler = Object.hasOwn(handlers, req.method) ? handlers[req.method] : undefined;
  if (!handler) return error(req.id, ErrorCodes.methodNotFound, "Method not found");

  try {
    return respond(req.id, handler(req.params));
  } catch (err) {
    if (err instanceof ZodError) {
      return error(req.id, ErrorCodes.invalidParams, "Invalid params", err.issues);
    }
    if (isParseError(err)) {
      return error(req.id, ErrorCodes.sourceParse, err.message, {
        origin: err.origin,
        fileName: err.fileName,
        diagnostics: err.diagnostics,
      });
    }
    getLogger("rpc").error({ err, method: req.method }, "request failed");
    return error(req.id, ErrorCodes.internal, err instanceof Error ? err.message : String(err));
  }
}

function respond(id: Id, result: unknown): RpcResponse {
  return { jsonrpc: "2.0", id, result };
}

function error(id: Id, code: number, message: string, data?: unknown): RpcResponse {
  return data === undefined
    ? { jsonrpc: "2.0", id, error: { code, message } }
    : { jsonrpc: "2.0", id, error: { code, message, data } };
}
