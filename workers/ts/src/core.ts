export { indexContract, type IndexContractOptions } from "./contract.js";
export { diffFieldSets } from "./diff.js";
export { ParseError, isParseError, type ParseOrigin } from "./errors.js";
export { checkDrift, type DriftInput, type DriftOptions } from "./pipeline.js";
export type {
  ChangeKind,
  ChangeRecord,
  DriftReport,
  FieldMap,
  FieldSet,
  SchemaIndex,
  ViolationKind,
  ViolationRecord,
} from "./protocol.js";
export { exitCodeFor, render, renderJson, renderMarkdown, type ReportFormat } from "./report.js";
export { classifyMember, extractFields, extractSnapshot, type ExtractOptions, type MemberNode, type RecordKind } from "./sast.js";
export { findSchemaCollisions, suffixNamer, validateChanges, type SchemaNamer, type ValidateOptions } from "./validate.js";
