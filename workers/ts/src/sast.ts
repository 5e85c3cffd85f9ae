import ts from "typescript";
import { ParseError } from "./errors.js";
import { getLogger } from "./logger.js";
import type { FieldMap, File } from "./protocol.js";

export type RecordKind = "class" | "interface";

export type ExtractOptions = {
  fileName?: string;
  recordKinds?: readonly RecordKind[];
};

/** Classification of one immediate member of a record type. */
export type MemberNode =
  | { kind: "annotated"; name: string }
  | { kind: "assignment"; name: string }
  | { kind: "other" };

// Every module is parsed under this name, so the caller's file name (which may lack a
// .ts extension or contain "..") never decides whether the text loads.
const MODULE_FILE = "module.ts";
const DEFAULT_KINDS: readonly RecordKind[] = ["class", "interface"];

export function parseModule(sourceText: string): { program: ts.Program; sourceFile: ts.SourceFile } {
  const options: ts.CompilerOptions = { noLib: true, noResolve: true };
  const sourceFile = ts.createSourceFile(MODULE_FILE, sourceText, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const host = ts.createCompilerHost(options, true);

  host.readFile = (fileName) => (normalizePath(fileName) === MODULE_FILE ? sourceText : undefined);
  host.fileExists = (fileName) => normalizePath(fileName) === MODULE_FILE;
  host.getSourceFile = (fileName) => (normalizePath(fileName) === MODULE_FILE ? sourceFile : undefined);
  host.getCurrentDirectory = () => ".";
  host.getDirectories = () => [];
  host.getCanonicalFileName = (f) => normalizePath(f);
  host.useCaseSensitiveFileNames = () => true;

  return { program: ts.createProgram({ rootNames: [MODULE_FILE], options, host }), sourceFile };
}

/**
 * Parse one module and collect, per top-level class or interface, the names of the
 * fields declared directly in its body.
 *
 * `fileName` only labels diagnostics and logs.
 *
 * @throws ParseError when the text has syntax errors
 */
export function extractFields(sourceText: string, options: ExtractOptions = {}): FieldMap {
  const fileName = normalizePath(options.fileName ?? MODULE_FILE);
  const { program, sourceFile } = parseModule(sourceText);

  const diagnostics = program.getSyntacticDiagnostics(sourceFile);
  if (diagnostics.length > 0) {
    throw new ParseError("source", fileName, diagnostics.map(formatDiagnostic));
  }

  const fields = collectRecords(sourceFile, options.recordKinds ?? DEFAULT_KINDS);
  getLogger("sast").debug(
    { fileName, types: [...fields].map(([name, set]) => ({ name, fields: set.size })) },
    "extracted record types"
  );
  return fields;
}

/** Extract every file of a snapshot; record types sharing a name are unioned. */
export function extractSnapshot(files: File[], options: Omit<ExtractOptions, "fileName"> = {}): FieldMap {
  const merged = new Map<string, Set<string>>();
  for (const file of files) {
    for (const [typeName, fields] of extractFields(file.content, { ...options, fileName: file.path })) {
      addAll(merged, typeName, fields);
    }
  }
  return merged;
}

function collectRecords(sf: ts.SourceFile, kinds: readonly RecordKind[]): Map<string, Set<string>> {
  const records = new Map<string, Set<string>>();
  for (const stmt of sf.statements) {
    let decl: ts.ClassDeclaration | ts.InterfaceDeclaration;
    if (ts.isClassDeclaration(stmt) && kinds.includes("class")) {
      decl = stmt;
    } else if (ts.isInterfaceDeclaration(stmt) && kinds.includes("interface")) {
      decl = stmt;
    } else {
      continue;
    }
    // export default class {}
    if (!decl.name) continue;
    const typeName = decl.name.text;

    const members: readonly (ts.ClassElement | ts.TypeElement)[] = decl.members;
    const fields = new Set<string>();
    for (const member of members) {
      const node = classifyMember(member);
      switch (node.kind) {
        case "annotated":
        case "assignment":
          fields.add(node.name);
          break;
        case "other":
          break;
      }
    }
    addAll(records, typeName, fields);
  }
  return records;
}

export function classifyMember(member: ts.ClassElement | ts.TypeElement): MemberNode {
  if (ts.isPropertyDeclaration(member)) {
    if (!ts.isIdentifier(member.name) || isStatic(member)) return { kind: "other" };
    if (member.type) return { kind: "annotated", name: member.name.text };
    if (member.initializer) return { kind: "assignment", name: member.name.text };
    return { kind: "other" };
  }
  if (ts.isPropertySignature(member)) {
    if (!ts.isIdentifier(member.name) || !member.type) return { kind: "other" };
    return { kind: "annotated", name: member.name.text };
  }
  return { kind: "other" };
}

function isStatic(member: ts.PropertyDeclaration): boolean {
  return ts.getModifiers(member)?.some((m) => m.kind === ts.SyntaxKind.StaticKeyword) ?? false;
}

function addAll(target: Map<string, Set<string>>, typeName: string, fields: Iterable<string>): void {
  let set = target.get(typeName);
  if (!set) {
    set = new Set();
    target.set(typeName, set);
  }
  for (const field of fields) set.add(field);
}

function formatDiagnostic(d: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(d.messageText, "\n");
  if (!d.file || d.start === undefined) return message;
  const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
  return `${line + 1}:${character + 1} ${message}`;
}

function normalizePath(p: string): string {
  return p.replace(/\\/g, "/").replace(/^\.\//, "").replace(/^\//, "");
}
