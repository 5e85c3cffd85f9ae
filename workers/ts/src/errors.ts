export type ParseOrigin = "source" | "contract";

/**
 * Raised when a source module or a contract document is not syntactically valid.
 * The pipeline never recovers from it: no diff is computed against a malformed input.
 */
export class ParseError extends Error {
  readonly origin: ParseOrigin;
  readonly fileName: string;
  readonly diagnostics: readonly string[];

  constructor(origin: ParseOrigin, fileName: string, diagnostics: readonly string[]) {
    const first = diagnostics[0] ?? "unknown syntax error";
    const more = diagnostics.length > 1 ? ` (+${diagnostics.length - 1} more)` : "";
    super(`Failed to parse ${origin} ${fileName}: ${first}${more}`);
    this.name = "ParseError";
    this.origin = origin;
    this.fileName = fileName;
    this.diagnostics = diagnostics;
  }
}

export function isParseError(err: unknown): err is ParseError {
  return err instanceof ParseError;
}
