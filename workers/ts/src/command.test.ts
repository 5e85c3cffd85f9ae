import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "commander";
import { buildProgram, parseSuffix, runCheck, type CheckCommandOptions, type ReadText } from "./command.js";

const files: Record<string, string> = {
  "before.ts": "export class User { id = 1; first_name = '' }\n",
  "after.ts": "export class User { id = 1; name = '' }\n",
  "same.ts": "export class User { id = 1; first_name = '' }\n",
  "broken.ts": "export class User {\n",
  "contract.yaml": "components:\n  schemas:\n    UserSchema:\n      properties:\n        id: {}\n        first_name: {}\n",
  "/tmp/snap/before": "export class User { id = 1; first_name = '' }\n",
  "/tmp/snap/after": "export class User { id = 1; name = '' }\n",
  "dto.yaml": "components:\n  schemas:\n    UserDto:\n      properties:\n        id: {}\n",
};

const readText: ReadText = (path) =>
  path in files ? Promise.resolve(files[path]) : Promise.reject(new Error(`ENOENT: ${path}`));

function opts(overrides: Partial<CheckCommandOptions> = {}): CheckCommandOptions {
  return { before: "before.ts", after: "after.ts", contract: "contract.yaml", format: "markdown", ...overrides };
}

describe("runCheck", () => {
  it("exits 1 with a markdown report when violations exist", async () => {
    const outcome = await runCheck(opts(), readText);
    expect(outcome.exitCode).toBe(1);
    expect(outcome.stdout.split("\n")[0]).toBe("## Contract violations detected");
    expect(outcome.stdout).toContain("- **Violation 1:** Field `first_name` [OUTDATED]");
    expect(outcome.stdout).toContain("- **Violation 2:** Field `name` [MISMATCH]");
  });

  it("exits 0 when nothing drifted", async () => {
    const outcome = await runCheck(opts({ after: "same.ts" }), readText);
    expect(outcome).toEqual({
      exitCode: 0,
      stdout: "## Contract check passed\n\nNo contract violations across 0 field change(s).\n",
      stderr: "",
    });
  });

  it("renders json", async () => {
    const outcome = await runCheck(opts({ format: "json" }), readText);
    const parsed: unknown = JSON.parse(outcome.stdout);
    expect(parsed).toMatchObject({ violations: [{ kind: "OUTDATED" }, { kind: "MISMATCH" }] });
  });

  it("honours the schema suffix", async () => {
    const outcome = await runCheck(opts({ contract: "dto.yaml", suffix: "Dto", format: "json" }), readText);
    expect(JSON.parse(outcome.stdout)).toMatchObject({
      violations: [{ kind: "MISMATCH", field: "name", schema: "UserDto" }],
    });
  });

  it("accepts snapshots without a .ts extension", async () => {
    const outcome = await runCheck(opts({ before: "/tmp/snap/before", after: "/tmp/snap/after" }), readText);
    expect(outcome.exitCode).toBe(1);
    expect(outcome.stderr).toBe("");
    expect(outcome.stdout).toContain("- **Violation 2:** Field `name` [MISMATCH]");
  });

  it("exits 2 on an empty schema suffix", async () => {
    const outcome = await runCheck(opts({ suffix: "" }), readText);
    expect(outcome).toEqual({ exitCode: 2, stdout: "", stderr: "Error: schema suffix must not be empty\n" });
  });

  it("exits 2 on a missing input", async () => {
    const outcome = await runCheck(opts({ contract: "missing.yaml" }), readText);
    expect(outcome.exitCode).toBe(2);
    expect(outcome.stderr).toBe("Error: could not read input: ENOENT: missing.yaml\n");
  });

  it("exits 2 on a parse failure", async () => {
    const outcome = await runCheck(opts({ after: "broken.ts" }), readText);
    expect(outcome.exitCode).toBe(2);
    expect(outcome.stdout).toBe("");
    expect(outcome.stderr.startsWith("Error: Failed to parse source broken.ts:")).toBe(true);
  });
});

describe("parseSuffix", () => {
  it("accepts non-empty suffixes and rejects the empty one", () => {
    expect(parseSuffix("Dto")).toBe("Dto");
    expect(() => parseSuffix("")).toThrow(InvalidArgumentError);
  });
});

describe("buildProgram", () => {
  it("registers the check command", () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(["check"]);
  });
});
