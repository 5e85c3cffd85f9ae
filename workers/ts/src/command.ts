import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import { SchemaSuffixSchema, loadConfig } from "./config.js";
import { isParseError } from "./errors.js";
import { getLogger, setLogLevel } from "./logger.js";
import { checkDrift } from "./pipeline.js";
import { exitCodeFor, render, type ReportFormat } from "./report.js";
import { suffixNamer } from "./validate.js";

export type CheckCommandOptions = {
  before: string;
  after: string;
  contract: string;
  format: ReportFormat;
  suffix?: string;
  config?: string;
};

export type CheckOutcome = {
  exitCode: 0 | 1 | 2;
  stdout: string;
  stderr: string;
};

export type ReadText = (path: string) => Promise<string>;

const readUtf8: ReadText = (path) => readFile(path, "utf-8");

export function parseSuffix(value: string): string {
  const parsed = SchemaSuffixSchema.safeParse(value);
  if (!parsed.success) throw new InvalidArgumentError("Schema suffix must not be empty.");
  return parsed.data;
}

/**
 * Exit codes: 0 no violations, 1 violations found, 2 an input could not be read or parsed.
 */
export async function runCheck(opts: CheckCommandOptions, readText: ReadText = readUtf8): Promise<CheckOutcome> {
  const config = await loadConfig({ file: opts.config });
  setLogLevel(config.logLevel);
  const log = getLogger("cli");

  const suffix = SchemaSuffixSchema.safeParse(opts.suffix ?? config.schemaSuffix);
  if (!suffix.success) {
    return { exitCode: 2, stdout: "", stderr: "Error: schema suffix must not be empty\n" };
  }

  let texts: [string, string, string];
  try {
    texts = await Promise.all([readText(opts.before), readText(opts.after), readText(opts.contract)]);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ err }, "missing input");
    return { exitCode: 2, stdout: "", stderr: `Error: could not read input: ${message}\n` };
  }

  const [before, after, contract] = texts;
  try {
    const report = checkDrift(
      { before, after, contract, fileNames: { before: opts.before, after: opts.after, contract: opts.contract } },
      { schemaName: suffixNamer(suffix.data), recordKinds: config.recordKinds }
    );
    return { exitCode: exitCodeFor(report), stdout: render(report, opts.format), stderr: "" };
  } catch (err) {
    if (isParseError(err)) {
      const details = err.diagnostics.map((d) => `  ${d}\n`).join("");
      return { exitCode: 2, stdout: "", stderr: `Error: ${err.message}\n${details}` };
    }
    throw err;
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("contract-drift").description("Check model field changes against an API contract");

  program
    .command("check")
    .description("Diff two versions of a model module and validate the changes against a contract")
    .requiredOption("-b, --before <file>", "model module before the change")
    .requiredOption("-a, --after <file>", "model module after the change")
    .requiredOption("-c, --contract <file>", "OpenAPI contract (YAML or JSON)")
    .addOption(new Option("-f, --format <format>", "report format").choices(["markdown", "json"]).default("markdown"))
    .option("-s, --suffix <suffix>", "schema name suffix appended to record type names", parseSuffix)
    .option("--config <file>", "YAML configuration file")
    .action(async (opts: CheckCommandOptions) => {
      const outcome = await runCheck(opts);
      process.stdout.write(outcome.stdout);
      process.stderr.write(outcome.stderr);
      process.exitCode = outcome.exitCode;
    });

  return program;
}
