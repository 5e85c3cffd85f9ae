import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

export const SchemaSuffixSchema = z.string().min(1, "schema suffix must not be empty");

export const DriftConfigSchema = z.object({
  schemaSuffix: SchemaSuffixSchema.default("Schema"),
  recordKinds: z.array(z.enum(["class", "interface"])).min(1).default(["class", "interface"]),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type DriftConfig = z.infer<typeof DriftConfigSchema>;

export type LoadConfigOptions = {
  file?: string;
  env?: NodeJS.ProcessEnv;
};

async function loadYaml(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return parse(content) ?? {};
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${path}: ${message}`);
  }
}

/**
 * Resolve configuration from an optional YAML file, then environment overrides.
 *
 * `LOG_LEVEL` and `DRIFT_SCHEMA_SUFFIX` take precedence over the file.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DriftConfig> {
  const env = options.env ?? process.env;
  const fromFile = options.file ? await loadYaml(options.file) : {};
  return resolveConfig(fromFile, env);
}

export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): DriftConfig {
  const base = z.record(z.unknown()).parse(raw);
  const merged: Record<string, unknown> = { ...base };
  if (env.LOG_LEVEL) merged.logLevel = env.LOG_LEVEL;
  if (env.DRIFT_SCHEMA_SUFFIX) merged.schemaSuffix = env.DRIFT_SCHEMA_SUFFIX;
  return DriftConfigSchema.parse(merged);
}
