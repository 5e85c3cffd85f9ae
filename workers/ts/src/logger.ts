import pino, { type Logger, type LevelWithSilent } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;

// stdout carries reports and RPC frames, so logs go to stderr.
const rootLogger: Logger = pino(
  {
    level: isLevel(envLevel) ? envLevel : "info",
    base: { service: "contract-drift" },
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

export function getLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
}

export type { Logger };
