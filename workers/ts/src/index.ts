#!/usr/bin/env node
import readline from "node:readline";
import { getLogger } from "./logger.js";
import { handleLine } from "./rpc.js";

const rl = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

async function main(): Promise<void> {
  for await (const line of rl) {
    const response = handleLine(line);
    if (response) process.stdout.write(JSON.stringify(response) + "\n");
  }
}

main().catch((err: unknown) => {
  getLogger("worker").fatal({ err }, "worker stopped");
  process.exitCode = 1;
});
