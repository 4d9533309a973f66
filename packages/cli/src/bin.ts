#!/usr/bin/env node
import { runCli } from "./index.js";

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error: unknown) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
