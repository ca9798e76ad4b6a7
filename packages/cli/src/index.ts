#!/usr/bin/env -S node --import tsx
/**
 * ffigen CLI - Command-line interface for the binding generator
 */

import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}
