/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { checkCommand } from "../commands/check.js";
import { generateCommand } from "../commands/generate.js";
import { initProject } from "../commands/init.js";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import type { CommandError, FfigenConfig, Result } from "../types.js";
import { CONFIG_FILE, EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const CONFIGURED_COMMANDS: readonly string[] = ["generate", "check"];

const exitWith = <T>(result: Result<T, CommandError>): number => {
  if (result.ok) return EXIT_CODES.ok;
  console.error(`Error: ${result.error.message}`);
  return result.error.exitCode;
};

/**
 * Main CLI entry point. Returns the process exit code.
 */
export const runCli = (args: readonly string[], cwd: string = process.cwd()): number => {
  const parsed = parseArgs(args);

  if (parsed.command === "invalid") {
    console.error(`Error: ${parsed.error ?? "Invalid arguments"}`);
    console.error("Run 'ffigen --help' for usage information");
    return EXIT_CODES.usage;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`ffigen v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.ok;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const projectDir = resolve(cwd, parsed.positional ?? ".");
    const result = initProject(projectDir, { backend: parsed.options.backend });
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT_CODES.usage;
    }
    if (!parsed.options.quiet) {
      console.log(`✓ Initialized ffigen project in ${projectDir}`);
      for (const path of result.value) console.log(`  Created: ${path}`);
      console.log("\nNext steps:");
      console.log(`  1. Describe your library in the IR document named by ${CONFIG_FILE}`);
      console.log("  2. Run: ffigen generate");
    }
    return EXIT_CODES.ok;
  }

  if (!CONFIGURED_COMMANDS.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'ffigen --help' for usage information");
    return EXIT_CODES.usage;
  }

  // Load config; an explicit --ir makes it optional
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let config: FfigenConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error}`);
      return EXIT_CODES.usage;
    }
    config = loaded.value;
  } else if (parsed.options.ir === undefined) {
    console.error(`Error: No ${CONFIG_FILE} found`);
    console.error("Run 'ffigen init' to initialize a project, or pass --ir and --backend");
    return EXIT_CODES.noConfig;
  }

  // Project root is the directory containing ffigen.json
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const resolved = resolveConfig(config, parsed.options, projectRoot, cwd);
  if (!resolved.ok) {
    console.error(`Error: ${resolved.error}`);
    return EXIT_CODES.usage;
  }

  switch (parsed.command) {
    case "generate":
      return exitWith(generateCommand(resolved.value));
    case "check":
      return exitWith(checkCommand(resolved.value));
    default:
      throw new Error(`ICE: Unhandled command '${parsed.command}'`);
  }
};
