/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

type ValueOption = "config" | "backend" | "ir" | "out" | "target" | "namespace" | "feature";

const VALUE_OPTIONS: ReadonlyMap<string, ValueOption> = new Map([
  ["-c", "config"],
  ["--config", "config"],
  ["-b", "backend"],
  ["--backend", "backend"],
  ["-i", "ir"],
  ["--ir", "ir"],
  ["-o", "out"],
  ["--out", "out"],
  ["-t", "target"],
  ["--target", "target"],
  ["-n", "namespace"],
  ["--namespace", "namespace"],
  ["-f", "feature"],
  ["--feature", "feature"],
]);

const setOption = (options: CliOptions, option: ValueOption, value: string): void => {
  switch (option) {
    case "feature":
      options.features = [...(options.features ?? []), value];
      return;
    case "config":
    case "backend":
    case "ir":
    case "out":
    case "target":
    case "namespace":
      options[option] = value;
      return;
    default: {
      const exhaustive: never = option;
      void exhaustive;
      throw new Error("ICE: Unhandled option in setOption");
    }
  }
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let positional: string | undefined;

  const invalid = (message: string): ParsedArgs => ({
    command: "invalid",
    options,
    error: message,
  });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands and positionals
    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else if (positional === undefined) {
        positional = arg;
      } else {
        return invalid(`Unexpected argument '${arg}'`);
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--force":
        options.force = true;
        break;
      default: {
        const option = VALUE_OPTIONS.get(arg);
        if (option === undefined) {
          return invalid(`Unknown option '${arg}'`);
        }
        const value = args[i + 1];
        if (value === undefined || value.startsWith("-")) {
          return invalid(`Option '${arg}' requires a value`);
        }
        setOption(options, option, value);
        i++;
      }
    }
  }

  return positional === undefined ? { command, options } : { command, positional, options };
};
