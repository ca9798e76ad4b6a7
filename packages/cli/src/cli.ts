/**
 * CLI argument parsing and command dispatch
 */

export { VERSION, EXIT_CODES, showHelp, parseArgs, runCli } from "./cli/index.js";
export { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";
export { initProject } from "./commands/init.js";
export { generateCommand, runGeneration } from "./commands/generate.js";
export { checkCommand } from "./commands/check.js";
export type * from "./types.js";
