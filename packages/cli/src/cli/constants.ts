/**
 * CLI constants
 */

import { readFileSync } from "node:fs";

const readVersion = (): string => {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
  );
  return typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
};

export const VERSION = readVersion();

export const CONFIG_FILE = "ffigen.json";
export const DEFAULT_IR_PATH = "ir/library.json";
export const DEFAULT_OUTPUT_DIRECTORY = "generated";

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  generation: 2,
  noConfig: 3,
  outdated: 4,
} as const;
