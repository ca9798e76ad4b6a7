/**
 * ffigen init command
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { BackendId } from "@ffigen/frontend";
import { BACKEND_IDS, error, isBackendId, ok } from "@ffigen/frontend";
import { CONFIG_FILE, DEFAULT_IR_PATH, DEFAULT_OUTPUT_DIRECTORY } from "../cli/constants.js";
import type { FfigenConfig, Result } from "../types.js";

type InitOptions = {
  readonly backend?: string;
};

const readSampleIr = (): string =>
  readFileSync(new URL("../../templates/library.json", import.meta.url), "utf-8");

const initialConfig = (backend: BackendId): FfigenConfig => ({
  backend,
  ir: DEFAULT_IR_PATH,
  outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
  ...(backend === "csharp" ? { csharp: { namespace: "Sample.Native" } } : {}),
});

/**
 * Create ffigen.json and, unless one exists, a sample IR document.
 * Returns the paths created, relative to `projectDir`.
 */
export const initProject = (
  projectDir: string,
  options: InitOptions = {}
): Result<readonly string[], string> => {
  const backend = options.backend ?? "js";
  if (!isBackendId(backend)) {
    return error(`Unknown backend '${backend}' (expected one of: ${BACKEND_IDS.join(", ")})`);
  }

  const configPath = join(projectDir, CONFIG_FILE);
  if (existsSync(configPath)) {
    return error(`${CONFIG_FILE} already exists in ${projectDir}`);
  }

  const created: string[] = [];
  try {
    mkdirSync(projectDir, { recursive: true });
    writeFileSync(configPath, `${JSON.stringify(initialConfig(backend), null, 2)}\n`, "utf-8");
    created.push(CONFIG_FILE);

    const irPath = join(projectDir, DEFAULT_IR_PATH);
    if (!existsSync(irPath)) {
      mkdirSync(dirname(irPath), { recursive: true });
      writeFileSync(irPath, readSampleIr(), "utf-8");
      created.push(DEFAULT_IR_PATH);
    }
  } catch (cause) {
    return error(
      `Failed to initialize ${projectDir}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }

  return ok(created);
};
