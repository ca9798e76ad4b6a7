/**
 * Helpers shared by the emitter tests
 */

import type { TypeDef, TypeRegistry } from "@ffigen/frontend";
import { createRegistry, formatDiagnostic } from "@ffigen/frontend";
import type { GenerationResult } from "./generate.js";

/**
 * Build a registry, failing the test on construction errors
 */
export const registryOf = (types: readonly TypeDef[], library = "native"): TypeRegistry => {
  const result = createRegistry(types, library);
  if (!result.ok) {
    throw new Error(result.error.map(formatDiagnostic).join("\n"));
  }
  return result.value;
};

/**
 * Contents of one generated file
 */
export const artifactText = (result: GenerationResult, path: string): string => {
  const artifact = result.artifacts.find((candidate) => candidate.path === path);
  if (!artifact) {
    const paths = result.artifacts.map((candidate) => candidate.path).join(", ");
    throw new Error(`No artifact '${path}' (generated: ${paths})`);
  }
  return artifact.contents;
};

export const lines = (...text: readonly string[]): string => `${text.join("\n")}\n`;
