/**
 * ffigen generate command - load the IR, generate bindings, write them out
 */

import type { WriteSummary } from "@ffigen/backend";
import { writeArtifacts } from "@ffigen/backend";
import type { Artifact } from "@ffigen/emitter";
import { generateBindings } from "@ffigen/emitter";
import type { Diagnostic } from "@ffigen/frontend";
import { error, formatDiagnostic, formatSubject, loadRegistry, ok } from "@ffigen/frontend";
import { EXIT_CODES } from "../cli/constants.js";
import type { CommandError, ResolvedConfig, Result } from "../types.js";

export type GenerationRun = {
  readonly library: string;
  readonly artifacts: readonly Artifact[];
};

export const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Load the IR document and generate artifacts in memory.
 * Diagnostics are printed as they are found.
 */
export const runGeneration = (config: ResolvedConfig): Result<GenerationRun, CommandError> => {
  const registry = loadRegistry(config.irPath);
  if (!registry.ok) {
    reportDiagnostics(registry.error);
    return error({
      exitCode: EXIT_CODES.generation,
      message: `Failed to load IR from ${config.irPath}`,
    });
  }

  const result = generateBindings(registry.value, {
    backend: config.backend,
    features: config.features,
    target: config.target,
    naming: config.namingPolicy,
    csharp: config.csharp,
  });

  reportDiagnostics(result.diagnostics);
  if (config.verbose) {
    for (const omission of result.omitted) {
      console.log(`  omitted ${formatSubject(omission.subject)} (${omission.reason})`);
    }
  }

  if (!result.ok) {
    return error({
      exitCode: EXIT_CODES.generation,
      message:
        result.failedTypes.length > 0
          ? `Generation failed for ${result.failedTypes.join(", ")}`
          : "Generation failed",
    });
  }

  return ok({ library: registry.value.library, artifacts: result.artifacts });
};

/**
 * Main generate command
 */
export const generateCommand = (config: ResolvedConfig): Result<WriteSummary, CommandError> => {
  const run = runGeneration(config);
  if (!run.ok) return run;

  const written = writeArtifacts(run.value.artifacts, {
    outDir: config.outputDirectory,
    backend: config.backend,
    library: run.value.library,
    force: config.force,
  });
  if (!written.ok) {
    return error({ exitCode: EXIT_CODES.usage, message: written.error });
  }

  const summary = written.value;
  if (config.verbose) {
    for (const path of summary.written) console.log(`  wrote ${path}`);
    for (const path of summary.removed) console.log(`  removed ${path}`);
  }
  if (!config.quiet) {
    console.log(
      `✓ Generated ${run.value.artifacts.length} files in ${summary.outDir} ` +
        `(${summary.written.length} written, ${summary.unchanged.length} unchanged, ${summary.removed.length} removed)`
    );
  }

  return ok(summary);
};
