/**
 * ffigen check command - compare the output directory with a fresh generation
 */

import type { OutputStatus } from "@ffigen/backend";
import { checkArtifacts } from "@ffigen/backend";
import { error, ok } from "@ffigen/frontend";
import { EXIT_CODES } from "../cli/constants.js";
import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { runGeneration } from "./generate.js";

export const checkCommand = (config: ResolvedConfig): Result<OutputStatus, CommandError> => {
  const run = runGeneration(config);
  if (!run.ok) return run;

  const status = checkArtifacts(run.value.artifacts, config.outputDirectory);
  if (!status.ok) {
    return error({ exitCode: EXIT_CODES.usage, message: status.error });
  }

  if (!status.value.upToDate) {
    for (const path of status.value.missing) console.error(`  missing ${path}`);
    for (const path of status.value.changed) console.error(`  changed ${path}`);
    for (const path of status.value.stale) console.error(`  stale ${path}`);
    return error({
      exitCode: EXIT_CODES.outdated,
      message: `Generated files in ${config.outputDirectory} are out of date; run 'ffigen generate'`,
    });
  }

  if (!config.quiet) {
    console.log(`✓ Generated files in ${config.outputDirectory} are up to date`);
  }
  return ok(status.value);
};
