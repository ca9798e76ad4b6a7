/**
 * Type definitions for CLI
 */

import type { AbiTargetName } from "@ffigen/emitter";
import type { BackendId, NamingPolicyConfig } from "@ffigen/frontend";

export type { Result } from "@ffigen/frontend";

/**
 * Configuration file (ffigen.json)
 */
export type FfigenConfig = {
  readonly $schema?: string;
  readonly backend?: BackendId;
  readonly ir?: string;
  readonly outputDirectory?: string;
  readonly features?: readonly string[];
  readonly target?: AbiTargetName;
  readonly namingPolicy?: NamingPolicyConfig;
  readonly csharp?: FfigenCSharpConfig;
};

export type FfigenCSharpConfig = {
  readonly namespace?: string;
  readonly libraryName?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  force?: boolean;
  config?: string;
  backend?: string;
  ir?: string;
  out?: string;
  target?: string;
  namespace?: string;
  features?: string[];
};

export type ParsedArgs = {
  readonly command: string;
  /** Positional argument after the command (`init <dir>`) */
  readonly positional?: string;
  readonly options: CliOptions;
  /** Set when the arguments could not be parsed */
  readonly error?: string;
};

/**
 * Combined configuration (from file + CLI args). Paths are absolute.
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly backend: BackendId;
  readonly irPath: string;
  readonly outputDirectory: string;
  readonly features: readonly string[];
  readonly target: AbiTargetName | undefined;
  readonly namingPolicy: NamingPolicyConfig | undefined;
  readonly csharp: FfigenCSharpConfig;
  readonly force: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Failure of a command, carrying the process exit code to report
 */
export type CommandError = {
  readonly exitCode: number;
  readonly message: string;
};
