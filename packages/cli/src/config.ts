/**
 * Configuration loading and validation
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { ABI_TARGET_NAMES, isAbiTargetName } from "@ffigen/emitter";
import type { NamingPolicyConfig } from "@ffigen/frontend";
import {
  BACKEND_IDS,
  error,
  isBackendId,
  isNamingPolicy,
  NAMING_POLICIES,
  NAMING_POLICY_BUCKETS,
  ok,
} from "@ffigen/frontend";
import { CONFIG_FILE, DEFAULT_IR_PATH, DEFAULT_OUTPUT_DIRECTORY } from "./cli/constants.js";
import type { CliOptions, FfigenConfig, FfigenCSharpConfig, ResolvedConfig, Result } from "./types.js";

type JsonObject = { readonly [key: string]: unknown };

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const CONFIG_KEYS: readonly string[] = [
  "$schema",
  "backend",
  "ir",
  "outputDirectory",
  "features",
  "target",
  "namingPolicy",
  "csharp",
];

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const isNamingPolicyKey = (key: string): key is keyof NamingPolicyConfig =>
  key === "all" || NAMING_POLICY_BUCKETS.some((bucket) => bucket === key);

const optionalString = (
  value: unknown,
  key: string
): Result<string | undefined, string> =>
  value === undefined || typeof value === "string"
    ? ok(value)
    : error(`'${key}' must be a string`);

const parseNamingPolicy = (value: unknown): Result<NamingPolicyConfig, string> => {
  if (!isRecord(value)) {
    return error("'namingPolicy' must be an object");
  }
  const policy: Mutable<NamingPolicyConfig> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isNamingPolicyKey(key)) {
      return error(
        `'namingPolicy.${key}' is not a naming bucket (expected all, ${NAMING_POLICY_BUCKETS.join(", ")})`
      );
    }
    if (typeof entry !== "string" || !isNamingPolicy(entry)) {
      return error(
        `'namingPolicy.${key}' must be one of: ${NAMING_POLICIES.join(", ")}`
      );
    }
    policy[key] = entry;
  }
  return ok(policy);
};

const parseCSharp = (value: unknown): Result<FfigenCSharpConfig, string> => {
  if (!isRecord(value)) {
    return error("'csharp' must be an object");
  }
  const namespace = optionalString(value["namespace"], "csharp.namespace");
  if (!namespace.ok) return namespace;
  const libraryName = optionalString(value["libraryName"], "csharp.libraryName");
  if (!libraryName.ok) return libraryName;
  return ok({
    ...(namespace.value !== undefined ? { namespace: namespace.value } : {}),
    ...(libraryName.value !== undefined ? { libraryName: libraryName.value } : {}),
  });
};

const validateConfig = (json: unknown): Result<FfigenConfig, string> => {
  if (!isRecord(json)) {
    return error("expected an object");
  }

  const unknownKey = Object.keys(json).find((key) => !CONFIG_KEYS.includes(key));
  if (unknownKey !== undefined) {
    return error(`unknown key '${unknownKey}'`);
  }

  const config: Mutable<FfigenConfig> = {};

  const { backend, features, target, namingPolicy, csharp } = json;
  if (backend !== undefined) {
    if (typeof backend !== "string" || !isBackendId(backend)) {
      return error(`'backend' must be one of: ${BACKEND_IDS.join(", ")}`);
    }
    config.backend = backend;
  }

  const schema = optionalString(json["$schema"], "$schema");
  if (!schema.ok) return schema;
  if (schema.value !== undefined) config.$schema = schema.value;

  const ir = optionalString(json["ir"], "ir");
  if (!ir.ok) return ir;
  if (ir.value !== undefined) config.ir = ir.value;

  const outputDirectory = optionalString(json["outputDirectory"], "outputDirectory");
  if (!outputDirectory.ok) return outputDirectory;
  if (outputDirectory.value !== undefined) config.outputDirectory = outputDirectory.value;

  if (features !== undefined) {
    if (!Array.isArray(features)) {
      return error("'features' must be an array of strings");
    }
    const names: string[] = [];
    for (const feature of features) {
      if (typeof feature !== "string" || feature.length === 0) {
        return error("'features' must be an array of strings");
      }
      names.push(feature);
    }
    config.features = names;
  }

  if (target !== undefined) {
    if (typeof target !== "string" || !isAbiTargetName(target)) {
      return error(`'target' must be one of: ${ABI_TARGET_NAMES.join(", ")}`);
    }
    config.target = target;
  }

  if (namingPolicy !== undefined) {
    const parsed = parseNamingPolicy(namingPolicy);
    if (!parsed.ok) return parsed;
    config.namingPolicy = parsed.value;
  }

  if (csharp !== undefined) {
    const parsed = parseCSharp(csharp);
    if (!parsed.ok) return parsed;
    config.csharp = parsed.value;
  }

  return ok(config);
};

/**
 * Validate the parsed contents of ffigen.json
 */
export const parseConfig = (json: unknown): Result<FfigenConfig, string> => {
  const result = validateConfig(json);
  return result.ok ? result : error(`${CONFIG_FILE}: ${result.error}`);
};

/**
 * Load ffigen.json
 */
export const loadConfig = (configPath: string): Result<FfigenConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (cause) {
    return error(
      `Failed to parse ${CONFIG_FILE}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }

  return parseConfig(json);
};

/**
 * Find ffigen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const unique = (values: readonly string[]): readonly string[] => [...new Set(values)];

/**
 * Resolve final configuration from file + CLI options.
 *
 * Paths from the file are relative to `projectRoot`; paths given on the
 * command line are relative to `cwd`.
 */
export const resolveConfig = (
  config: FfigenConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string = projectRoot
): Result<ResolvedConfig, string> => {
  const backend = cliOptions.backend ?? config.backend;
  if (backend === undefined) {
    return error(`No backend selected; set 'backend' in ${CONFIG_FILE} or pass --backend`);
  }
  if (!isBackendId(backend)) {
    return error(`Unknown backend '${backend}' (expected one of: ${BACKEND_IDS.join(", ")})`);
  }

  const target = cliOptions.target ?? config.target;
  if (target !== undefined && !isAbiTargetName(target)) {
    return error(`Unknown ABI target '${target}' (expected one of: ${ABI_TARGET_NAMES.join(", ")})`);
  }

  const emptyFeature = (cliOptions.features ?? []).some((feature) => feature.length === 0);
  if (emptyFeature) {
    return error("Feature names must not be empty");
  }

  const pathFrom = (cliValue: string | undefined, fileValue: string | undefined, fallback: string): string =>
    cliValue !== undefined ? resolve(cwd, cliValue) : resolve(projectRoot, fileValue ?? fallback);

  const namespace = cliOptions.namespace ?? config.csharp?.namespace;
  const libraryName = config.csharp?.libraryName;

  return ok({
    projectRoot: resolve(projectRoot),
    backend,
    irPath: pathFrom(cliOptions.ir, config.ir, DEFAULT_IR_PATH),
    outputDirectory: pathFrom(cliOptions.out, config.outputDirectory, DEFAULT_OUTPUT_DIRECTORY),
    features: unique([...(config.features ?? []), ...(cliOptions.features ?? [])]),
    target,
    namingPolicy: config.namingPolicy,
    csharp: {
      ...(namespace !== undefined ? { namespace } : {}),
      ...(libraryName !== undefined ? { libraryName } : {}),
    },
    force: cliOptions.force ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
