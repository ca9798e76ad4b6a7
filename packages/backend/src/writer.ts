/**
 * Artifact writer - places generated files below the output directory.
 *
 * Files whose contents did not change are left untouched. Files a previous
 * run recorded in the manifest that this run no longer produces are
 * removed, along with directories that become empty.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmdirSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { dirname, isAbsolute, join, normalize, relative, resolve, sep } from "node:path";
import type { Artifact } from "@ffigen/emitter";
import type { Result } from "@ffigen/frontend";
import { error, ok } from "@ffigen/frontend";
import type { Manifest } from "./manifest.js";
import {
  createManifest,
  MANIFEST_FILE,
  readManifest,
  serializeManifest,
} from "./manifest.js";
import type { OutputStatus, WriteOptions, WriteSummary } from "./types.js";

/**
 * Absolute location of an artifact path, which must stay inside `outDir`
 */
export const resolveArtifactPath = (outDir: string, path: string): Result<string, string> => {
  if (path.length === 0 || isAbsolute(path) || path.includes("\\")) {
    return error(`Artifact path '${path}' must be a relative path with '/' separators`);
  }
  if (normalize(path) === MANIFEST_FILE) {
    return error(`Artifact path '${path}' is reserved for the output manifest`);
  }
  const root = resolve(outDir);
  const full = resolve(root, path);
  const inside = relative(root, full);
  if (inside.length === 0 || inside === ".." || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
    return error(`Artifact path '${path}' escapes the output directory`);
  }
  return ok(full);
};

const readIfExists = (path: string): string | undefined =>
  existsSync(path) ? readFileSync(path, "utf-8") : undefined;

const sorted = (paths: readonly string[]): readonly string[] =>
  [...paths].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

const resolveAll = (
  artifacts: readonly Artifact[],
  outDir: string
): Result<readonly (readonly [Artifact, string])[], string> => {
  const resolved: (readonly [Artifact, string])[] = [];
  for (const artifact of artifacts) {
    const full = resolveArtifactPath(outDir, artifact.path);
    if (!full.ok) return full;
    resolved.push([artifact, full.value]);
  }
  return ok(resolved);
};

/**
 * Manifest entries this run does not produce, and which the previous run
 * wrote inside the output directory
 */
const staleEntries = (
  previous: Manifest | undefined,
  artifacts: readonly Artifact[],
  outDir: string
): readonly (readonly [string, string])[] => {
  if (!previous) return [];
  const current = new Set(artifacts.map((artifact) => artifact.path));
  return previous.files.flatMap((entry) => {
    if (current.has(entry.path)) return [];
    const full = resolveArtifactPath(outDir, entry.path);
    return full.ok ? [[entry.path, full.value] as const] : [];
  });
};

/**
 * Remove empty directories from `start` up to, not including, `root`
 */
const pruneEmptyDirectories = (start: string, root: string): void => {
  let current = start;
  while (current !== root && current.startsWith(root)) {
    if (!existsSync(current) || readdirSync(current).length > 0) {
      return;
    }
    rmdirSync(current);
    current = dirname(current);
  }
};

const isForeignDirectory = (outDir: string, previous: Manifest | undefined): boolean =>
  previous === undefined && existsSync(outDir) && readdirSync(outDir).length > 0;

export const writeArtifacts = (
  artifacts: readonly Artifact[],
  options: WriteOptions
): Result<WriteSummary, string> => {
  const outDir = resolve(options.outDir);

  try {
    const resolved = resolveAll(artifacts, outDir);
    if (!resolved.ok) return resolved;

    const previous = readManifest(outDir);
    if (!previous.ok) return previous;

    if (!options.force && isForeignDirectory(outDir, previous.value)) {
      return error(
        `Output directory '${outDir}' is not empty and has no ${MANIFEST_FILE}; refusing to write into it (use --force to override)`
      );
    }

    const written: string[] = [];
    const unchanged: string[] = [];
    for (const [artifact, full] of resolved.value) {
      if (readIfExists(full) === artifact.contents) {
        unchanged.push(artifact.path);
        continue;
      }
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, artifact.contents, "utf-8");
      written.push(artifact.path);
    }

    const removed: string[] = [];
    for (const [path, full] of staleEntries(previous.value, artifacts, outDir)) {
      if (existsSync(full)) {
        rmSync(full, { force: true });
        removed.push(path);
      }
      pruneEmptyDirectories(dirname(full), outDir);
    }

    mkdirSync(outDir, { recursive: true });
    const manifestPath = join(outDir, MANIFEST_FILE);
    const manifest = serializeManifest(createManifest(artifacts, options.backend, options.library));
    if (readIfExists(manifestPath) !== manifest) {
      writeFileSync(manifestPath, manifest, "utf-8");
    }

    return ok({
      outDir,
      written: sorted(written),
      unchanged: sorted(unchanged),
      removed: sorted(removed),
    });
  } catch (cause) {
    return error(
      `Failed to write to '${outDir}': ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }
};

/**
 * Compare generated artifacts with the output directory without writing
 */
export const checkArtifacts = (
  artifacts: readonly Artifact[],
  outDir: string
): Result<OutputStatus, string> => {
  const root = resolve(outDir);

  try {
    const resolved = resolveAll(artifacts, root);
    if (!resolved.ok) return resolved;

    const previous = readManifest(root);
    if (!previous.ok) return previous;

    const missing: string[] = [];
    const changed: string[] = [];
    for (const [artifact, full] of resolved.value) {
      const existing = readIfExists(full);
      if (existing === undefined) {
        missing.push(artifact.path);
      } else if (existing !== artifact.contents) {
        changed.push(artifact.path);
      }
    }
    const stale = staleEntries(previous.value, artifacts, root)
      .filter(([, full]) => existsSync(full))
      .map(([path]) => path);

    return ok({
      missing: sorted(missing),
      changed: sorted(changed),
      stale: sorted(stale),
      upToDate: missing.length === 0 && changed.length === 0 && stale.length === 0,
    });
  } catch (cause) {
    return error(
      `Failed to read '${root}': ${cause instanceof Error ? cause.message : String(cause)}`
    );
  }
};
