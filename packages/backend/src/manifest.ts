/**
 * Output manifest - records which files a run generated, so the next run
 * can remove the ones it no longer produces.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Artifact } from "@ffigen/emitter";
import type { BackendId, Result } from "@ffigen/frontend";
import { error, isBackendId, ok } from "@ffigen/frontend";

export const MANIFEST_FILE = ".ffigen-manifest.json";
export const MANIFEST_VERSION = 1;

export type ManifestEntry = {
  readonly path: string;
  readonly sha256: string;
};

export type Manifest = {
  readonly version: typeof MANIFEST_VERSION;
  readonly backend: BackendId;
  readonly library: string;
  /** Sorted by path */
  readonly files: readonly ManifestEntry[];
};

type JsonObject = { readonly [key: string]: unknown };

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const hashContents = (contents: string): string =>
  createHash("sha256").update(contents, "utf-8").digest("hex");

export const createManifest = (
  artifacts: readonly Artifact[],
  backend: BackendId,
  library: string
): Manifest => ({
  version: MANIFEST_VERSION,
  backend,
  library,
  files: artifacts
    .map((artifact) => ({ path: artifact.path, sha256: hashContents(artifact.contents) }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
});

export const serializeManifest = (manifest: Manifest): string =>
  `${JSON.stringify(manifest, null, 2)}\n`;

const parseEntry = (value: unknown, index: number): Result<ManifestEntry, string> => {
  if (!isRecord(value)) {
    return error(`files[${index}]: expected an object`);
  }
  const { path, sha256 } = value;
  if (typeof path !== "string" || typeof sha256 !== "string") {
    return error(`files[${index}]: expected string 'path' and 'sha256'`);
  }
  return ok({ path, sha256 });
};

export const parseManifest = (text: string): Result<Manifest, string> => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (cause) {
    return error(`invalid JSON: ${cause instanceof Error ? cause.message : String(cause)}`);
  }

  if (!isRecord(json)) {
    return error("expected an object");
  }
  if (json.version !== MANIFEST_VERSION) {
    return error(`unsupported manifest version ${String(json.version)}`);
  }
  const { backend, library, files } = json;
  if (typeof backend !== "string" || !isBackendId(backend)) {
    return error(`unknown backend ${String(backend)}`);
  }
  if (typeof library !== "string") {
    return error("'library' must be a string");
  }
  if (!Array.isArray(files)) {
    return error("'files' must be an array");
  }

  const entries: ManifestEntry[] = [];
  for (const [index, value] of files.entries()) {
    const entry = parseEntry(value, index);
    if (!entry.ok) return entry;
    entries.push(entry.value);
  }

  return ok({ version: MANIFEST_VERSION, backend, library, files: entries });
};

/**
 * The manifest of an output directory; `undefined` when it has none
 */
export const readManifest = (outDir: string): Result<Manifest | undefined, string> => {
  const path = join(outDir, MANIFEST_FILE);
  if (!existsSync(path)) {
    return ok(undefined);
  }
  const parsed = parseManifest(readFileSync(path, "utf-8"));
  return parsed.ok ? parsed : error(`${path}: ${parsed.error}`);
};
