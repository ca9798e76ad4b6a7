/**
 * ffigen backend - writes generated artifacts and tracks them in a manifest
 */

export { checkArtifacts, resolveArtifactPath, writeArtifacts } from "./writer.js";
export {
  createManifest,
  hashContents,
  MANIFEST_FILE,
  MANIFEST_VERSION,
  parseManifest,
  readManifest,
  serializeManifest,
} from "./manifest.js";
export type { Manifest, ManifestEntry } from "./manifest.js";
export type { OutputStatus, WriteOptions, WriteSummary } from "./types.js";
