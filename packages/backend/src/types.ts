/**
 * Type definitions for the artifact writer
 */

import type { BackendId } from "@ffigen/frontend";

export type WriteOptions = {
  readonly outDir: string;
  readonly backend: BackendId;
  readonly library: string;
  /** Write into a non-empty directory that has no manifest */
  readonly force?: boolean;
};

/**
 * Paths are relative to the output directory, sorted
 */
export type WriteSummary = {
  readonly outDir: string;
  readonly written: readonly string[];
  readonly unchanged: readonly string[];
  readonly removed: readonly string[];
};

/**
 * Difference between generated artifacts and the files on disk
 */
export type OutputStatus = {
  readonly missing: readonly string[];
  readonly changed: readonly string[];
  /** Files recorded by the manifest that generation no longer produces */
  readonly stale: readonly string[];
  readonly upToDate: boolean;
};
