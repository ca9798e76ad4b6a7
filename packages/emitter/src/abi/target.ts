/**
 * ABI targets the generated glue can be laid out for.
 *
 * `registerWidth` is the largest aggregate returned by value; anything
 * larger travels through the hidden `ffi_out` pointer. wasm32 returns no
 * aggregate by value and passes aggregate parameters flattened.
 * `wideScalarAlign` is the alignment of 8-byte scalars inside aggregates,
 * 4 under the i386 System V ABI.
 */

import type { BackendId } from "@ffigen/frontend";

export type AbiTargetName = "x86_64" | "aarch64" | "x86" | "wasm32";

export type AbiTarget = {
  readonly name: AbiTargetName;
  readonly pointerSize: 4 | 8;
  readonly registerWidth: number;
  readonly wideScalarAlign: 4 | 8;
  readonly flattenAggregates: boolean;
};

export const ABI_TARGETS: Readonly<Record<AbiTargetName, AbiTarget>> = {
  x86_64: {
    name: "x86_64",
    pointerSize: 8,
    registerWidth: 8,
    wideScalarAlign: 8,
    flattenAggregates: false,
  },
  aarch64: {
    name: "aarch64",
    pointerSize: 8,
    registerWidth: 16,
    wideScalarAlign: 8,
    flattenAggregates: false,
  },
  x86: {
    name: "x86",
    pointerSize: 4,
    registerWidth: 8,
    wideScalarAlign: 4,
    flattenAggregates: false,
  },
  wasm32: {
    name: "wasm32",
    pointerSize: 4,
    registerWidth: 0,
    wideScalarAlign: 8,
    flattenAggregates: true,
  },
};

export const ABI_TARGET_NAMES: readonly AbiTargetName[] = [
  "x86_64",
  "aarch64",
  "x86",
  "wasm32",
];

export const isAbiTargetName = (value: string): value is AbiTargetName =>
  ABI_TARGET_NAMES.some((name) => name === value);

const SUPPORTED_TARGETS: Readonly<Record<BackendId, readonly AbiTargetName[]>> =
  {
    csharp: ["x86_64", "aarch64", "x86"],
    js: ["wasm32"],
  };

export const DEFAULT_TARGETS: Readonly<Record<BackendId, AbiTargetName>> = {
  csharp: "x86_64",
  js: "wasm32",
};

export const supportedTargets = (
  backend: BackendId
): readonly AbiTargetName[] => SUPPORTED_TARGETS[backend];

/**
 * Pick the target for a backend. `undefined` when the requested target is
 * not one the backend can bind.
 */
export const resolveTarget = (
  backend: BackendId,
  requested?: AbiTargetName
): AbiTarget | undefined => {
  const name = requested ?? DEFAULT_TARGETS[backend];
  return SUPPORTED_TARGETS[backend].includes(name)
    ? ABI_TARGETS[name]
    : undefined;
};
