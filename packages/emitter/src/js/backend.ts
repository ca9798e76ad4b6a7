/**
 * JavaScript host backend (wasm32)
 */

import { readFileSync } from "node:fs";
import type { NamingPolicyConfig } from "@ffigen/frontend";
import type { Artifact, EmitContext, HostBackend } from "../backend.js";
import type { TypePlan } from "../plan/plan.js";
import { exportFrom, printModule } from "./ast.js";
import { jsNaming } from "./naming.js";
import {
  declarationFileName,
  moduleFileName,
  RUNTIME_MODULE_NAME,
  RUNTIME_SPECIFIER,
} from "./scope.js";
import { unitSource } from "./units.js";

const RUNTIME_FILES = [`${RUNTIME_MODULE_NAME}.mjs`, `${RUNTIME_MODULE_NAME}.d.mts`];

const readRuntimeFile = (fileName: string): string =>
  readFileSync(new URL(`../../runtime/js/${fileName}`, import.meta.url), "utf-8");

const header = (library: string): readonly string[] => [
  `Generated by ffigen for the '${library}' library. Do not edit.`,
];

const emitType = (plan: TypePlan, context: EmitContext): readonly Artifact[] => {
  const source = unitSource(plan, context);
  return [
    {
      path: moduleFileName(plan.hostName),
      contents: printModule(header(context.library), source.module),
      role: "host",
      typeId: plan.def.id,
    },
    {
      path: declarationFileName(plan.hostName),
      contents: printModule(header(context.library), source.declarations),
      role: "host",
      typeId: plan.def.id,
    },
  ];
};

const byHostName = (plans: readonly TypePlan[]): readonly TypePlan[] =>
  [...plans].sort((a, b) => (a.hostName < b.hostName ? -1 : a.hostName > b.hostName ? 1 : 0));

/**
 * The runtime module and the index re-exporting every generated type
 */
const emitSupport = (plans: readonly TypePlan[], context: EmitContext): readonly Artifact[] => {
  const sorted = byHostName(plans);
  const unitExports = (declarations: boolean) =>
    sorted.flatMap((plan) => {
      const from = `./${moduleFileName(plan.hostName)}`;
      if (plan.def.kind === "primitive") {
        return declarations ? [exportFrom([plan.hostName], from, true)] : [];
      }
      return [exportFrom([plan.hostName], from)];
    });

  return [
    ...RUNTIME_FILES.map(
      (fileName): Artifact => ({
        path: fileName,
        contents: readRuntimeFile(fileName),
        role: "support",
      })
    ),
    {
      path: "index.mjs",
      contents: printModule(header(context.library), [
        exportFrom(["FfiError", "bindLibrary"], RUNTIME_SPECIFIER),
        ...unitExports(false),
      ]),
      role: "support",
    },
    {
      path: "index.d.mts",
      contents: printModule(header(context.library), [
        exportFrom(["FfiError", "bindLibrary"], RUNTIME_SPECIFIER),
        exportFrom(["LibraryExports"], RUNTIME_SPECIFIER, true),
        ...unitExports(true),
      ]),
      role: "support",
    },
  ];
};

export const createJsBackend = (naming?: NamingPolicyConfig): HostBackend => ({
  id: "js",
  naming: jsNaming(naming),
  emitType,
  emitSupport,
});
