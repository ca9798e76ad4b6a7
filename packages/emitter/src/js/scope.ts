/**
 * Module-level bindings of one generated unit.
 *
 * Every binding a generated module introduces starts with `$`, which no IR
 * identifier can, so parameters never shadow them. Sibling classes are
 * imported under `$`-prefixed aliases; declaration files import types
 * under their own names.
 */

import type { TypeId } from "@ffigen/frontend";
import type * as ts from "typescript";
import type { EmitContext } from "../backend.js";
import { hostNameOf } from "../backend.js";
import { access, id, importNamed, importNamespace } from "./ast.js";

export const RUNTIME_MODULE_NAME = "ffigen-runtime";
export const RUNTIME_SPECIFIER = `./${RUNTIME_MODULE_NAME}.mjs`;
const RUNTIME_BINDING = "$rt";

export const moduleFileName = (hostName: string): string => `${hostName}.mjs`;

export const declarationFileName = (hostName: string): string => `${hostName}.d.mts`;

/**
 * `$rt.<name>`
 */
export const runtime = (name: string): ts.Expression => access(id(RUNTIME_BINDING), name);

export type ScopeMode = "value" | "type";

export type ModuleScope = {
  readonly context: EmitContext;
  readonly ownId: TypeId;
  /** Binding of another type's class or type; records the import */
  readonly ref: (typeId: TypeId) => string;
  readonly refExpr: (typeId: TypeId) => ts.Expression;
  /** Marks the runtime namespace as used */
  readonly useRuntime: () => void;
  readonly imports: () => readonly ts.Statement[];
};

export const createModuleScope = (
  context: EmitContext,
  ownId: TypeId,
  mode: ScopeMode
): ModuleScope => {
  const referenced = new Set<TypeId>();
  let runtimeUsed = false;

  const ref = (typeId: TypeId): string => {
    const name = hostNameOf(context, typeId);
    if (typeId === ownId) return name;
    referenced.add(typeId);
    return mode === "value" ? `$${name}` : name;
  };

  const imports = (): readonly ts.Statement[] => {
    const siblings = [...referenced]
      .map((typeId) => hostNameOf(context, typeId))
      .sort()
      .map((name) =>
        mode === "value"
          ? importNamed([{ name, alias: `$${name}` }], `./${moduleFileName(name)}`)
          : importNamed([{ name }], `./${moduleFileName(name)}`, true)
      );
    return mode === "value" && runtimeUsed
      ? [importNamespace(RUNTIME_BINDING, RUNTIME_SPECIFIER), ...siblings]
      : siblings;
  };

  return {
    context,
    ownId,
    ref,
    refExpr: (typeId) => id(ref(typeId)),
    useRuntime: () => {
      runtimeUsed = true;
    },
    imports,
  };
};
