/**
 * TypeRegistry - immutable store of every IR TypeDef in one run.
 *
 * Built once, validated as a whole, then frozen. All later passes receive it
 * explicitly and only read from it.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { errorDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import { isIdentifier } from "./identifiers.js";
import { methodTypeRefs, namedRefsOf } from "./type-refs.js";
import type {
  IrMethod,
  IrNamedRef,
  IrTypeRef,
  TypeDef,
  TypeDefKind,
  TypeId,
} from "./types.js";
import { methodsOf } from "./types.js";

export type TypeRegistry = {
  /** Native library name the bindings load */
  readonly library: string;

  /**
   * Every TypeDef, sorted by TypeId
   */
  readonly allTypes: () => readonly TypeDef[];

  /**
   * Look up a TypeDef. Fails with FFG1006 (UnknownTypeId).
   */
  readonly resolve: (id: TypeId) => Result<TypeDef, Diagnostic>;

  readonly has: (id: TypeId) => boolean;
};

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

const EXPECTED_KIND: Readonly<Record<IrNamedRef["kind"], TypeDefKind>> = {
  alias: "primitive",
  opaque: "opaque",
  struct: "struct",
  enum: "enum",
};

const compareIds = (a: TypeDef, b: TypeDef): number =>
  a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

const findDuplicates = (names: readonly string[]): readonly string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates];
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

const validateRefs = (
  owner: TypeDef,
  member: string,
  refs: readonly IrTypeRef[],
  byId: ReadonlyMap<TypeId, TypeDef>
): readonly Diagnostic[] =>
  refs.flatMap(namedRefsOf).flatMap((ref): readonly Diagnostic[] => {
    const target = byId.get(ref.id);
    if (!target) {
      return [
        errorDiagnostic(
          "FFG1005",
          `Reference to undeclared type '${ref.id}'`,
          { typeId: owner.id, member }
        ),
      ];
    }
    const expected = EXPECTED_KIND[ref.kind];
    if (target.kind !== expected) {
      return [
        errorDiagnostic(
          "FFG1005",
          `Reference of kind '${ref.kind}' to '${ref.id}' requires a ${expected} type, found ${target.kind}`,
          { typeId: owner.id, member }
        ),
      ];
    }
    return [];
  });

const validateMethod = (
  owner: TypeDef,
  method: IrMethod,
  byId: ReadonlyMap<TypeId, TypeDef>
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];
  const subject = { typeId: owner.id, member: method.name };

  if (!isIdentifier(method.name)) {
    diagnostics.push(
      errorDiagnostic("FFG1005", `Invalid method name '${method.name}'`, subject)
    );
  }

  const paramNames = method.params.map((param) => param.name);
  for (const name of paramNames) {
    if (!isIdentifier(name)) {
      diagnostics.push(
        errorDiagnostic("FFG1005", `Invalid parameter name '${name}'`, subject)
      );
    }
  }
  for (const name of findDuplicates(paramNames)) {
    diagnostics.push(
      errorDiagnostic("FFG1005", `Duplicate parameter '${name}'`, subject)
    );
  }

  for (const source of method.lifetimes ?? []) {
    const known =
      source === "self" ? method.self !== undefined : paramNames.includes(source);
    if (!known) {
      diagnostics.push(
        errorDiagnostic(
          "FFG1005",
          `Lifetime source '${source}' is neither self nor a parameter`,
          subject
        )
      );
    }
  }

  diagnostics.push(
    ...validateRefs(owner, method.name, methodTypeRefs(method), byId)
  );
  return diagnostics;
};

const validateTypeDef = (
  def: TypeDef,
  byId: ReadonlyMap<TypeId, TypeDef>
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];
  const subject = { typeId: def.id };

  if (!isIdentifier(def.name)) {
    diagnostics.push(
      errorDiagnostic("FFG1005", `Invalid type name '${def.name}'`, subject)
    );
  }

  switch (def.kind) {
    case "opaque":
      break;
    case "struct": {
      const names = def.fields.map((field) => field.name);
      for (const name of names) {
        if (!isIdentifier(name)) {
          diagnostics.push(
            errorDiagnostic("FFG1005", `Invalid field name '${name}'`, subject)
          );
        }
      }
      for (const name of findDuplicates(names)) {
        diagnostics.push(
          errorDiagnostic("FFG1005", `Duplicate field '${name}'`, subject)
        );
      }
      for (const field of def.fields) {
        diagnostics.push(...validateRefs(def, field.name, [field.type], byId));
      }
      break;
    }
    case "enum": {
      const names = def.variants.map((variant) => variant.name);
      for (const name of findDuplicates(names)) {
        diagnostics.push(
          errorDiagnostic("FFG1005", `Duplicate variant '${name}'`, subject)
        );
      }
      for (const variant of def.variants) {
        if (!isIdentifier(variant.name)) {
          diagnostics.push(
            errorDiagnostic(
              "FFG1005",
              `Invalid variant name '${variant.name}'`,
              subject
            )
          );
        }
        if (
          !Number.isInteger(variant.value) ||
          variant.value < I32_MIN ||
          variant.value > I32_MAX
        ) {
          diagnostics.push(
            errorDiagnostic(
              "FFG1005",
              `Discriminant ${variant.value} of '${variant.name}' is not an i32`,
              { typeId: def.id, member: variant.name }
            )
          );
        }
      }
      const values = def.variants.map((variant) => String(variant.value));
      for (const value of findDuplicates(values)) {
        diagnostics.push(
          errorDiagnostic("FFG1005", `Duplicate discriminant ${value}`, subject)
        );
      }
      break;
    }
    case "primitive":
      break;
    default: {
      const exhaustive: never = def;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in validateTypeDef");
    }
  }

  for (const method of methodsOf(def)) {
    diagnostics.push(...validateMethod(def, method, byId));
  }

  return diagnostics;
};

/**
 * Build and freeze a registry. Every problem found is reported; the registry
 * is only produced when there are none.
 */
export const createRegistry = (
  types: readonly TypeDef[],
  library = "native"
): Result<TypeRegistry, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const byId = new Map<TypeId, TypeDef>();

  for (const def of types) {
    if (byId.has(def.id)) {
      diagnostics.push(
        errorDiagnostic("FFG1005", `Duplicate TypeId '${def.id}'`, {
          typeId: def.id,
        })
      );
      continue;
    }
    byId.set(def.id, def);
  }

  if (!isIdentifier(library)) {
    diagnostics.push(
      errorDiagnostic("FFG1005", `Invalid library name '${library}'`)
    );
  }

  for (const def of byId.values()) {
    diagnostics.push(...validateTypeDef(def, byId));
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  const sorted = deepFreeze([...byId.values()].sort(compareIds));

  const registry: TypeRegistry = {
    library,
    allTypes: () => sorted,
    resolve: (id) => {
      const def = byId.get(id);
      return def
        ? ok(def)
        : error(
            errorDiagnostic("FFG1006", `Unknown TypeId '${id}'`, { typeId: id })
          );
    },
    has: (id) => byId.has(id),
  };

  return ok(Object.freeze(registry));
};
