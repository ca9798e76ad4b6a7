/**
 * Struct layout table for one run.
 *
 * Maps every enabled struct's fields once, then keeps only the structs whose
 * layout is computable: all fields supported, no by-value cycle and every
 * by-value struct they embed computable as well.
 */

import type {
  Diagnostic,
  FilteredSurface,
  StructTypeDef,
  TypeId,
  TypeRegistry,
} from "@ffigen/frontend";
import { errorDiagnostic } from "@ffigen/frontend";
import type { AbiTarget } from "../abi/target.js";
import type { LayoutContext } from "../abi/layout.js";
import type { AbiType } from "../abi/types.js";
import type { MappedType } from "../mapping/mapper.js";
import { findValueCycle, mapTypeRef } from "../mapping/mapper.js";

export type LayoutTable = {
  readonly context: LayoutContext;
  /** Mapped fields of every struct with a computable layout */
  readonly fields: ReadonlyMap<TypeId, readonly MappedType[]>;
  /** Structs whose layout is not computable, with the reasons */
  readonly failures: ReadonlyMap<TypeId, readonly Diagnostic[]>;
};

/**
 * TypeIds of structs embedded by value in an ABI type
 */
export const valueStructsIn = (abi: AbiType): readonly TypeId[] => {
  switch (abi.kind) {
    case "struct":
      return [abi.typeId];
    case "option":
      return valueStructsIn(abi.inner);
    case "result":
      return [
        ...(abi.ok ? valueStructsIn(abi.ok) : []),
        ...(abi.err ? valueStructsIn(abi.err) : []),
      ];
    default:
      return [];
  }
};

const mapStructFields = (
  def: StructTypeDef,
  registry: TypeRegistry,
  surface: FilteredSurface
): { readonly fields: readonly MappedType[]; readonly diagnostics: readonly Diagnostic[] } => {
  const fields: MappedType[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const field of def.fields) {
    const mapped = mapTypeRef(field.type, "field", {
      registry,
      surface,
      subject: { typeId: def.id, member: field.name },
    });
    if (mapped.ok) {
      fields.push(mapped.value);
    } else {
      diagnostics.push(...mapped.error);
    }
  }

  const cycle = findValueCycle(registry, def.id);
  if (cycle) {
    diagnostics.push(
      errorDiagnostic(
        "FFG1003",
        `Struct '${def.id}' contains itself by value (${cycle.join(" -> ")})`,
        { typeId: def.id },
        "Break the cycle with an opaque handle"
      )
    );
  }

  return { fields, diagnostics };
};

export const buildLayoutTable = (
  registry: TypeRegistry,
  surface: FilteredSurface,
  target: AbiTarget
): LayoutTable => {
  const mapped = new Map<TypeId, readonly MappedType[]>();
  const failures = new Map<TypeId, readonly Diagnostic[]>();

  for (const { def } of surface.types) {
    if (def.kind !== "struct") continue;
    const result = mapStructFields(def, registry, surface);
    if (result.diagnostics.length > 0) {
      failures.set(def.id, result.diagnostics);
    } else {
      mapped.set(def.id, result.fields);
    }
  }

  // A struct embedding a failed struct by value fails too
  let changed = true;
  while (changed) {
    changed = false;
    for (const [id, fields] of mapped) {
      const broken = fields
        .flatMap((field) => valueStructsIn(field.abi))
        .find((dependency) => !mapped.has(dependency));
      if (broken === undefined) continue;
      mapped.delete(id);
      failures.set(id, [
        errorDiagnostic(
          "FFG1003",
          `Layout of '${id}' is unavailable: it embeds '${broken}', which could not be laid out`,
          { typeId: id }
        ),
      ]);
      changed = true;
    }
  }

  const context: LayoutContext = {
    target,
    structFields: (typeId) => {
      const fields = mapped.get(typeId);
      if (!fields) {
        throw new Error(`ICE: No layout for struct '${typeId}'`);
      }
      return fields.map((field) => field.abi);
    },
  };

  return { context, fields: mapped, failures };
};
