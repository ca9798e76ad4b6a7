/**
 * Traversal helpers over IR type references
 */

import type {
  IrMethod,
  IrNamedRef,
  IrTypeRef,
  TypeDef,
  TypeId,
} from "./types.js";

/**
 * Every reference naming a TypeDef inside `ref`, outermost first
 */
export const namedRefsOf = (ref: IrTypeRef): readonly IrNamedRef[] => {
  switch (ref.kind) {
    case "alias":
    case "opaque":
    case "struct":
    case "enum":
      return [ref];
    case "nullable":
      return namedRefsOf(ref.inner);
    case "fallible":
      return [...namedRefsOf(ref.ok), ...namedRefsOf(ref.err)];
    case "primitive":
    case "slice":
    case "writeable":
    case "unit":
      return [];
    default: {
      const exhaustive: never = ref;
      void exhaustive;
      throw new Error("ICE: Unhandled type reference kind in namedRefsOf");
    }
  }
};

/**
 * Every type reference appearing in a method's signature, params first
 */
export const methodTypeRefs = (method: IrMethod): readonly IrTypeRef[] => [
  ...method.params.map((param) => param.type),
  method.returns,
];

/**
 * TypeIds a TypeDef depends on (fields and method signatures), de-duplicated
 * and sorted
 */
export const referencedTypeIds = (def: TypeDef): readonly TypeId[] => {
  const refs: IrTypeRef[] = [];

  switch (def.kind) {
    case "opaque":
      refs.push(...def.methods.flatMap(methodTypeRefs));
      break;
    case "struct":
      refs.push(...def.fields.map((field) => field.type));
      refs.push(...def.methods.flatMap(methodTypeRefs));
      break;
    case "enum":
    case "primitive":
      break;
    default: {
      const exhaustive: never = def;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in referencedTypeIds");
    }
  }

  const ids = new Set(refs.flatMap(namedRefsOf).map((ref) => ref.id));
  return [...ids].sort();
};

/**
 * Short human-readable rendering used in diagnostics
 */
export const describeTypeRef = (ref: IrTypeRef): string => {
  switch (ref.kind) {
    case "primitive":
      return ref.name;
    case "alias":
    case "enum":
      return ref.id;
    case "opaque":
      return `${ref.ownership}${ref.mutable ? " mutable" : ""} ${ref.id}`;
    case "struct":
      return ref.passing === "reference" ? `ref ${ref.id}` : ref.id;
    case "slice": {
      const element =
        ref.element.encoding === "primitive"
          ? ref.element.primitive
          : ref.element.encoding === "strings"
            ? `strings/${ref.element.text}`
            : ref.element.encoding;
      return `${ref.mutable ? "MutableSlice" : "Slice"}<${element}>`;
    }
    case "writeable":
      return "Writeable";
    case "nullable":
      return `Nullable<${describeTypeRef(ref.inner)}>`;
    case "fallible":
      return `Fallible<${describeTypeRef(ref.ok)}, ${describeTypeRef(ref.err)}>`;
    case "unit":
      return "unit";
    default: {
      const exhaustive: never = ref;
      void exhaustive;
      throw new Error("ICE: Unhandled type reference kind in describeTypeRef");
    }
  }
};
