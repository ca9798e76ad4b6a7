/**
 * TypeScript spelling of host types in the generated declaration files
 */

import type { PrimitiveName } from "@ffigen/frontend";
import type * as ts from "typescript";
import type { HostType } from "../mapping/host-types.js";
import {
  keywordType,
  nullType,
  readonlyArrayType,
  typeRef,
  unionType,
} from "./ast.js";
import type { ModuleScope } from "./scope.js";

export type HostPosition = "param" | "return" | "field";

const TYPED_ARRAYS: Readonly<Record<Exclude<PrimitiveName, "bool">, string>> = {
  char: "Uint32Array",
  i8: "Int8Array",
  u8: "Uint8Array",
  i16: "Int16Array",
  u16: "Uint16Array",
  i32: "Int32Array",
  u32: "Uint32Array",
  i64: "BigInt64Array",
  u64: "BigUint64Array",
  isize: "Int32Array",
  usize: "Uint32Array",
  f32: "Float32Array",
  f64: "Float64Array",
};

export const typedArrayName = (primitive: PrimitiveName): string => {
  if (primitive === "bool") {
    throw new Error("ICE: bool buffers have no typed array");
  }
  return TYPED_ARRAYS[primitive];
};

const isWide = (primitive: PrimitiveName): boolean =>
  primitive === "i64" || primitive === "u64";

export const primitiveType = (primitive: PrimitiveName): ts.TypeNode => {
  switch (primitive) {
    case "bool":
      return keywordType("boolean");
    case "char":
      return keywordType("string");
    case "i64":
    case "u64":
      return keywordType("bigint");
    default:
      return keywordType("number");
  }
};

/**
 * Declared type of a host value. Immutable buffer parameters accept any
 * array-like of numbers; everything else reads back as a typed array.
 */
export const tsTypeOf = (
  host: HostType,
  position: HostPosition,
  scope: ModuleScope
): ts.TypeNode => {
  switch (host.kind) {
    case "unit":
      return keywordType("void");
    case "number":
      return primitiveType(host.primitive);
    case "alias":
    case "enumeration":
    case "handle":
    case "record":
      return typeRef(scope.ref(host.typeId));
    case "buffer":
      if (position === "param" && !host.mutable) {
        return typeRef("ArrayLike", [keywordType(isWide(host.primitive) ? "bigint" : "number")]);
      }
      return typeRef(typedArrayName(host.primitive));
    case "text":
    case "sink":
      return keywordType("string");
    case "textList":
      return readonlyArrayType(keywordType("string"));
    case "optional":
      return unionType([tsTypeOf(host.inner, position, scope), nullType()]);
    case "outcome":
      return tsTypeOf(host.ok, position, scope);
    default: {
      const exhaustive: never = host;
      void exhaustive;
      throw new Error("ICE: Unhandled host type in tsTypeOf");
    }
  }
};
