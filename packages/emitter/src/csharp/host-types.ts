/**
 * C# types of host values and of their native representation.
 *
 * Native pointers are `nint`, bools travel as `byte` and chars as `uint`;
 * slices use the runtime's `FfiSlice`, structs their nested `Abi` struct,
 * options and results the structs declared in the unit's `Native` class.
 */

import type { PrimitiveName } from "@ffigen/frontend";
import { optionTypeName, resultTypeName } from "../c/c-types.js";
import type { AbiType } from "../abi/types.js";
import type { EmitContext } from "../backend.js";
import { hostNameOf } from "../backend.js";
import type { HostType } from "../mapping/host-types.js";
import { arrayType, identifierType, nullableType, path, predefinedType } from "./ast/builders.js";
import type { CSharpExpressionAst, CSharpTypeAst } from "./ast/types.js";

export const RUNTIME_NAMESPACE = "Ffigen.Runtime";

/**
 * Emit context of one C# unit
 */
export type CSharpContext = EmitContext & {
  /** Namespace every generated type is declared in */
  readonly namespace: string;
};

/**
 * A generated type in expression position. Always qualified, since a
 * member or parameter of the same name takes precedence over a bare one.
 */
export const generatedType = (context: CSharpContext, name: string): CSharpExpressionAst =>
  path(`global::${context.namespace}.${name}`);

export const NATIVE_CLASS = "Native";

export const ABI_STRUCT = "Abi";

export const runtimeType = (name: string, typeArguments?: readonly CSharpTypeAst[]): CSharpTypeAst =>
  identifierType(`global::${RUNTIME_NAMESPACE}.${name}`, typeArguments);

export const systemType = (name: string, typeArguments?: readonly CSharpTypeAst[]): CSharpTypeAst =>
  identifierType(`global::System.${name}`, typeArguments);

export const RUNE = "Text.Rune";

const PRIMITIVE_KEYWORDS: Readonly<Record<Exclude<PrimitiveName, "bool" | "char">, string>> = {
  i8: "sbyte",
  u8: "byte",
  i16: "short",
  u16: "ushort",
  i32: "int",
  u32: "uint",
  i64: "long",
  u64: "ulong",
  isize: "nint",
  usize: "nuint",
  f32: "float",
  f64: "double",
};

/**
 * Keyword of a primitive's native representation
 */
export const abiPrimitiveKeyword = (primitive: PrimitiveName): string => {
  switch (primitive) {
    case "bool":
      return "byte";
    case "char":
      return "uint";
    default:
      return PRIMITIVE_KEYWORDS[primitive];
  }
};

export const hostPrimitiveType = (primitive: PrimitiveName): CSharpTypeAst => {
  switch (primitive) {
    case "bool":
      return predefinedType("bool");
    case "char":
      return systemType(RUNE);
    default:
      return predefinedType(PRIMITIVE_KEYWORDS[primitive]);
  }
};

/** Buffer elements travel unchanged, chars as their scalar value */
export const bufferElementType = (primitive: PrimitiveName): CSharpTypeAst =>
  predefinedType(abiPrimitiveKeyword(primitive));

export type TypePosition = "param" | "return" | "field";

/**
 * Whether a value of this host type is a C# value type, so that its
 * optional form is `Nullable<T>`
 */
export const isValueType = (host: HostType): boolean => {
  switch (host.kind) {
    case "number":
    case "alias":
    case "enumeration":
    case "record":
      return true;
    default:
      return false;
  }
};

export const csharpTypeOf = (
  host: HostType,
  position: TypePosition,
  context: EmitContext
): CSharpTypeAst => {
  switch (host.kind) {
    case "unit":
      return predefinedType("void");
    case "number":
      return hostPrimitiveType(host.primitive);
    case "alias":
    case "enumeration":
    case "handle":
    case "record":
      return identifierType(hostNameOf(context, host.typeId));
    case "buffer": {
      const element = bufferElementType(host.primitive);
      return position === "param" && !host.mutable
        ? systemType("ReadOnlySpan", [element])
        : arrayType(element);
    }
    case "text":
    case "sink":
      return predefinedType("string");
    case "textList":
      return systemType("Collections.Generic.IReadOnlyList", [predefinedType("string")]);
    case "optional":
      // a span cannot be null; optional buffers are arrays everywhere
      return host.inner.kind === "buffer"
        ? nullableType(arrayType(bufferElementType(host.inner.primitive)))
        : nullableType(csharpTypeOf(host.inner, position, context));
    case "outcome":
      return csharpTypeOf(host.ok, position, context);
    default: {
      const exhaustive: never = host;
      void exhaustive;
      throw new Error("ICE: Unhandled host type kind in csharpTypeOf");
    }
  }
};

/**
 * Type of an ABI value in a P/Invoke signature or an `Abi` struct.
 * `symbol` names the method whose result struct a `result` refers to.
 */
export const abiTypeOf = (abi: AbiType, context: EmitContext, symbol?: string): CSharpTypeAst => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return predefinedType(abiPrimitiveKeyword(abi.primitive));
    case "enum":
      return identifierType(hostNameOf(context, abi.typeId));
    case "pointer":
    case "structPointer":
    case "write":
      return predefinedType("nint");
    case "struct":
      return identifierType(`${hostNameOf(context, abi.typeId)}.${ABI_STRUCT}`);
    case "slice":
      return runtimeType("FfiSlice");
    case "option":
      return identifierType(`${NATIVE_CLASS}.${optionTypeName(abi.inner)}`);
    case "result":
      if (symbol === undefined) {
        throw new Error("ICE: Result type outside a method signature");
      }
      return identifierType(`${NATIVE_CLASS}.${resultTypeName(symbol)}`);
    case "void":
      return predefinedType("void");
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in abiTypeOf");
    }
  }
};
