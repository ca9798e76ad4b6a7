/**
 * C spelling of ABI types
 */

import type { IrSliceElement, PrimitiveName } from "@ffigen/frontend";
import type { AbiOptionPayload, AbiType } from "../abi/types.js";

const C_PRIMITIVES: Readonly<Record<PrimitiveName, string>> = {
  bool: "bool",
  char: "uint32_t",
  i8: "int8_t",
  u8: "uint8_t",
  i16: "int16_t",
  u16: "uint16_t",
  i32: "int32_t",
  u32: "uint32_t",
  i64: "int64_t",
  u64: "uint64_t",
  isize: "intptr_t",
  usize: "size_t",
  f32: "float",
  f64: "double",
};

export const cPrimitive = (primitive: PrimitiveName): string =>
  C_PRIMITIVES[primitive];

/**
 * Name of the runtime typedef carrying a slice
 */
export const sliceTypeName = (element: IrSliceElement, mutable: boolean): string => {
  const mut = mutable ? "mut_" : "";
  switch (element.encoding) {
    case "primitive":
      return `ffi_slice_${mut}${element.primitive}`;
    case "utf8":
    case "utf16":
      return `ffi_str_${mut}${element.encoding}`;
    case "strings":
      return `ffi_slice_str_${element.text}`;
    default: {
      const exhaustive: never = element;
      void exhaustive;
      throw new Error("ICE: Unhandled slice encoding in sliceTypeName");
    }
  }
};

/**
 * Name of the option struct for a payload. Primitive options live in the
 * runtime header, named ones beside their type.
 */
export const optionTypeName = (inner: AbiOptionPayload): string => {
  switch (inner.kind) {
    case "scalar":
      return `ffi_option_${inner.primitive}`;
    case "alias":
    case "enum":
    case "struct":
      return `ffi_option_${inner.name}`;
    default: {
      const exhaustive: never = inner;
      void exhaustive;
      throw new Error("ICE: Unhandled option payload in optionTypeName");
    }
  }
};

export const resultTypeName = (symbol: string): string => `${symbol}_result`;

/**
 * C type of an ABI value. `symbol` names the method whose result struct a
 * `result` type refers to.
 */
export const cType = (abi: AbiType, symbol?: string): string => {
  switch (abi.kind) {
    case "scalar":
      return cPrimitive(abi.primitive);
    case "alias":
    case "enum":
    case "struct":
      return abi.name;
    case "pointer":
      return abi.mutable ? `${abi.name}*` : `const ${abi.name}*`;
    case "structPointer":
      return `const ${abi.name}*`;
    case "slice":
      return sliceTypeName(abi.element, abi.mutable);
    case "option":
      return optionTypeName(abi.inner);
    case "result":
      if (symbol === undefined) {
        throw new Error("ICE: Result type outside a method signature");
      }
      return resultTypeName(symbol);
    case "write":
      return "ffi_write*";
    case "void":
      return "void";
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in cType");
    }
  }
};
