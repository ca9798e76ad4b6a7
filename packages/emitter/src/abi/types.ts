/**
 * Native marshaling representation of IR types.
 *
 * One AbiType describes exactly how a value crosses the C boundary; every
 * emitter (C headers, C# interop structs, JS memory access) derives its
 * native-side text from these nodes.
 */

import type {
  IrSliceElement,
  PrimitiveName,
  TypeId,
} from "@ffigen/frontend";

export type AbiScalar = {
  readonly kind: "scalar";
  readonly primitive: PrimitiveName;
};

/** Named primitive TypeDef; same representation as its primitive */
export type AbiAlias = {
  readonly kind: "alias";
  readonly typeId: TypeId;
  readonly name: string;
  readonly primitive: PrimitiveName;
};

/** Enums travel as i32 */
export type AbiEnum = {
  readonly kind: "enum";
  readonly typeId: TypeId;
  readonly name: string;
};

/** Opaque handle: `T*`, possibly null */
export type AbiPointer = {
  readonly kind: "pointer";
  readonly typeId: TypeId;
  readonly name: string;
  readonly mutable: boolean;
  readonly nullable: boolean;
};

/** Struct passed by reference: `const T*` */
export type AbiStructPointer = {
  readonly kind: "structPointer";
  readonly typeId: TypeId;
  readonly name: string;
};

export type AbiStruct = {
  readonly kind: "struct";
  readonly typeId: TypeId;
  readonly name: string;
};

/** `{ ptr, len }`; a nullable slice is a null `ptr` */
export type AbiSlice = {
  readonly kind: "slice";
  readonly element: IrSliceElement;
  readonly mutable: boolean;
  readonly nullable: boolean;
};

/** Types an option struct can carry */
export type AbiOptionPayload = AbiScalar | AbiAlias | AbiEnum | AbiStruct;

/** `{ T value; bool is_some; }` */
export type AbiOption = {
  readonly kind: "option";
  readonly inner: AbiOptionPayload;
};

/**
 * `{ union { S ok; E err; }; bool is_ok; }`. An absent payload is unit and
 * takes no space in the union.
 */
export type AbiResult = {
  readonly kind: "result";
  readonly ok?: AbiType;
  readonly err?: AbiType;
};

/** Output sink pointer (`ffi_write*`) */
export type AbiWrite = {
  readonly kind: "write";
};

export type AbiVoid = {
  readonly kind: "void";
};

export type AbiType =
  | AbiScalar
  | AbiAlias
  | AbiEnum
  | AbiPointer
  | AbiStructPointer
  | AbiStruct
  | AbiSlice
  | AbiOption
  | AbiResult
  | AbiWrite
  | AbiVoid;

/**
 * Primitive a scalar-like ABI value is carried as, or undefined for
 * pointers and aggregates
 */
export const scalarPrimitiveOf = (abi: AbiType): PrimitiveName | undefined => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return abi.primitive;
    case "enum":
      return "i32";
    default:
      return undefined;
  }
};
