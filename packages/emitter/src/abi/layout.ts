/**
 * C layout of ABI types: size, alignment and member offsets.
 *
 * Follows the C rules every supported target shares: members in order,
 * each at the next multiple of its alignment, total size rounded up to
 * the largest member alignment. Scalars align to their size, except that
 * 8-byte scalars align to the target's `wideScalarAlign`.
 */

import type { PrimitiveName, TypeId } from "@ffigen/frontend";
import type { AbiTarget } from "./target.js";
import type { AbiOptionPayload, AbiType } from "./types.js";

export type Layout = {
  readonly size: number;
  readonly align: number;
};

export type StructLayout = Layout & {
  readonly offsets: readonly number[];
};

export type OptionLayout = Layout & {
  readonly valueOffset: number;
  readonly isSomeOffset: number;
};

export type ResultLayout = Layout & {
  /** Offset of the payload union; both payloads start here */
  readonly payloadOffset: number;
  readonly isOkOffset: number;
};

export type LayoutContext = {
  readonly target: AbiTarget;
  /** ABI types of a struct's fields, in declaration order */
  readonly structFields: (typeId: TypeId) => readonly AbiType[];
};

const alignTo = (offset: number, align: number): number =>
  align <= 1 ? offset : Math.ceil(offset / align) * align;

export const primitiveSize = (
  primitive: PrimitiveName,
  target: AbiTarget
): number => {
  switch (primitive) {
    case "bool":
    case "i8":
    case "u8":
      return 1;
    case "i16":
    case "u16":
      return 2;
    case "char":
    case "i32":
    case "u32":
    case "f32":
      return 4;
    case "i64":
    case "u64":
    case "f64":
      return 8;
    case "isize":
    case "usize":
      return target.pointerSize;
    default: {
      const exhaustive: never = primitive;
      void exhaustive;
      throw new Error("ICE: Unhandled primitive in primitiveSize");
    }
  }
};

const primitiveLayout = (
  primitive: PrimitiveName,
  target: AbiTarget
): Layout => {
  const size = primitiveSize(primitive, target);
  return { size, align: size === 8 ? target.wideScalarAlign : size };
};

const pointerLayout = (target: AbiTarget): Layout => ({
  size: target.pointerSize,
  align: target.pointerSize,
});

/**
 * Lay out members sequentially
 */
export const sequentialLayout = (members: readonly Layout[]): StructLayout => {
  let offset = 0;
  let align = 1;
  const offsets: number[] = [];

  for (const member of members) {
    offset = alignTo(offset, member.align);
    offsets.push(offset);
    offset += member.size;
    align = Math.max(align, member.align);
  }

  return { size: alignTo(offset, align), align, offsets };
};

export const structLayoutOf = (
  typeId: TypeId,
  context: LayoutContext
): StructLayout =>
  sequentialLayout(
    context.structFields(typeId).map((field) => layoutOf(field, context))
  );

export const optionLayoutOf = (
  inner: AbiOptionPayload,
  context: LayoutContext
): OptionLayout => {
  const layout = sequentialLayout([
    layoutOf(inner, context),
    primitiveLayout("bool", context.target),
  ]);
  return {
    size: layout.size,
    align: layout.align,
    valueOffset: layout.offsets[0] ?? 0,
    isSomeOffset: layout.offsets[1] ?? 0,
  };
};

export const resultLayoutOf = (
  ok: AbiType | undefined,
  err: AbiType | undefined,
  context: LayoutContext
): ResultLayout => {
  const payloads = [ok, err]
    .filter((payload): payload is AbiType => payload !== undefined)
    .map((payload) => layoutOf(payload, context));
  const union: Layout = {
    size: Math.max(0, ...payloads.map((payload) => payload.size)),
    align: Math.max(1, ...payloads.map((payload) => payload.align)),
  };
  const members =
    union.size > 0
      ? [union, primitiveLayout("bool", context.target)]
      : [primitiveLayout("bool", context.target)];
  const layout = sequentialLayout(members);
  return {
    size: layout.size,
    align: layout.align,
    payloadOffset: 0,
    isOkOffset: layout.offsets[members.length - 1] ?? 0,
  };
};

export const layoutOf = (abi: AbiType, context: LayoutContext): Layout => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return primitiveLayout(abi.primitive, context.target);
    case "enum":
      return primitiveLayout("i32", context.target);
    case "pointer":
    case "structPointer":
    case "write":
      return pointerLayout(context.target);
    case "struct": {
      const layout = structLayoutOf(abi.typeId, context);
      return { size: layout.size, align: layout.align };
    }
    case "slice": {
      const pointer = pointerLayout(context.target);
      return { size: pointer.size * 2, align: pointer.align };
    }
    case "option": {
      const layout = optionLayoutOf(abi.inner, context);
      return { size: layout.size, align: layout.align };
    }
    case "result": {
      const layout = resultLayoutOf(abi.ok, abi.err, context);
      return { size: layout.size, align: layout.align };
    }
    case "void":
      return { size: 0, align: 1 };
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in layoutOf");
    }
  }
};

/**
 * Whether a return value of this type comes back in registers. Scalars
 * always do; aggregates only when they fit the target's register width.
 */
export const returnsDirectly = (
  abi: AbiType,
  context: LayoutContext
): boolean => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
    case "enum":
    case "pointer":
    case "structPointer":
    case "write":
    case "void":
      return true;
    case "result":
      return false;
    case "struct":
    case "slice":
    case "option":
      return layoutOf(abi, context).size <= context.target.registerWidth;
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in returnsDirectly");
    }
  }
};
