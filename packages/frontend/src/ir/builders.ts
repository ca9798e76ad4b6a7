/**
 * Builders for constructing IR programmatically.
 */

import type {
  IrAttributes,
  IrEnumVariant,
  IrField,
  IrMethod,
  IrParam,
  IrSelf,
  IrSliceElement,
  IrTypeRef,
  PrimitiveName,
  TextEncoding,
  TypeDef,
  TypeId,
} from "./types.js";
import { EMPTY_ATTRIBUTES } from "./types.js";

// ============================================================
// Type references
// ============================================================

export const primitive = (name: PrimitiveName): IrTypeRef => ({
  kind: "primitive",
  name,
});

export const alias = (id: TypeId): IrTypeRef => ({ kind: "alias", id });

export const ownedOpaque = (id: TypeId, mutable = false): IrTypeRef => ({
  kind: "opaque",
  id,
  ownership: "owned",
  mutable,
});

export const borrowedOpaque = (id: TypeId, mutable = false): IrTypeRef => ({
  kind: "opaque",
  id,
  ownership: "borrowed",
  mutable,
});

export const struct = (
  id: TypeId,
  passing: "value" | "reference" = "value"
): IrTypeRef => ({ kind: "struct", id, passing });

export const enumRef = (id: TypeId): IrTypeRef => ({ kind: "enum", id });

export const slice = (element: IrSliceElement, mutable = false): IrTypeRef => ({
  kind: "slice",
  element,
  mutable,
});

export const primitiveSlice = (
  name: PrimitiveName,
  mutable = false
): IrTypeRef => slice({ encoding: "primitive", primitive: name }, mutable);

export const utf8 = (): IrTypeRef => slice({ encoding: "utf8" });

export const utf16 = (): IrTypeRef => slice({ encoding: "utf16" });

export const strings = (text: TextEncoding = "utf8"): IrTypeRef =>
  slice({ encoding: "strings", text });

export const writeable = (): IrTypeRef => ({ kind: "writeable" });

export const nullable = (inner: IrTypeRef): IrTypeRef => ({
  kind: "nullable",
  inner,
});

export const fallible = (okRef: IrTypeRef, errRef: IrTypeRef): IrTypeRef => ({
  kind: "fallible",
  ok: okRef,
  err: errRef,
});

export const unit = (): IrTypeRef => ({ kind: "unit" });

// ============================================================
// Members
// ============================================================

export const param = (name: string, type: IrTypeRef): IrParam => ({
  name,
  type,
});

export const method = (
  name: string,
  params: readonly IrParam[],
  returns: IrTypeRef,
  options: {
    readonly self?: IrSelf;
    readonly docs?: string;
    readonly lifetimes?: readonly string[];
    readonly attributes?: IrAttributes;
  } = {}
): IrMethod => ({
  name,
  params,
  returns,
  attributes: options.attributes ?? EMPTY_ATTRIBUTES,
  ...(options.self ? { self: options.self } : {}),
  ...(options.docs !== undefined ? { docs: options.docs } : {}),
  ...(options.lifetimes ? { lifetimes: options.lifetimes } : {}),
});

export const refSelf = (mutable = false): IrSelf => ({
  passing: "reference",
  mutable,
});

export const valueSelf = (): IrSelf => ({ passing: "value", mutable: false });

export const field = (name: string, type: IrTypeRef): IrField => ({
  name,
  type,
});

export const variant = (name: string, value: number): IrEnumVariant => ({
  name,
  value,
});

// ============================================================
// Type definitions
// ============================================================

type DefOptions = {
  readonly name?: string;
  readonly docs?: string;
  readonly attributes?: IrAttributes;
};

const defBase = (id: TypeId, options: DefOptions) => ({
  id,
  name: options.name ?? id,
  attributes: options.attributes ?? EMPTY_ATTRIBUTES,
  ...(options.docs !== undefined ? { docs: options.docs } : {}),
});

export const opaqueDef = (
  id: TypeId,
  methods: readonly IrMethod[],
  options: DefOptions = {}
): TypeDef => ({ ...defBase(id, options), kind: "opaque", methods });

export const structDef = (
  id: TypeId,
  fields: readonly IrField[],
  methods: readonly IrMethod[] = [],
  options: DefOptions = {}
): TypeDef => ({ ...defBase(id, options), kind: "struct", fields, methods });

export const enumDef = (
  id: TypeId,
  variants: readonly IrEnumVariant[],
  options: DefOptions = {}
): TypeDef => ({ ...defBase(id, options), kind: "enum", variants });

export const primitiveDef = (
  id: TypeId,
  name: PrimitiveName,
  options: DefOptions = {}
): TypeDef => ({
  ...defBase(id, options),
  kind: "primitive",
  primitive: name,
});

/**
 * Attribute state disabling an item for one backend (or every backend)
 */
export const disabledFor = (
  backend: string,
  features: readonly string[] = []
): IrAttributes => ({
  rules: [{ backend, features, outcome: "disabled" }],
  renames: [],
});
