/**
 * IR model: the typed, immutable description of a native library's
 * exported surface.
 *
 * Every closed set below is a discriminated union on `kind`; passes that
 * consume it switch exhaustively so a new variant fails to compile until
 * each pass handles it.
 */

/**
 * Stable identifier of one TypeDef, unique within a registry
 */
export type TypeId = string;

/**
 * Host languages a generation run can target
 */
export type BackendId = "csharp" | "js";

export const BACKEND_IDS: readonly BackendId[] = ["csharp", "js"];

export const isBackendId = (value: string): value is BackendId =>
  BACKEND_IDS.some((id) => id === value);

/**
 * Fixed-width scalar types. `char` is a 32-bit Unicode scalar value.
 */
export type PrimitiveName =
  | "bool"
  | "char"
  | "i8"
  | "u8"
  | "i16"
  | "u16"
  | "i32"
  | "u32"
  | "i64"
  | "u64"
  | "isize"
  | "usize"
  | "f32"
  | "f64";

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = [
  "bool",
  "char",
  "i8",
  "u8",
  "i16",
  "u16",
  "i32",
  "u32",
  "i64",
  "u64",
  "isize",
  "usize",
  "f32",
  "f64",
];

export const isPrimitiveName = (value: string): value is PrimitiveName =>
  PRIMITIVE_NAMES.some((name) => name === value);

// ============================================================
// Attributes (already resolved upstream)
// ============================================================

export type AttributeOutcome = "enabled" | "disabled";

/**
 * One resolved enable/disable outcome. Applies when the backend matches
 * (or is `*`) and every listed feature is active.
 *
 * `backend` is kept as received; the attribute filter rejects ids that are
 * neither a BackendId nor `*`.
 */
export type AttributeRule = {
  readonly backend: string;
  readonly features: readonly string[];
  readonly outcome: AttributeOutcome;
};

/**
 * Host-surface name override for one backend
 */
export type AttributeRename = {
  readonly backend: string;
  readonly name: string;
};

export type IrAttributes = {
  readonly rules: readonly AttributeRule[];
  readonly renames: readonly AttributeRename[];
};

export const EMPTY_ATTRIBUTES: IrAttributes = { rules: [], renames: [] };

// ============================================================
// Type references
// ============================================================

export type TextEncoding = "utf8" | "utf16";

export type IrSliceElement =
  | { readonly encoding: "primitive"; readonly primitive: PrimitiveName }
  | { readonly encoding: "utf8" }
  | { readonly encoding: "utf16" }
  | { readonly encoding: "strings"; readonly text: TextEncoding };

export type IrPrimitiveRef = {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
};

/** Reference to a primitive TypeDef (a named primitive alias) */
export type IrAliasRef = {
  readonly kind: "alias";
  readonly id: TypeId;
};

export type IrOpaqueRef = {
  readonly kind: "opaque";
  readonly id: TypeId;
  readonly ownership: "owned" | "borrowed";
  readonly mutable: boolean;
};

export type IrStructRef = {
  readonly kind: "struct";
  readonly id: TypeId;
  readonly passing: "value" | "reference";
};

export type IrEnumRef = {
  readonly kind: "enum";
  readonly id: TypeId;
};

export type IrSliceRef = {
  readonly kind: "slice";
  readonly element: IrSliceElement;
  readonly mutable: boolean;
};

export type IrWriteableRef = {
  readonly kind: "writeable";
};

export type IrNullableRef = {
  readonly kind: "nullable";
  readonly inner: IrTypeRef;
};

export type IrFallibleRef = {
  readonly kind: "fallible";
  readonly ok: IrTypeRef;
  readonly err: IrTypeRef;
};

export type IrUnitRef = {
  readonly kind: "unit";
};

export type IrTypeRef =
  | IrPrimitiveRef
  | IrAliasRef
  | IrOpaqueRef
  | IrStructRef
  | IrEnumRef
  | IrSliceRef
  | IrWriteableRef
  | IrNullableRef
  | IrFallibleRef
  | IrUnitRef;

/** Type references that name a TypeDef */
export type IrNamedRef = IrAliasRef | IrOpaqueRef | IrStructRef | IrEnumRef;

// ============================================================
// Members
// ============================================================

export type IrSelf = {
  readonly passing: "value" | "reference";
  readonly mutable: boolean;
};

export type IrParam = {
  readonly name: string;
  readonly type: IrTypeRef;
};

export type IrMethod = {
  readonly name: string;
  readonly docs?: string;
  /** Absent for static methods */
  readonly self?: IrSelf;
  readonly params: readonly IrParam[];
  readonly returns: IrTypeRef;
  /**
   * Borrow sources of a borrowed return: "self" or parameter names.
   * Absent means the default sources (see ownership tracking).
   */
  readonly lifetimes?: readonly string[];
  readonly attributes: IrAttributes;
};

export type IrField = {
  readonly name: string;
  readonly docs?: string;
  readonly type: IrTypeRef;
};

export type IrEnumVariant = {
  readonly name: string;
  readonly docs?: string;
  /** Native discriminant, an i32 */
  readonly value: number;
};

// ============================================================
// Type definitions
// ============================================================

type TypeDefBase = {
  readonly id: TypeId;
  /** Native name; symbol names derive from it */
  readonly name: string;
  readonly docs?: string;
  readonly attributes: IrAttributes;
};

export type OpaqueTypeDef = TypeDefBase & {
  readonly kind: "opaque";
  readonly methods: readonly IrMethod[];
};

export type StructTypeDef = TypeDefBase & {
  readonly kind: "struct";
  readonly fields: readonly IrField[];
  readonly methods: readonly IrMethod[];
};

export type EnumTypeDef = TypeDefBase & {
  readonly kind: "enum";
  readonly variants: readonly IrEnumVariant[];
};

export type PrimitiveTypeDef = TypeDefBase & {
  readonly kind: "primitive";
  readonly primitive: PrimitiveName;
};

export type TypeDef =
  | OpaqueTypeDef
  | StructTypeDef
  | EnumTypeDef
  | PrimitiveTypeDef;

export type TypeDefKind = TypeDef["kind"];

/**
 * Methods declared by a TypeDef (enums and primitives declare none)
 */
export const methodsOf = (def: TypeDef): readonly IrMethod[] => {
  switch (def.kind) {
    case "opaque":
    case "struct":
      return def.methods;
    case "enum":
    case "primitive":
      return [];
    default: {
      const exhaustive: never = def;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in methodsOf");
    }
  }
};
