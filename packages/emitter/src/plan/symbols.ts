/**
 * Symbol & signature formatter.
 *
 * Native symbols are `{Owner}_{method}` over native names; every opaque type
 * also exports `{Owner}_destroy`. Signatures list self, the declared
 * parameters, then the generator's trailing `ffi_write` and `ffi_out`.
 */

import type {
  Diagnostic,
  IrMethod,
  IrSelf,
  TypeDef,
} from "@ffigen/frontend";
import { errorDiagnostic, isReservedNativeName } from "@ffigen/frontend";
import type { LayoutContext } from "../abi/layout.js";
import { returnsDirectly } from "../abi/layout.js";
import type { AbiType } from "../abi/types.js";
import type { MappedType } from "../mapping/mapper.js";

export const SELF_PARAM = "self";
export const WRITE_PARAM = "ffi_write";
export const OUT_PARAM = "ffi_out";

export type AbiParamRole = "self" | "param" | "write" | "out";

export type AbiParam = {
  readonly name: string;
  readonly role: AbiParamRole;
  readonly abi: AbiType;
};

export type AbiSignature = {
  readonly symbol: string;
  readonly params: readonly AbiParam[];
  /** `void` when the value travels through `ffi_out` or `ffi_write` */
  readonly returns: AbiType;
};

/**
 * How a return value gets back to the caller
 */
export type ReturnPassing = "direct" | "out" | "void";

export type ReturnConvention = {
  readonly passing: ReturnPassing;
  /** Whether the call takes a trailing `ffi_write` sink */
  readonly write: boolean;
};

export const symbolName = (owner: TypeDef, method: IrMethod): string =>
  `${owner.name}_${method.name}`;

export const destructorSymbol = (owner: TypeDef): string => `${owner.name}_destroy`;

/**
 * C keywords a native name may not take (C11 plus the common extensions)
 */
const C_KEYWORDS: ReadonlySet<string> = new Set([
  "auto",
  "break",
  "case",
  "char",
  "const",
  "continue",
  "default",
  "do",
  "double",
  "else",
  "enum",
  "extern",
  "float",
  "for",
  "goto",
  "if",
  "inline",
  "int",
  "long",
  "register",
  "restrict",
  "return",
  "short",
  "signed",
  "sizeof",
  "static",
  "struct",
  "switch",
  "typedef",
  "union",
  "unsigned",
  "void",
  "volatile",
  "while",
  "bool",
  "true",
  "false",
  "_Alignas",
  "_Alignof",
  "_Atomic",
  "_Bool",
  "_Complex",
  "_Generic",
  "_Imaginary",
  "_Noreturn",
  "_Static_assert",
  "_Thread_local",
]);

export const isCKeyword = (name: string): boolean => C_KEYWORDS.has(name);

export const selfAbi = (owner: TypeDef, self: IrSelf): AbiType => {
  switch (owner.kind) {
    case "opaque":
      return {
        kind: "pointer",
        typeId: owner.id,
        name: owner.name,
        mutable: self.mutable || self.passing === "value",
        nullable: false,
      };
    case "struct":
      return { kind: "struct", typeId: owner.id, name: owner.name };
    case "enum":
    case "primitive":
      throw new Error(`ICE: ${owner.kind} type '${owner.id}' has no methods`);
    default: {
      const exhaustive: never = owner;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in selfAbi");
    }
  }
};

export const returnConvention = (
  returns: MappedType,
  layout: LayoutContext
): ReturnConvention => {
  const abi = returns.abi;
  switch (abi.kind) {
    case "void":
      return { passing: "void", write: false };
    case "write":
      return { passing: "void", write: true };
    case "result":
      return {
        passing: "out",
        write: returns.host.kind === "outcome" && returns.host.ok.kind === "sink",
      };
    default:
      return {
        passing: returnsDirectly(abi, layout) ? "direct" : "out",
        write: false,
      };
  }
};

export const formatSignature = (
  symbol: string,
  self: AbiType | undefined,
  params: readonly { readonly name: string; readonly abi: AbiType }[],
  returns: MappedType,
  layout: LayoutContext
): AbiSignature => {
  const convention = returnConvention(returns, layout);
  const list: AbiParam[] = [];

  if (self) {
    list.push({ name: SELF_PARAM, role: "self", abi: self });
  }
  for (const param of params) {
    list.push({ name: param.name, role: "param", abi: param.abi });
  }
  if (convention.write) {
    list.push({ name: WRITE_PARAM, role: "write", abi: { kind: "write" } });
  }
  if (convention.passing === "out") {
    list.push({ name: OUT_PARAM, role: "out", abi: returns.abi });
  }

  return {
    symbol,
    params: list,
    returns: convention.passing === "direct" ? returns.abi : { kind: "void" },
  };
};

export const destructorSignature = (owner: TypeDef): AbiSignature => ({
  symbol: destructorSymbol(owner),
  params: [
    {
      name: SELF_PARAM,
      role: "self",
      abi: {
        kind: "pointer",
        typeId: owner.id,
        name: owner.name,
        mutable: true,
        nullable: false,
      },
    },
  ],
  returns: { kind: "void" },
});

const conflict = (
  message: string,
  owner: TypeDef,
  member?: string,
  hint?: string
): Diagnostic =>
  errorDiagnostic(
    "FFG1002",
    message,
    member === undefined ? { typeId: owner.id } : { typeId: owner.id, member },
    hint
  );

/**
 * Native naming checks for one type's enabled methods: symbol uniqueness,
 * the destructor slot and generator-reserved names
 */
export const checkNativeNames = (
  owner: TypeDef,
  methods: readonly IrMethod[]
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  if (isReservedNativeName(owner.name)) {
    diagnostics.push(
      conflict(
        `Type name '${owner.name}' uses the reserved prefix 'ffi_'`,
        owner,
        undefined,
        "Names starting with 'ffi_' are reserved for generated declarations"
      )
    );
  }

  if (isCKeyword(owner.name)) {
    diagnostics.push(conflict(`Type name '${owner.name}' is a C keyword`, owner));
  }

  const counts = new Map<string, number>();
  for (const method of methods) {
    counts.set(method.name, (counts.get(method.name) ?? 0) + 1);
  }
  for (const [name, count] of counts) {
    if (count > 1) {
      diagnostics.push(
        conflict(
          `Symbol '${owner.name}_${name}' is produced by ${count} methods`,
          owner,
          name
        )
      );
    }
  }

  for (const method of methods) {
    if (owner.kind === "opaque" && method.name === "destroy") {
      diagnostics.push(
        conflict(
          `Method 'destroy' collides with the destructor symbol '${destructorSymbol(owner)}'`,
          owner,
          method.name,
          "Rename the native method"
        )
      );
    }

    for (const param of method.params) {
      if (isReservedNativeName(param.name)) {
        diagnostics.push(
          conflict(
            `Parameter '${param.name}' uses the reserved prefix 'ffi_'`,
            owner,
            method.name
          )
        );
      } else if (param.name === SELF_PARAM && method.self) {
        diagnostics.push(
          conflict("Parameter 'self' collides with the receiver", owner, method.name)
        );
      } else if (isCKeyword(param.name)) {
        diagnostics.push(
          conflict(`Parameter '${param.name}' is a C keyword`, owner, method.name)
        );
      }
    }
  }

  if (owner.kind === "struct") {
    for (const field of owner.fields) {
      if (isCKeyword(field.name)) {
        diagnostics.push(
          conflict(`Field '${field.name}' is a C keyword`, owner, field.name)
        );
      }
    }
  }

  return diagnostics;
};
