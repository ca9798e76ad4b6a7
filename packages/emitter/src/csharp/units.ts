/**
 * C# units: one compilation unit per enabled type
 */

import type { PrimitiveName } from "@ffigen/frontend";
import { optionLayoutOf, resultLayoutOf } from "../abi/layout.js";
import type { AbiOption, AbiResult, AbiType } from "../abi/types.js";
import { optionTypeName, resultTypeName } from "../c/c-types.js";
import type { EmitContext } from "../backend.js";
import type { TypePlan } from "../plan/plan.js";
import {
  arrayType,
  assign,
  binary,
  block,
  conditional,
  defaultOf,
  expressionStatement,
  id,
  identifierType,
  ifStatement,
  intLiteral,
  invoke,
  member,
  newObject,
  not,
  nullableType,
  nullLiteral,
  path,
  predefinedType,
  returnStatement,
  stringLiteral,
  thisExpr,
  throwStatement,
  varLocal,
  withModifier,
} from "./ast/builders.js";
import type {
  CSharpCompilationUnitAst,
  CSharpFieldDeclarationAst,
  CSharpMemberAst,
  CSharpParameterAst,
  CSharpStatementAst,
  CSharpTypeAst,
  CSharpTypeDeclarationAst,
} from "./ast/types.js";
import type { CSharpContext } from "./host-types.js";
import { ABI_STRUCT, abiTypeOf, csharpTypeOf, NATIVE_CLASS, runtimeType, systemType } from "./host-types.js";
import type { CallScope } from "./marshal.js";
import { BORROWED, fromAbi, toAbi } from "./marshal.js";
import { emitImport, emitMethod, fieldOffset, structLayout } from "./methods.js";
import { LOCAL_PREFIX } from "./naming.js";

export type UnitOptions = {
  readonly namespace: string;
  readonly header: readonly string[];
};

const field = (
  name: string,
  type: CSharpTypeAst,
  modifiers: readonly string[],
  options: { readonly offset?: number; readonly docs?: string } = {}
): CSharpFieldDeclarationAst => ({
  kind: "fieldDeclaration",
  attributes: options.offset !== undefined ? [fieldOffset(options.offset)] : [],
  modifiers,
  type,
  name,
  ...(options.docs !== undefined ? { docs: options.docs } : {}),
});

const method = (
  name: string,
  modifiers: readonly string[],
  returnType: CSharpTypeAst,
  parameters: readonly CSharpParameterAst[],
  statements: readonly CSharpStatementAst[],
  docs?: string
): CSharpMemberAst => ({
  kind: "methodDeclaration",
  attributes: [],
  modifiers,
  returnType,
  name,
  parameters,
  body: block(statements),
  ...(docs !== undefined ? { docs } : {}),
});

const explicitStruct = (
  name: string,
  size: number,
  fields: readonly CSharpFieldDeclarationAst[]
): CSharpTypeDeclarationAst => ({
  kind: "structDeclaration",
  attributes: [structLayout(size)],
  modifiers: ["internal"],
  name,
  interfaces: [],
  members: fields,
});

// ============================================================
// Native class: imports, option and result structs
// ============================================================

const optionsIn = (abi: AbiType): readonly AbiOption[] => {
  switch (abi.kind) {
    case "option":
      return [abi];
    case "result":
      return [...(abi.ok ? optionsIn(abi.ok) : []), ...(abi.err ? optionsIn(abi.err) : [])];
    default:
      return [];
  }
};

const optionStruct = (option: AbiOption, context: EmitContext): CSharpTypeDeclarationAst => {
  const layout = optionLayoutOf(option.inner, context.layout);
  return explicitStruct(optionTypeName(option.inner), layout.size, [
    field("Value", abiTypeOf(option.inner, context), ["public"], { offset: layout.valueOffset }),
    field("IsSome", predefinedType("byte"), ["public"], { offset: layout.isSomeOffset }),
  ]);
};

const resultStruct = (
  symbol: string,
  abi: AbiResult,
  context: EmitContext
): CSharpTypeDeclarationAst => {
  const layout = resultLayoutOf(abi.ok, abi.err, context.layout);
  return explicitStruct(resultTypeName(symbol), layout.size, [
    ...(abi.ok
      ? [field("Ok", abiTypeOf(abi.ok, context), ["public"], { offset: layout.payloadOffset })]
      : []),
    ...(abi.err
      ? [field("Err", abiTypeOf(abi.err, context), ["public"], { offset: layout.payloadOffset })]
      : []),
    field("IsOk", predefinedType("byte"), ["public"], { offset: layout.isOkOffset }),
  ]);
};

const nativeClass = (plan: TypePlan, context: CSharpContext): CSharpTypeDeclarationAst | undefined => {
  const signatures = [
    ...plan.methods.map((m) => m.signature),
    ...(plan.destructor ? [plan.destructor] : []),
  ];
  const abis = [
    ...plan.fields.map((f) => f.mapped.abi),
    ...signatures.flatMap((signature) => [
      signature.returns,
      ...signature.params.map((param) => param.abi),
    ]),
  ];
  const options = new Map(
    abis.flatMap(optionsIn).map((option) => [optionTypeName(option.inner), option] as const)
  );
  const results = plan.methods.flatMap((m) => {
    const abi = m.returns.mapped.abi;
    return abi.kind === "result" ? [resultStruct(m.symbol, abi, context)] : [];
  });

  const members: CSharpMemberAst[] = [
    ...signatures.map((signature) => emitImport(signature, context)),
    ...[...options.keys()].sort().flatMap((name) => {
      const option = options.get(name);
      return option ? [optionStruct(option, context)] : [];
    }),
    ...results,
  ];
  if (members.length === 0) {
    return undefined;
  }
  return {
    kind: "classDeclaration",
    attributes: [],
    modifiers: ["internal", "static"],
    name: NATIVE_CLASS,
    interfaces: [],
    members,
  };
};

// ============================================================
// Opaque
// ============================================================

const HANDLE = "_handle";
const OWNED = "_owned";
const EDGES = "_edges";

const exchangeHandle = (): CSharpStatementAst =>
  varLocal(
    "handle",
    invoke(path("global::System.Threading.Interlocked.Exchange"), [
      withModifier("ref", id(HANDLE)),
      intLiteral(0),
    ])
  );

const handleParameters = (): readonly CSharpParameterAst[] => [
  { name: "handle", type: predefinedType("nint") },
  { name: "owned", type: predefinedType("bool") },
  { name: "edges", type: arrayType(predefinedType("object")), modifiers: ["params"] },
];

const opaqueType = (plan: TypePlan, context: CSharpContext): CSharpTypeDeclarationAst => {
  const name = plan.hostName;
  const destructor = plan.destructor;
  if (!destructor) {
    throw new Error(`ICE: Opaque type '${plan.def.id}' has no destructor`);
  }
  const destroyOwned: CSharpStatementAst = ifStatement(
    binary(binary(id("handle"), "!=", intLiteral(0)), "&&", id(OWNED)),
    [expressionStatement(invoke(path(`${NATIVE_CLASS}.${destructor.symbol}`), [id("handle")]))]
  );
  const suppressFinalize = expressionStatement(
    invoke(path("global::System.GC.SuppressFinalize"), [thisExpr()])
  );
  const disposed = throwStatement(
    newObject(systemType("ObjectDisposedException"), [stringLiteral(name)])
  );
  const self = identifierType(name);
  const construct = newObject(self, [id("handle"), id("owned"), id("edges")]);

  const native = nativeClass(plan, context);
  const members: CSharpMemberAst[] = [
    field(HANDLE, predefinedType("nint"), ["private"]),
    field(OWNED, predefinedType("bool"), ["private", "readonly"]),
    field(EDGES, arrayType(predefinedType("object")), ["private", "readonly"]),
    {
      kind: "constructorDeclaration",
      attributes: [],
      modifiers: ["private"],
      name,
      parameters: [
        { name: "handle", type: predefinedType("nint") },
        { name: "owned", type: predefinedType("bool") },
        { name: "edges", type: arrayType(predefinedType("object")) },
      ],
      body: block([
        assign(id(HANDLE), id("handle")),
        assign(id(OWNED), id("owned")),
        assign(id(EDGES), id("edges")),
      ]),
    },
    { kind: "destructorDeclaration", name, body: block([exchangeHandle(), destroyOwned]) },
    method("FromHandle", ["internal", "static"], self, handleParameters(), [
      ifStatement(binary(id("handle"), "==", intLiteral(0)), [
        throwStatement(
          newObject(systemType("InvalidOperationException"), [
            stringLiteral(`Native code returned a null ${name}`),
          ])
        ),
      ]),
      returnStatement(construct),
    ]),
    method("FromNullableHandle", ["internal", "static"], nullableType(self), handleParameters(), [
      returnStatement(conditional(binary(id("handle"), "==", intLiteral(0)), nullLiteral(), construct)),
    ]),
    method("Handle", ["internal"], predefinedType("nint"), [], [
      varLocal("handle", id(HANDLE)),
      ifStatement(binary(id("handle"), "==", intLiteral(0)), [disposed]),
      returnStatement(id("handle")),
    ]),
    method("TakeHandle", ["internal"], predefinedType("nint"), [], [
      ifStatement(not(id(OWNED)), [
        throwStatement(
          newObject(systemType("InvalidOperationException"), [
            stringLiteral(`Cannot transfer a borrowed ${name}`),
          ])
        ),
      ]),
      exchangeHandle(),
      ifStatement(binary(id("handle"), "==", intLiteral(0)), [disposed]),
      suppressFinalize,
      returnStatement(id("handle")),
    ]),
    method(
      "Dispose",
      ["public"],
      predefinedType("void"),
      [],
      [exchangeHandle(), destroyOwned, suppressFinalize],
      "Destroy the native object now if this wrapper owns it. The wrapper is unusable afterwards."
    ),
    ...plan.methods.map((m) => emitMethod(plan, m, context)),
    ...(native ? [native] : []),
  ];

  return {
    kind: "classDeclaration",
    attributes: [],
    modifiers: ["public", "sealed", "partial"],
    name,
    interfaces: [systemType("IDisposable")],
    members,
    ...(plan.def.docs !== undefined ? { docs: plan.def.docs } : {}),
  };
};

// ============================================================
// Struct
// ============================================================

const ABI_LOCAL = `${LOCAL_PREFIX}abi`;
const VALUE_LOCAL = `${LOCAL_PREFIX}value`;
const ARENA_PARAM = `${LOCAL_PREFIX}arena`;

const structType = (plan: TypePlan, context: CSharpContext): CSharpTypeDeclarationAst => {
  const name = plan.hostName;
  const layout = plan.layout;
  if (!layout) {
    throw new Error(`ICE: Struct '${plan.def.id}' has no layout`);
  }
  const scope: CallScope = { context, arena: () => id(ARENA_PARAM) };
  const native = nativeClass(plan, context);

  const members: CSharpMemberAst[] = [
    ...plan.fields.map((f) =>
      field(
        f.hostName,
        csharpTypeOf(f.mapped.host, "field", context),
        ["public"],
        f.field.docs !== undefined ? { docs: f.field.docs } : {}
      )
    ),
    ...plan.methods.map((m) => emitMethod(plan, m, context)),
    method(
      "ToAbi",
      ["internal"],
      identifierType(ABI_STRUCT),
      [{ name: ARENA_PARAM, type: runtimeType("FfiArena") }],
      [
        varLocal(ABI_LOCAL, defaultOf(identifierType(ABI_STRUCT))),
        ...plan.fields.map((f) =>
          assign(
            member(id(ABI_LOCAL), f.hostName),
            toAbi(member(thisExpr(), f.hostName), f.mapped.abi, f.mapped.host, scope)
          )
        ),
        returnStatement(id(ABI_LOCAL)),
      ]
    ),
    method(
      "FromAbi",
      ["internal", "static"],
      identifierType(name),
      [{ name: ABI_LOCAL, type: identifierType(ABI_STRUCT) }],
      [
        varLocal(VALUE_LOCAL, defaultOf(identifierType(name))),
        ...plan.fields.map((f) =>
          assign(
            member(id(VALUE_LOCAL), f.hostName),
            fromAbi(member(id(ABI_LOCAL), f.hostName), f.mapped.abi, scope, BORROWED)
          )
        ),
        returnStatement(id(VALUE_LOCAL)),
      ]
    ),
    explicitStruct(
      ABI_STRUCT,
      layout.size,
      plan.fields.map((f) =>
        field(f.hostName, abiTypeOf(f.mapped.abi, context), ["public"], { offset: f.offset })
      )
    ),
    ...(native ? [native] : []),
  ];

  return {
    kind: "structDeclaration",
    attributes: [],
    modifiers: ["public", "partial"],
    name,
    interfaces: [],
    members,
    ...(plan.def.docs !== undefined ? { docs: plan.def.docs } : {}),
  };
};

// ============================================================
// Enum & alias
// ============================================================

const enumType = (plan: TypePlan): CSharpTypeDeclarationAst => ({
  kind: "enumDeclaration",
  attributes: [],
  modifiers: ["public"],
  name: plan.hostName,
  baseType: predefinedType("int"),
  members: plan.variants.map((v) => ({
    name: v.hostName,
    value: intLiteral(v.variant.value),
    ...(v.variant.docs !== undefined ? { docs: v.variant.docs } : {}),
  })),
  ...(plan.def.docs !== undefined ? { docs: plan.def.docs } : {}),
});

const SYSTEM_TYPE_NAMES: Readonly<Record<PrimitiveName, string>> = {
  bool: "Boolean",
  char: "Text.Rune",
  i8: "SByte",
  u8: "Byte",
  i16: "Int16",
  u16: "UInt16",
  i32: "Int32",
  u32: "UInt32",
  i64: "Int64",
  u64: "UInt64",
  isize: "IntPtr",
  usize: "UIntPtr",
  f32: "Single",
  f64: "Double",
};

/**
 * Build the compilation unit of one planned type
 */
export const unitAst = (
  plan: TypePlan,
  context: EmitContext,
  options: UnitOptions
): CSharpCompilationUnitAst => {
  const def = plan.def;
  const inNamespace = (declaration: CSharpTypeDeclarationAst): CSharpCompilationUnitAst => ({
    kind: "compilationUnit",
    header: options.header,
    nullableEnable: true,
    usings: [],
    members: [{ kind: "namespaceDeclaration", name: options.namespace, members: [declaration] }],
  });

  const unitContext: CSharpContext = { ...context, namespace: options.namespace };

  switch (def.kind) {
    case "opaque":
      return inNamespace(opaqueType(plan, unitContext));
    case "struct":
      return inNamespace(structType(plan, unitContext));
    case "enum":
      return inNamespace(enumType(plan));
    case "primitive":
      return {
        kind: "compilationUnit",
        header: [...options.header, ...(def.docs !== undefined ? ["", ...def.docs.split("\n")] : [])],
        nullableEnable: false,
        usings: [
          {
            kind: "usingAliasDirective",
            alias: plan.hostName,
            type: systemType(SYSTEM_TYPE_NAMES[def.primitive]),
            isGlobal: true,
          },
        ],
        members: [],
      };
    default: {
      const exhaustive: never = def;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in unitAst");
    }
  }
};
