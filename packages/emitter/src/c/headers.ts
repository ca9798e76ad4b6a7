/**
 * Native glue: a header pair per type.
 *
 * `{Name}.d.h` holds the type definition and its option struct and only
 * includes the definitions its fields need, so headers of mutually
 * referencing types never include each other in a cycle. `{Name}.h` adds
 * the per-method result structs and every prototype.
 */

import type { TypeDef, TypeId } from "@ffigen/frontend";
import { namedRefsOf } from "@ffigen/frontend";
import type { Artifact, EmitContext } from "../backend.js";
import type { AbiType } from "../abi/types.js";
import type { MethodPlan, TypePlan } from "../plan/plan.js";
import type { AbiParam, AbiSignature } from "../plan/symbols.js";
import { cPrimitive, cType, resultTypeName } from "./c-types.js";
import { RUNTIME_HEADER } from "./runtime-header.js";

export const NATIVE_DIRECTORY = "native";

export const definitionHeaderName = (def: TypeDef): string => `${def.name}.d.h`;

export const declarationHeaderName = (def: TypeDef): string => `${def.name}.h`;

const docLines = (docs: string | undefined, indent = ""): readonly string[] =>
  docs === undefined
    ? []
    : docs.split("\n").map((line) => `${indent}//${line.length > 0 ? ` ${line}` : ""}`);

const includeLines = (headers: readonly string[]): string =>
  headers.map((header) => `#include "${header}"`).join("\n");

const defOf = (context: EmitContext, typeId: TypeId): TypeDef => {
  const resolved = context.registry.resolve(typeId);
  if (!resolved.ok) {
    throw new Error(`ICE: ${resolved.error.message}`);
  }
  return resolved.value;
};

const guarded = (guard: string, body: readonly string[]): string =>
  `${[`#ifndef ${guard}\n#define ${guard}`, ...body, "#endif"].join("\n\n")}\n`;

const optionStruct = (name: string, valueType: string): string =>
  [
    `typedef struct ffi_option_${name} {`,
    `    ${valueType} value;`,
    "    bool is_some;",
    `} ffi_option_${name};`,
  ].join("\n");

const definitionBody = (plan: TypePlan): readonly string[] => {
  const def = plan.def;
  switch (def.kind) {
    case "opaque":
      return [[...docLines(def.docs), `typedef struct ${def.name} ${def.name};`].join("\n")];
    case "struct":
      return [
        [
          ...docLines(def.docs),
          `typedef struct ${def.name} {`,
          ...plan.fields.flatMap((field) => [
            ...docLines(field.field.docs, "    "),
            `    ${cType(field.mapped.abi)} ${field.field.name};`,
          ]),
          `} ${def.name};`,
        ].join("\n"),
        optionStruct(def.name, def.name),
      ];
    case "enum":
      return [
        [
          ...docLines(def.docs),
          `typedef enum ${def.name} {`,
          ...def.variants.flatMap((variant) => [
            ...docLines(variant.docs, "    "),
            `    ${def.name}_${variant.name} = ${variant.value},`,
          ]),
          `} ${def.name};`,
        ].join("\n"),
        optionStruct(def.name, def.name),
      ];
    case "primitive":
      return [
        [...docLines(def.docs), `typedef ${cPrimitive(def.primitive)} ${def.name};`].join("\n"),
        optionStruct(def.name, def.name),
      ];
    default: {
      const exhaustive: never = def;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in definitionBody");
    }
  }
};

export const emitDefinitionHeader = (plan: TypePlan, context: EmitContext): string => {
  const def = plan.def;
  const fieldDependencies =
    def.kind === "struct"
      ? [
          ...new Set(
            def.fields
              .flatMap((field) => namedRefsOf(field.type))
              .map((ref) => ref.id)
              .filter((id) => id !== def.id)
          ),
        ].sort()
      : [];

  return guarded(`${def.name}_D_H`, [
    includeLines([
      RUNTIME_HEADER,
      ...fieldDependencies.map((id) => definitionHeaderName(defOf(context, id))),
    ]),
    ...definitionBody(plan),
  ]);
};

const resultStruct = (
  symbol: string,
  result: Extract<AbiType, { kind: "result" }>
): string => {
  const payloads = [
    ...(result.ok ? [`        ${cType(result.ok)} ok;`] : []),
    ...(result.err ? [`        ${cType(result.err)} err;`] : []),
  ];
  const name = resultTypeName(symbol);
  return [
    `typedef struct ${name} {`,
    ...(payloads.length > 0 ? ["    union {", ...payloads, "    };"] : []),
    "    bool is_ok;",
    `} ${name};`,
  ].join("\n");
};

const printParam = (param: AbiParam, symbol: string): string =>
  param.role === "out"
    ? `${cType(param.abi, symbol)}* ${param.name}`
    : `${cType(param.abi, symbol)} ${param.name}`;

export const printPrototype = (signature: AbiSignature): string => {
  const params =
    signature.params.length > 0
      ? signature.params.map((param) => printParam(param, signature.symbol)).join(", ")
      : "void";
  return `${cType(signature.returns, signature.symbol)} ${signature.symbol}(${params});`;
};

const methodDeclaration = (method: MethodPlan): string =>
  [...docLines(method.method.docs), printPrototype(method.signature)].join("\n");

export const emitDeclarationHeader = (plan: TypePlan, context: EmitContext): string => {
  const def = plan.def;
  const results = plan.methods.flatMap((method) =>
    method.returns.mapped.abi.kind === "result"
      ? [resultStruct(method.symbol, method.returns.mapped.abi)]
      : []
  );

  return guarded(`${def.name}_H`, [
    includeLines([
      RUNTIME_HEADER,
      definitionHeaderName(def),
      ...plan.dependencies.map((id) => definitionHeaderName(defOf(context, id))),
    ]),
    '#ifdef __cplusplus\nextern "C" {\n#endif',
    ...results,
    ...plan.methods.map(methodDeclaration),
    ...(plan.destructor ? [printPrototype(plan.destructor)] : []),
    "#ifdef __cplusplus\n}\n#endif",
  ]);
};

/**
 * The header pair of one type
 */
export const emitNativeType = (plan: TypePlan, context: EmitContext): readonly Artifact[] => [
  {
    path: `${NATIVE_DIRECTORY}/${definitionHeaderName(plan.def)}`,
    contents: emitDefinitionHeader(plan, context),
    role: "native",
    typeId: plan.def.id,
  },
  {
    path: `${NATIVE_DIRECTORY}/${declarationHeaderName(plan.def)}`,
    contents: emitDeclarationHeader(plan, context),
    role: "native",
    typeId: plan.def.id,
  },
];

/**
 * Umbrella header including every generated type
 */
export const emitLibraryHeader = (plans: readonly TypePlan[], library: string): string =>
  guarded(`${library}_FFIGEN_H`, [
    includeLines([RUNTIME_HEADER, ...plans.map((plan) => declarationHeaderName(plan.def))]),
  ]);
