/**
 * C# host backend (P/Invoke)
 */

import { readFileSync } from "node:fs";
import type { NamingPolicyConfig } from "@ffigen/frontend";
import type { Artifact, EmitContext, HostBackend } from "../backend.js";
import type { TypePlan } from "../plan/plan.js";
import {
  block,
  id,
  invoke,
  member,
  newObject,
  predefinedType,
  returnStatement,
  stringLiteral,
} from "./ast/builders.js";
import { printCompilationUnit } from "./ast/printer.js";
import type { CSharpMemberAst, CSharpParameterAst, CSharpTypeAst } from "./ast/types.js";
import { runtimeType } from "./host-types.js";
import { dllImport, LIBRARY_CLASS } from "./methods.js";
import { csharpNaming } from "./naming.js";
import type { UnitOptions } from "./units.js";
import { unitAst } from "./units.js";

export type CSharpOptions = {
  /** Namespace of the generated types */
  readonly namespace: string;
  /** Library name passed to `DllImport` */
  readonly libraryName: string;
};

const RUNTIME_FILE = "FfiRuntime.cs";

const readRuntime = (): string =>
  readFileSync(new URL(`../../runtime/csharp/${RUNTIME_FILE}`, import.meta.url), "utf-8");

const header = (library: string): readonly string[] => [
  "<auto-generated>",
  `Generated by ffigen for the '${library}' library. Do not edit.`,
  "</auto-generated>",
];

const writeImport = (
  name: string,
  returnType: CSharpTypeAst,
  parameters: readonly CSharpParameterAst[]
): CSharpMemberAst => ({
  kind: "methodDeclaration",
  attributes: [dllImport(id("Name"))],
  modifiers: ["internal", "static", "extern"],
  returnType,
  name,
  parameters,
});

const WRITE_PARAM: CSharpParameterAst = { name: "write", type: predefinedType("nint") };

/**
 * `FfiLibrary`: the library name and the write sink support exports
 */
const libraryUnit = (options: CSharpOptions, library: string): string =>
  printCompilationUnit({
    kind: "compilationUnit",
    header: header(library),
    nullableEnable: true,
    usings: [],
    members: [
      {
        kind: "namespaceDeclaration",
        name: options.namespace,
        members: [
          {
            kind: "classDeclaration",
            attributes: [],
            modifiers: ["internal", "static"],
            name: LIBRARY_CLASS,
            interfaces: [],
            members: [
              {
                kind: "fieldDeclaration",
                attributes: [],
                modifiers: ["internal", "const"],
                type: predefinedType("string"),
                name: "Name",
                initializer: stringLiteral(options.libraryName),
              },
              writeImport("ffigen_write_create", predefinedType("nint"), [
                { name: "capacity", type: predefinedType("nuint") },
              ]),
              writeImport("ffigen_write_bytes", predefinedType("nint"), [WRITE_PARAM]),
              writeImport("ffigen_write_len", predefinedType("nuint"), [WRITE_PARAM]),
              writeImport("ffigen_write_destroy", predefinedType("void"), [WRITE_PARAM]),
              {
                kind: "methodDeclaration",
                attributes: [],
                modifiers: ["internal", "static"],
                returnType: predefinedType("string"),
                name: "ReadWrite",
                parameters: [WRITE_PARAM],
                body: block([
                  returnStatement(
                    invoke(
                      member(
                        newObject(runtimeType("FfiSlice"), [
                          invoke(id("ffigen_write_bytes"), [id("write")]),
                          invoke(id("ffigen_write_len"), [id("write")]),
                        ]),
                        "ToUtf8String"
                      )
                    )
                  ),
                ]),
              },
            ],
          },
        ],
      },
    ],
  });

export const createCSharpBackend = (
  options: CSharpOptions,
  naming?: NamingPolicyConfig
): HostBackend => {
  const emitType = (plan: TypePlan, context: EmitContext): readonly Artifact[] => {
    const unitOptions: UnitOptions = {
      namespace: options.namespace,
      header: header(context.library),
    };
    return [
      {
        path: `${plan.hostName}.cs`,
        contents: printCompilationUnit(unitAst(plan, context, unitOptions)),
        role: "host",
        typeId: plan.def.id,
      },
    ];
  };

  const emitSupport = (_plans: readonly TypePlan[], context: EmitContext): readonly Artifact[] => [
    { path: RUNTIME_FILE, contents: readRuntime(), role: "support" },
    {
      path: `${LIBRARY_CLASS}.cs`,
      contents: libraryUnit(options, context.library),
      role: "support",
    },
  ];

  return {
    id: "csharp",
    naming: csharpNaming(naming),
    emitType,
    emitSupport,
  };
};
