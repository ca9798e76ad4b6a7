/**
 * JavaScript units: one `.mjs` module and one `.d.mts` declaration file per
 * enabled type.
 */

import type * as ts from "typescript";
import type { EmitContext } from "../backend.js";
import type { TypePlan } from "../plan/plan.js";
import {
  access,
  and,
  array,
  arrow,
  assign,
  bool,
  call,
  classDeclaration,
  computedName,
  constStatement,
  constructorDeclaration,
  declareConst,
  elementAccess,
  emptyExport,
  expressionStatement,
  fieldDeclaration,
  id,
  ifStatement,
  keywordType,
  methodDeclaration,
  newExpr,
  not,
  num,
  numberLiteralType,
  object,
  offsetBy,
  privateAccess,
  privateField,
  returnStatement,
  str,
  strictEquals,
  strictNotEquals,
  thisExpr,
  throwStatement,
  typeAlias,
  typeLiteral,
  valuesOfType,
  withDocs,
} from "./ast.js";
import { primitiveType, tsTypeOf } from "./host-types.js";
import type { CallScope } from "./marshal.js";
import { argExpressions, argsOf, BORROWED, readAt, writeAt } from "./marshal.js";
import { declareMethod, emitMethod } from "./methods.js";
import type { ModuleScope } from "./scope.js";
import { createModuleScope, runtime } from "./scope.js";

export type UnitSource = {
  readonly module: readonly ts.Statement[];
  readonly declarations: readonly ts.Statement[];
};

const FINALIZER = "$finalizer";

const typeError = (message: string): ts.Statement =>
  throwStatement(newExpr(id("TypeError"), [str(message)]));

// ============================================================
// Opaque
// ============================================================

const opaqueModule = (plan: TypePlan, scope: ModuleScope): readonly ts.Statement[] => {
  const name = plan.hostName;
  const destructor = plan.destructor;
  if (!destructor) {
    throw new Error(`ICE: Opaque type '${plan.def.id}' has no destructor`);
  }
  const destroy = (pointer: ts.Expression): ts.Expression =>
    call(access(call(runtime("lib")), destructor.symbol), [pointer]);
  const finalizer = id(FINALIZER);
  const ptr = privateAccess("ptr");
  const owned = privateAccess("owned");

  const members: ts.ClassElement[] = [
    privateField("ptr"),
    privateField("owned"),
    privateField("edges"),
    constructorDeclaration(
      [{ name: "token" }, { name: "ptr" }, { name: "owned" }, { name: "edges" }],
      [
        ifStatement(strictNotEquals(id("token"), runtime("INTERNAL")), [
          typeError(`${name} cannot be constructed directly`),
        ]),
        assign(ptr, id("ptr")),
        assign(owned, id("owned")),
        assign(privateAccess("edges"), id("edges")),
        ifStatement(id("owned"), [
          expressionStatement(
            call(access(finalizer, "register"), [thisExpr(), id("ptr"), thisExpr()])
          ),
        ]),
      ]
    ),
    methodDeclaration(computedName(runtime("HANDLE")), [], [
      ifStatement(strictEquals(ptr, num(0)), [typeError(`${name} has been freed`)]),
      returnStatement(ptr),
    ]),
    methodDeclaration(computedName(runtime("RELEASE")), [], [
      constStatement("ptr", call(elementAccess(thisExpr(), runtime("HANDLE")))),
      ifStatement(not(owned), [typeError(`Cannot transfer a borrowed ${name}`)]),
      expressionStatement(call(access(finalizer, "unregister"), [thisExpr()])),
      assign(ptr, num(0)),
      assign(owned, bool(false)),
      returnStatement(id("ptr")),
    ]),
    withDocs(
      methodDeclaration("free", [], [
        ifStatement(and(owned, strictNotEquals(ptr, num(0))), [
          expressionStatement(call(access(finalizer, "unregister"), [thisExpr()])),
          expressionStatement(destroy(ptr)),
        ]),
        assign(ptr, num(0)),
        assign(owned, bool(false)),
        assign(privateAccess("edges"), array([])),
      ]),
      "Destroy the native object now if this wrapper owns it; the wrapper is unusable afterwards",
      1
    ),
    ...plan.methods.map((method) => emitMethod(plan, method, scope)),
  ];

  return [
    constStatement(
      FINALIZER,
      newExpr(id("FinalizationRegistry"), [arrow(["ptr"], destroy(id("ptr")))])
    ),
    withDocs(classDeclaration(name, members), plan.def.docs),
  ];
};

const opaqueDeclarations = (plan: TypePlan, scope: ModuleScope): readonly ts.Statement[] => [
  withDocs(
    classDeclaration(
      plan.hostName,
      [
        constructorDeclaration([], undefined, { isPrivate: true }),
        withDocs(
          methodDeclaration("free", [], undefined, { returnType: keywordType("void") }),
          "Destroy the native object now if this wrapper owns it; the wrapper is unusable afterwards",
          1
        ),
        ...plan.methods.map((method) => declareMethod(method, scope)),
      ],
      { declare: true }
    ),
    plan.def.docs
  ),
];

// ============================================================
// Struct
// ============================================================

const structModule = (plan: TypePlan, scope: ModuleScope): readonly ts.Statement[] => {
  const name = plan.hostName;
  const staticScope: CallScope = { module: scope, arena: () => id("$arena") };
  const value = (field: string): ts.Expression => access(id("$value"), field);

  const members: ts.ClassElement[] = [
    constructorDeclaration(
      [{ name: "init" }],
      plan.fields.map((field) =>
        assign(access(thisExpr(), field.hostName), access(id("init"), field.hostName))
      )
    ),
    methodDeclaration(
      computedName(runtime("READ")),
      [{ name: "$ptr" }],
      [
        returnStatement(
          newExpr(id(name), [
            object(
              plan.fields.map((field) => ({
                name: field.hostName,
                value: readAt(
                  offsetBy(id("$ptr"), field.offset),
                  field.mapped.abi,
                  staticScope,
                  BORROWED
                ),
              }))
            ),
          ])
        ),
      ],
      { isStatic: true }
    ),
    methodDeclaration(
      computedName(runtime("WRITE")),
      [{ name: "$ptr" }, { name: "$value" }, { name: "$arena" }],
      plan.fields.flatMap((field) =>
        writeAt(
          offsetBy(id("$ptr"), field.offset),
          value(field.hostName),
          field.mapped.abi,
          staticScope
        )
      ),
      { isStatic: true }
    ),
    methodDeclaration(
      computedName(runtime("FLATTEN")),
      [{ name: "$value" }, { name: "$arena" }],
      [
        returnStatement(
          array(
            plan.fields.flatMap((field) =>
              argExpressions(argsOf(value(field.hostName), field.mapped.abi, staticScope))
            )
          )
        ),
      ],
      { isStatic: true }
    ),
    ...plan.methods.map((method) => emitMethod(plan, method, scope)),
  ];

  return [withDocs(classDeclaration(name, members), plan.def.docs)];
};

const structDeclarations = (plan: TypePlan, scope: ModuleScope): readonly ts.Statement[] => [
  withDocs(
    classDeclaration(
      plan.hostName,
      [
        constructorDeclaration(
          [
            {
              name: "init",
              type: typeLiteral(
                plan.fields.map((field) => ({
                  name: field.hostName,
                  type: tsTypeOf(field.mapped.host, "field", scope),
                })),
                1
              ),
            },
          ],
          undefined
        ),
        ...plan.fields.map((field) =>
          withDocs(
            fieldDeclaration(field.hostName, tsTypeOf(field.mapped.host, "field", scope)),
            field.field.docs,
            1
          )
        ),
        ...plan.methods.map((method) => declareMethod(method, scope)),
      ],
      { declare: true }
    ),
    plan.def.docs
  ),
];

// ============================================================
// Enum & alias
// ============================================================

const enumModule = (plan: TypePlan): readonly ts.Statement[] => [
  withDocs(
    constStatement(
      plan.hostName,
      call(access(id("Object"), "freeze"), [
        object(plan.variants.map((v) => ({ name: v.hostName, value: num(v.variant.value) }))),
      ]),
      true
    ),
    plan.def.docs
  ),
];

const enumDeclarations = (plan: TypePlan): readonly ts.Statement[] => [
  withDocs(
    declareConst(
      plan.hostName,
      typeLiteral(
        plan.variants.map((v) => ({
          name: v.hostName,
          type: numberLiteralType(v.variant.value),
          ...(v.variant.docs !== undefined ? { docs: v.variant.docs } : {}),
        }))
      )
    ),
    plan.def.docs
  ),
  typeAlias(plan.hostName, valuesOfType(plan.hostName)),
];

const aliasDeclarations = (plan: TypePlan): readonly ts.Statement[] => {
  if (plan.def.kind !== "primitive") {
    throw new Error(`ICE: '${plan.def.id}' is not a primitive alias`);
  }
  return [withDocs(typeAlias(plan.hostName, primitiveType(plan.def.primitive)), plan.def.docs)];
};

/**
 * Statements of both files of one unit, imports first
 */
export const unitSource = (plan: TypePlan, context: EmitContext): UnitSource => {
  const values = createModuleScope(context, plan.def.id, "value");
  const types = createModuleScope(context, plan.def.id, "type");
  const def = plan.def;

  const body = ((): UnitSource => {
    switch (def.kind) {
      case "opaque":
        values.useRuntime();
        return {
          module: opaqueModule(plan, values),
          declarations: opaqueDeclarations(plan, types),
        };
      case "struct":
        values.useRuntime();
        return {
          module: structModule(plan, values),
          declarations: structDeclarations(plan, types),
        };
      case "enum":
        return { module: enumModule(plan), declarations: enumDeclarations(plan) };
      case "primitive":
        return { module: [emptyExport()], declarations: aliasDeclarations(plan) };
      default: {
        const exhaustive: never = def;
        void exhaustive;
        throw new Error("ICE: Unhandled TypeDef kind in unitSource");
      }
    }
  })();

  return {
    module: [...values.imports(), ...body.module],
    declarations: [...types.imports(), ...body.declarations],
  };
};
