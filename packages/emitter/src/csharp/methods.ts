/**
 * Generated C# methods: the public wrapper and its P/Invoke declaration.
 *
 * A wrapper converts its arguments inside a `using` arena when the call
 * allocates, creates the write sink when the method produces text, calls
 * the native symbol and converts the result back.
 */

import type { HostType } from "../mapping/host-types.js";
import type { MethodPlan, TypePlan } from "../plan/plan.js";
import type { AbiParam } from "../plan/symbols.js";
import {
  assignment,
  attribute,
  binary,
  block,
  boolLiteral,
  expressionStatement,
  id,
  ifStatement,
  intLiteral,
  invoke,
  local,
  member,
  newObject,
  path,
  returnStatement,
  thisExpr,
  throwStatement,
  tryFinally,
  varLocal,
  varType,
  withModifier,
} from "./ast/builders.js";
import type {
  CSharpExpressionAst,
  CSharpMethodDeclarationAst,
  CSharpStatementAst,
} from "./ast/types.js";
import type { CSharpContext } from "./host-types.js";
import { abiTypeOf, csharpTypeOf, generatedType, NATIVE_CLASS, runtimeType } from "./host-types.js";
import type { CallScope, HandleWrap } from "./marshal.js";
import { BORROWED, fromAbi, readsTwice, toAbi } from "./marshal.js";
import { LOCAL_PREFIX } from "./naming.js";

export const LIBRARY_CLASS = "FfiLibrary";

const ARENA = `${LOCAL_PREFIX}arena`;
const WRITE = `${LOCAL_PREFIX}write`;
const OUT = `${LOCAL_PREFIX}out`;
const RESULT = `${LOCAL_PREFIX}result`;

const INTEROP = "global::System.Runtime.InteropServices";

/**
 * `[DllImport(FfiLibrary.Name, ExactSpelling = true)]`
 */
export const dllImport = (libraryName: CSharpExpressionAst) =>
  attribute(`${INTEROP}.DllImport`, [
    libraryName,
    assignment(id("ExactSpelling"), boolLiteral(true)),
  ]);

export const structLayout = (size: number) =>
  attribute(`${INTEROP}.StructLayout`, [
    path(`${INTEROP}.LayoutKind.Explicit`),
    assignment(id("Size"), intLiteral(size)),
  ]);

export const fieldOffset = (offset: number) =>
  attribute(`${INTEROP}.FieldOffset`, [intLiteral(offset)]);

type Slot = {
  readonly local: string;
  readonly arg: CSharpExpressionAst;
  readonly transfer: boolean;
};

const selfSlot = (owner: TypePlan, method: MethodPlan, scope: CallScope): Slot | undefined => {
  const self = method.self;
  if (!self) return undefined;
  if (owner.def.kind === "struct") {
    return {
      local: `${LOCAL_PREFIX}self`,
      arg: invoke(member(thisExpr(), "ToAbi"), [scope.arena()]),
      transfer: false,
    };
  }
  const transfer = self.crossing.mode === "transfer";
  return {
    local: `${LOCAL_PREFIX}self`,
    arg: invoke(member(thisExpr(), transfer ? "TakeHandle" : "Handle")),
    transfer,
  };
};

/**
 * Wrapping of handles found in a returned host type. Views keep their
 * lifetime sources reachable.
 */
const wrapFor = (host: HostType, method: MethodPlan): HandleWrap => {
  switch (host.kind) {
    case "handle":
      if (host.ownership === "owned") {
        return { owned: true, edges: [] };
      }
      return {
        owned: false,
        edges: method.lifetimeSources.map((source) => {
          if (source === "self") return thisExpr();
          const param = method.params.find((candidate) => candidate.param.name === source);
          if (!param) {
            throw new Error(`ICE: Lifetime source '${source}' is not a parameter`);
          }
          return id(param.hostName);
        }),
      };
    case "optional":
      return wrapFor(host.inner, method);
    default:
      return BORROWED;
  }
};

/**
 * Arguments in call order. When a handle is transferred, every argument is
 * converted into a local first and the transfers run last, so a failing
 * conversion never strands a released handle.
 */
const callArguments = (
  slots: readonly Slot[]
): { readonly prelude: readonly CSharpStatementAst[]; readonly args: readonly CSharpExpressionAst[] } => {
  if (!slots.some((slot) => slot.transfer)) {
    return { prelude: [], args: slots.map((slot) => slot.arg) };
  }
  return {
    prelude: [
      ...slots.filter((slot) => !slot.transfer).map((slot) => varLocal(slot.local, slot.arg)),
      ...slots.filter((slot) => slot.transfer).map((slot) => varLocal(slot.local, slot.arg)),
    ],
    args: slots.map((slot) => id(slot.local)),
  };
};

const library = (context: CSharpContext, name: string): CSharpExpressionAst =>
  member(generatedType(context, LIBRARY_CLASS), name);

const readWrite = (scope: CallScope): CSharpExpressionAst =>
  invoke(library(scope.context, "ReadWrite"), [id(WRITE)]);

/**
 * Statements after argument conversion: the call and the return
 */
const callAndReturn = (
  method: MethodPlan,
  nativeCall: CSharpExpressionAst,
  scope: CallScope
): readonly CSharpStatementAst[] => {
  const returns = method.returns;
  const abi = returns.mapped.abi;
  const host = returns.mapped.host;

  switch (returns.convention.passing) {
    case "void":
      return returns.convention.write
        ? [expressionStatement(nativeCall), returnStatement(readWrite(scope))]
        : [expressionStatement(nativeCall)];
    case "direct":
      if (readsTwice(abi)) {
        return [
          varLocal(RESULT, nativeCall),
          returnStatement(fromAbi(id(RESULT), abi, scope, wrapFor(host, method))),
        ];
      }
      return [returnStatement(fromAbi(nativeCall, abi, scope, wrapFor(host, method)))];
    case "out": {
      if (abi.kind !== "result" || host.kind !== "outcome") {
        return [
          expressionStatement(nativeCall),
          returnStatement(fromAbi(id(OUT), abi, scope, wrapFor(host, method))),
        ];
      }
      const success =
        host.ok.kind === "sink"
          ? returnStatement(readWrite(scope))
          : abi.ok
            ? returnStatement(fromAbi(member(id(OUT), "Ok"), abi.ok, scope, wrapFor(host.ok, method)))
            : returnStatement();
      const failure = abi.err
        ? newObject(
            runtimeType("FfiException", [csharpTypeOf(host.err, "return", scope.context)]),
            [fromAbi(member(id(OUT), "Err"), abi.err, scope, wrapFor(host.err, method))]
          )
        : newObject(runtimeType("FfiException"));
      return [
        expressionStatement(nativeCall),
        ifStatement(binary(member(id(OUT), "IsOk"), "!=", intLiteral(0)), [success]),
        throwStatement(failure),
      ];
    }
    default: {
      const exhaustive: never = returns.convention.passing;
      void exhaustive;
      throw new Error("ICE: Unhandled return passing in callAndReturn");
    }
  }
};

const methodBody = (
  owner: TypePlan,
  method: MethodPlan,
  context: CSharpContext
): readonly CSharpStatementAst[] => {
  let allocates = false;
  const scope: CallScope = {
    context,
    arena: () => {
      allocates = true;
      return id(ARENA);
    },
  };
  const returns = method.returns;

  const self = selfSlot(owner, method, scope);
  const slots: Slot[] = [
    ...(self ? [self] : []),
    ...method.params.map((param, index) => {
      const transfer = param.crossing.mode === "transfer";
      return {
        local: `${LOCAL_PREFIX}arg${index}`,
        arg: toAbi(id(param.hostName), param.mapped.abi, param.mapped.host, scope, transfer),
        transfer,
      };
    }),
  ];
  const { prelude, args } = callArguments(slots);

  const trailing: CSharpExpressionAst[] = [];
  const outDeclaration: CSharpStatementAst[] = [];
  if (returns.convention.write) {
    trailing.push(id(WRITE));
  }
  if (returns.convention.passing === "out") {
    outDeclaration.push(local(OUT, abiTypeOf(returns.mapped.abi, context, method.symbol)));
    trailing.push(withModifier("out", id(OUT)));
  }

  const nativeCall = invoke(path(`${NATIVE_CLASS}.${method.symbol}`), [...args, ...trailing]);
  const core = [...prelude, ...outDeclaration, ...callAndReturn(method, nativeCall, scope)];

  const body: CSharpStatementAst[] = returns.convention.write
    ? [
        varLocal(WRITE, invoke(library(context, "ffigen_write_create"), [intLiteral(0)])),
        tryFinally(core, [
          expressionStatement(invoke(library(context, "ffigen_write_destroy"), [id(WRITE)])),
        ]),
      ]
    : core;

  if (!allocates) {
    return body;
  }
  return [
    local(ARENA, varType(), newObject(runtimeType("FfiArena")), ["using"]),
    ...body,
  ];
};

/**
 * Public wrapper of one method
 */
export const emitMethod = (
  owner: TypePlan,
  method: MethodPlan,
  context: CSharpContext
): CSharpMethodDeclarationAst => ({
  kind: "methodDeclaration",
  attributes: [],
  modifiers: method.self ? ["public"] : ["public", "static"],
  returnType: csharpTypeOf(method.returns.mapped.host, "return", context),
  name: method.hostName,
  parameters: method.params.map((param) => ({
    name: param.hostName,
    type: csharpTypeOf(param.mapped.host, "param", context),
  })),
  body: block(methodBody(owner, method, context)),
  ...(method.method.docs !== undefined ? { docs: method.method.docs } : {}),
});

const nativeParameter = (param: AbiParam, symbol: string, context: CSharpContext) =>
  param.role === "out"
    ? { name: param.name, type: abiTypeOf(param.abi, context, symbol), modifiers: ["out"] }
    : { name: param.name, type: abiTypeOf(param.abi, context, symbol) };

/**
 * `internal static extern` declaration of a native symbol
 */
export const emitImport = (
  signature: MethodPlan["signature"],
  context: CSharpContext
): CSharpMethodDeclarationAst => ({
  kind: "methodDeclaration",
  attributes: [dllImport(library(context, "Name"))],
  modifiers: ["internal", "static", "extern"],
  returnType: abiTypeOf(signature.returns, context, signature.symbol),
  name: signature.symbol,
  parameters: signature.params.map((param) => nativeParameter(param, signature.symbol, context)),
});
