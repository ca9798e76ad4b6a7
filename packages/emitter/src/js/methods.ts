/**
 * Generated JavaScript methods: argument conversion, the wasm call and
 * return decoding, inside an arena scope when the call allocates.
 */

import type * as ts from "typescript";
import { layoutOf, resultLayoutOf } from "../abi/layout.js";
import type { HostType } from "../mapping/host-types.js";
import type { MethodPlan, TypePlan } from "../plan/plan.js";
import {
  access,
  array,
  call,
  constStatement,
  elementAccess,
  expressionStatement,
  id,
  ifStatement,
  methodDeclaration,
  newExpr,
  nullLiteral,
  num,
  offsetBy,
  returnStatement,
  spread,
  str,
  thisExpr,
  throwStatement,
  tryFinally,
  withDocs,
} from "./ast.js";
import { tsTypeOf } from "./host-types.js";
import type { Arg, CallScope, HandleWrap } from "./marshal.js";
import { argExpressions, argsOf, BORROWED, fromDirect, readAt } from "./marshal.js";
import type { ModuleScope } from "./scope.js";
import { runtime } from "./scope.js";

const ARENA = "$arena";
const OUT = "$out";
const WRITE = "$write";

type Slot = {
  readonly local: string;
  readonly args: readonly Arg[];
  readonly transfer: boolean;
};

const selfSlot = (owner: TypePlan, method: MethodPlan, scope: CallScope): Slot | undefined => {
  const self = method.self;
  if (!self) return undefined;
  if (owner.def.kind === "struct") {
    return {
      local: "$self",
      args: [
        {
          expr: call(elementAccess(scope.module.refExpr(owner.def.id), runtime("FLATTEN")), [
            thisExpr(),
            scope.arena(),
          ]),
          spread: true,
        },
      ],
      transfer: false,
    };
  }
  const transfer = self.crossing.mode === "transfer";
  return {
    local: "$self",
    args: [
      {
        expr: call(elementAccess(thisExpr(), runtime(transfer ? "RELEASE" : "HANDLE"))),
        spread: false,
      },
    ],
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
): { readonly prelude: readonly ts.Statement[]; readonly args: readonly ts.Expression[] } => {
  if (!slots.some((slot) => slot.transfer)) {
    return { prelude: [], args: slots.flatMap((slot) => argExpressions(slot.args)) };
  }
  const asLocal = (slot: Slot): ts.Statement => {
    const only = slot.args[0];
    return constStatement(
      slot.local,
      slot.args.length === 1 && only && !only.spread ? only.expr : array(argExpressions(slot.args))
    );
  };
  const asArg = (slot: Slot): ts.Expression => {
    const only = slot.args[0];
    return slot.args.length === 1 && only && !only.spread ? id(slot.local) : spread(id(slot.local));
  };
  return {
    prelude: [
      ...slots.filter((slot) => !slot.transfer).map(asLocal),
      ...slots.filter((slot) => slot.transfer).map(asLocal),
    ],
    args: slots.map(asArg),
  };
};

const methodBody = (owner: TypePlan, method: MethodPlan, module: ModuleScope): readonly ts.Statement[] => {
  let allocates = false;
  const scope: CallScope = {
    module,
    arena: () => {
      allocates = true;
      return id(ARENA);
    },
  };
  const layout = module.context.layout;
  const returns = method.returns;
  const abi = returns.mapped.abi;
  const host = returns.mapped.host;

  const self = selfSlot(owner, method, scope);
  const slots: Slot[] = [
    ...(self ? [self] : []),
    ...method.params.map((param, index) => {
      const transfer = param.crossing.mode === "transfer";
      return {
        local: `$arg${index}`,
        args: argsOf(id(param.hostName), param.mapped.abi, scope, transfer),
        transfer,
      };
    }),
  ];
  const { prelude, args } = callArguments(slots);

  const buffers: ts.Statement[] = [];
  const trailing: ts.Expression[] = [];
  if (returns.convention.write) {
    buffers.push(constStatement(WRITE, call(access(scope.arena(), "createWrite"))));
    trailing.push(id(WRITE));
  }
  if (returns.convention.passing === "out") {
    const size = layoutOf(abi, layout);
    buffers.push(
      constStatement(OUT, call(access(scope.arena(), "alloc"), [num(size.size), num(size.align)]))
    );
    trailing.push(id(OUT));
  }

  const nativeCall = call(access(call(runtime("lib")), method.symbol), [...args, ...trailing]);
  const readWrite = (): ts.Expression => call(runtime("readWrite"), [id(WRITE)]);

  const statements = ((): readonly ts.Statement[] => {
    switch (returns.convention.passing) {
      case "void":
        return returns.convention.write
          ? [expressionStatement(nativeCall), returnStatement(readWrite())]
          : [expressionStatement(nativeCall)];
      case "direct":
        return [returnStatement(fromDirect(nativeCall, abi, scope, wrapFor(host, method)))];
      case "out": {
        if (abi.kind !== "result" || host.kind !== "outcome") {
          return [
            expressionStatement(nativeCall),
            returnStatement(readAt(id(OUT), abi, scope, wrapFor(host, method))),
          ];
        }
        const result = resultLayoutOf(abi.ok, abi.err, layout);
        const success =
          host.ok.kind === "sink"
            ? returnStatement(readWrite())
            : abi.ok
              ? returnStatement(
                  readAt(offsetBy(id(OUT), result.payloadOffset), abi.ok, scope, wrapFor(host.ok, method))
                )
              : returnStatement();
        const failure = abi.err
          ? readAt(offsetBy(id(OUT), result.payloadOffset), abi.err, scope, wrapFor(host.err, method))
          : nullLiteral();
        return [
          expressionStatement(nativeCall),
          ifStatement(
            call(runtime("readScalar"), [offsetBy(id(OUT), result.isOkOffset), str("bool")]),
            [success]
          ),
          throwStatement(newExpr(runtime("FfiError"), [failure])),
        ];
      }
      default: {
        const exhaustive: never = returns.convention.passing;
        void exhaustive;
        throw new Error("ICE: Unhandled return passing in methodBody");
      }
    }
  })();

  const body = [...buffers, ...prelude, ...statements];
  if (!allocates) {
    return body;
  }
  return [
    constStatement(ARENA, newExpr(runtime("Arena"))),
    tryFinally(body, [expressionStatement(call(access(id(ARENA), "free")))]),
  ];
};

/**
 * Class member of the `.mjs` unit
 */
export const emitMethod = (owner: TypePlan, method: MethodPlan, module: ModuleScope): ts.ClassElement =>
  withDocs(
    methodDeclaration(
      method.hostName,
      method.params.map((param) => ({ name: param.hostName })),
      methodBody(owner, method, module),
      { isStatic: method.self === undefined }
    ),
    method.method.docs,
    1
  );

/**
 * Class member of the `.d.mts` unit
 */
export const declareMethod = (method: MethodPlan, module: ModuleScope): ts.ClassElement =>
  withDocs(
    methodDeclaration(
      method.hostName,
      method.params.map((param) => ({
        name: param.hostName,
        type: tsTypeOf(param.mapped.host, "param", module),
      })),
      undefined,
      {
        isStatic: method.self === undefined,
        returnType: tsTypeOf(method.returns.mapped.host, "return", module),
      }
    ),
    method.method.docs,
    1
  );
