/**
 * Marshaling between host values and the wasm32 boundary.
 *
 * Arguments are flattened into scalar leaves. Values in linear memory (out
 * pointers, struct fields, result payloads) are read and written through
 * the runtime's little-endian accessors.
 */

import type { IrSliceElement } from "@ffigen/frontend";
import type * as ts from "typescript";
import { flattenLeaves } from "../abi/flatten.js";
import { layoutOf, optionLayoutOf } from "../abi/layout.js";
import type { AbiSlice, AbiType } from "../abi/types.js";
import {
  access,
  array,
  bigint,
  bool,
  call,
  conditional,
  elementAccess,
  expressionStatement,
  ifStatement,
  isNullish,
  nullLiteral,
  num,
  offsetBy,
  paren,
  spread,
  str,
} from "./ast.js";
import type { ModuleScope } from "./scope.js";
import { runtime } from "./scope.js";

export type CallScope = {
  readonly module: ModuleScope;
  /** The call's arena; referencing it makes the call allocate one */
  readonly arena: () => ts.Expression;
};

/**
 * One call argument, or a list of them when `spread`
 */
export type Arg = {
  readonly expr: ts.Expression;
  readonly spread: boolean;
};

/**
 * How a handle read back from native code is wrapped
 */
export type HandleWrap = {
  readonly owned: boolean;
  /** Values the wrapper keeps reachable */
  readonly edges: readonly ts.Expression[];
};

export const BORROWED: HandleWrap = { owned: false, edges: [] };

const single = (expr: ts.Expression): Arg => ({ expr, spread: false });

export const argExpressions = (args: readonly Arg[]): readonly ts.Expression[] =>
  args.map((arg) => (arg.spread ? spread(arg.expr) : arg.expr));

const sliceElementTag = (element: IrSliceElement): string => {
  switch (element.encoding) {
    case "primitive":
      return element.primitive;
    case "utf8":
    case "utf16":
      return element.encoding;
    case "strings":
      throw new Error("ICE: string lists are never read back");
    default: {
      const exhaustive: never = element;
      void exhaustive;
      throw new Error("ICE: Unhandled slice encoding in sliceElementTag");
    }
  }
};

/**
 * `[ptr, len]` of a slice copied into the call's arena
 */
const encodeSlice = (value: ts.Expression, abi: AbiSlice, scope: CallScope): ts.Expression => {
  const arenaCall = (method: string, args: readonly ts.Expression[]): ts.Expression =>
    call(access(scope.arena(), method), args);
  const element = abi.element;
  const encoded = ((): ts.Expression => {
    switch (element.encoding) {
      case "primitive":
        return arenaCall("encodeBuffer", [value, str(element.primitive), bool(abi.mutable)]);
      case "utf8":
      case "utf16":
        return arenaCall("encodeText", [value, str(element.encoding)]);
      case "strings":
        return arenaCall("encodeStrings", [value, str(element.text)]);
      default: {
        const exhaustive: never = element;
        void exhaustive;
        throw new Error("ICE: Unhandled slice encoding in encodeSlice");
      }
    }
  })();
  return abi.nullable
    ? conditional(isNullish(value), array([num(0), num(0)]), encoded)
    : encoded;
};

const handleArg = (
  value: ts.Expression,
  typeId: string,
  nullable: boolean,
  transfer: boolean,
  scope: CallScope
): ts.Expression =>
  call(runtime(transfer ? "takeHandle" : "handleOf"), [
    value,
    scope.module.refExpr(typeId),
    ...(nullable ? [bool(true)] : []),
  ]);

/**
 * wasm arguments carrying one host value
 */
export const argsOf = (
  value: ts.Expression,
  abi: AbiType,
  scope: CallScope,
  transfer = false
): readonly Arg[] => {
  const layout = scope.module.context.layout;
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return abi.primitive === "bool" || abi.primitive === "char"
        ? [single(call(runtime("toLeaf"), [value, str(abi.primitive)]))]
        : [single(value)];
    case "enum":
      return [single(value)];
    case "pointer":
      return [single(handleArg(value, abi.typeId, abi.nullable, transfer, scope))];
    case "structPointer": {
      const size = layoutOf({ kind: "struct", typeId: abi.typeId, name: abi.name }, layout);
      return [
        single(
          call(access(scope.arena(), "store"), [
            scope.module.refExpr(abi.typeId),
            value,
            num(size.size),
            num(size.align),
          ])
        ),
      ];
    }
    case "struct":
      return [
        {
          expr: call(elementAccess(scope.module.refExpr(abi.typeId), runtime("FLATTEN")), [
            value,
            scope.arena(),
          ]),
          spread: true,
        },
      ];
    case "slice":
      return [{ expr: encodeSlice(value, abi, scope), spread: true }];
    case "option": {
      const zeros = flattenLeaves(abi.inner, layout).map((leaf) =>
        leaf === "i64" || leaf === "u64" ? bigint(0) : num(0)
      );
      const present = array([...argExpressions(argsOf(value, abi.inner, scope)), num(1)]);
      return [
        {
          expr: paren(conditional(isNullish(value), array([...zeros, num(0)]), present)),
          spread: true,
        },
      ];
    }
    case "result":
    case "write":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never arguments`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in argsOf");
    }
  }
};

const wrapHandle = (
  pointer: ts.Expression,
  typeId: string,
  nullable: boolean,
  wrap: HandleWrap,
  scope: CallScope
): ts.Expression =>
  call(runtime(nullable ? "wrapOptional" : "wrap"), [
    scope.module.refExpr(typeId),
    pointer,
    bool(wrap.owned),
    ...(wrap.edges.length > 0 ? [array(wrap.edges)] : []),
  ]);

/**
 * Host value of a scalar or handle returned in a register
 */
export const fromDirect = (
  raw: ts.Expression,
  abi: AbiType,
  scope: CallScope,
  wrap: HandleWrap
): ts.Expression => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      switch (abi.primitive) {
        case "bool":
        case "char":
        case "u32":
        case "usize":
        case "u64":
          return call(runtime("fromLeaf"), [raw, str(abi.primitive)]);
        default:
          return raw;
      }
    case "enum":
      return raw;
    case "pointer":
      return wrapHandle(raw, abi.typeId, abi.nullable, wrap, scope);
    default:
      throw new Error(`ICE: ${abi.kind} is not returned in a register on wasm32`);
  }
};

/**
 * Host value stored at `address`
 */
export const readAt = (
  address: ts.Expression,
  abi: AbiType,
  scope: CallScope,
  wrap: HandleWrap
): ts.Expression => {
  const layout = scope.module.context.layout;
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return call(runtime("readScalar"), [address, str(abi.primitive)]);
    case "enum":
      return call(runtime("readScalar"), [address, str("i32")]);
    case "pointer":
      return wrapHandle(
        call(runtime("readPointer"), [address]),
        abi.typeId,
        abi.nullable,
        wrap,
        scope
      );
    case "struct":
      return call(elementAccess(scope.module.refExpr(abi.typeId), runtime("READ")), [address]);
    case "slice":
      return call(runtime("readSliceAt"), [
        address,
        str(sliceElementTag(abi.element)),
        ...(abi.nullable ? [bool(true)] : []),
      ]);
    case "option": {
      const option = optionLayoutOf(abi.inner, layout);
      return conditional(
        call(runtime("readScalar"), [offsetBy(address, option.isSomeOffset), str("bool")]),
        readAt(offsetBy(address, option.valueOffset), abi.inner, scope, wrap),
        nullLiteral()
      );
    }
    case "structPointer":
    case "result":
    case "write":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never read from memory`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in readAt");
    }
  }
};

/**
 * Statements storing a host value at `address`
 */
export const writeAt = (
  address: ts.Expression,
  value: ts.Expression,
  abi: AbiType,
  scope: CallScope
): readonly ts.Statement[] => {
  const layout = scope.module.context.layout;
  const writeScalar = (at: ts.Expression, primitive: string, scalar: ts.Expression): ts.Statement =>
    expressionStatement(call(runtime("writeScalar"), [at, str(primitive), scalar]));

  switch (abi.kind) {
    case "scalar":
    case "alias":
      return [writeScalar(address, abi.primitive, value)];
    case "enum":
      return [writeScalar(address, "i32", value)];
    case "pointer":
      return [
        writeScalar(address, "usize", handleArg(value, abi.typeId, abi.nullable, false, scope)),
      ];
    case "struct":
      return [
        expressionStatement(
          call(elementAccess(scope.module.refExpr(abi.typeId), runtime("WRITE")), [
            address,
            value,
            scope.arena(),
          ])
        ),
      ];
    case "slice":
      return [
        expressionStatement(
          call(runtime("writeSliceAt"), [address, encodeSlice(value, abi, scope)])
        ),
      ];
    case "option": {
      const option = optionLayoutOf(abi.inner, layout);
      const flag = offsetBy(address, option.isSomeOffset);
      return [
        ifStatement(
          isNullish(value),
          [writeScalar(flag, "bool", bool(false))],
          [
            ...writeAt(offsetBy(address, option.valueOffset), value, abi.inner, scope),
            writeScalar(flag, "bool", bool(true)),
          ]
        ),
      ];
    }
    case "structPointer":
    case "result":
    case "write":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never stored in memory`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in writeAt");
    }
  }
};
