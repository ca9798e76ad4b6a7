/**
 * Conversions between host values and their native representation
 */

import type { IrSliceElement } from "@ffigen/frontend";
import type { AbiType } from "../abi/types.js";
import { optionTypeName } from "../c/c-types.js";
import { hostNameOf } from "../backend.js";
import type { HostType } from "../mapping/host-types.js";
import {
  assignment,
  binary,
  boolLiteral,
  cast,
  conditional,
  defaultOf,
  id,
  identifierType,
  intLiteral,
  invoke,
  member,
  newObject,
  nullLiteral,
  predefinedType,
} from "./ast/builders.js";
import type { CSharpExpressionAst, CSharpTypeAst } from "./ast/types.js";
import type { CSharpContext } from "./host-types.js";
import { bufferElementType, generatedType, NATIVE_CLASS, RUNE, systemType } from "./host-types.js";

export type CallScope = {
  readonly context: CSharpContext;
  /** The call's arena; referencing it makes the call allocate one */
  readonly arena: () => CSharpExpressionAst;
};

/**
 * How a handle read back from native code is wrapped
 */
export type HandleWrap = {
  readonly owned: boolean;
  /** Values the wrapper keeps reachable */
  readonly edges: readonly CSharpExpressionAst[];
};

export const BORROWED: HandleWrap = { owned: false, edges: [] };

const isNull = (value: CSharpExpressionAst): CSharpExpressionAst =>
  binary(value, "==", nullLiteral());

const arenaCall = (
  scope: CallScope,
  method: string,
  args: readonly CSharpExpressionAst[],
  typeArgument?: CSharpTypeAst
): CSharpExpressionAst =>
  invoke(member(scope.arena(), method), args, typeArgument ? [typeArgument] : undefined);

const encodeSlice = (
  value: CSharpExpressionAst,
  element: IrSliceElement,
  mutable: boolean,
  scope: CallScope
): CSharpExpressionAst => {
  switch (element.encoding) {
    case "primitive":
      return arenaCall(scope, mutable ? "Pin" : "Copy", [value], bufferElementType(element.primitive));
    case "utf8":
      return arenaCall(scope, "Utf8", [value]);
    case "utf16":
      return arenaCall(scope, "Utf16", [value]);
    case "strings":
      return arenaCall(scope, element.text === "utf8" ? "Utf8List" : "Utf16List", [value]);
    default: {
      const exhaustive: never = element;
      void exhaustive;
      throw new Error("ICE: Unhandled slice encoding in encodeSlice");
    }
  }
};

const innerOf = (host: HostType): HostType => (host.kind === "optional" ? host.inner : host);

/**
 * Native representation of a host value
 */
export const toAbi = (
  value: CSharpExpressionAst,
  abi: AbiType,
  host: HostType,
  scope: CallScope,
  transfer = false
): CSharpExpressionAst => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      switch (abi.primitive) {
        case "bool":
          return conditional(
            value,
            cast(predefinedType("byte"), intLiteral(1)),
            cast(predefinedType("byte"), intLiteral(0))
          );
        case "char":
          return cast(predefinedType("uint"), member(value, "Value"));
        default:
          return value;
      }
    case "enum":
      return value;
    case "pointer": {
      const handle = invoke(member(value, transfer ? "TakeHandle" : "Handle"));
      return abi.nullable ? conditional(isNull(value), intLiteral(0), handle) : handle;
    }
    case "structPointer":
      return arenaCall(scope, "Store", [invoke(member(value, "ToAbi"), [scope.arena()])]);
    case "struct":
      return invoke(member(value, "ToAbi"), [scope.arena()]);
    case "slice": {
      const encoded = encodeSlice(value, abi.element, abi.mutable, scope);
      return abi.nullable ? conditional(isNull(value), defaultOf(), encoded) : encoded;
    }
    case "option": {
      const present = member(value, "Value");
      return conditional(
        member(value, "HasValue"),
        newObject(
          identifierType(`${NATIVE_CLASS}.${optionTypeName(abi.inner)}`),
          [],
          [
            assignment(id("Value"), toAbi(present, abi.inner, innerOf(host), scope)),
            assignment(id("IsSome"), intLiteral(1)),
          ]
        ),
        defaultOf()
      );
    }
    case "result":
    case "write":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never converted from host values`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in toAbi");
    }
  }
};

const decodeSlice = (raw: CSharpExpressionAst, element: IrSliceElement): CSharpExpressionAst => {
  switch (element.encoding) {
    case "primitive":
      return invoke(member(raw, "ToArray"), [], [bufferElementType(element.primitive)]);
    case "utf8":
      return invoke(member(raw, "ToUtf8String"));
    case "utf16":
      return invoke(member(raw, "ToUtf16String"));
    case "strings":
      throw new Error("ICE: string lists are never read back");
    default: {
      const exhaustive: never = element;
      void exhaustive;
      throw new Error("ICE: Unhandled slice encoding in decodeSlice");
    }
  }
};

/**
 * Whether `fromAbi` reads its operand more than once
 */
export const readsTwice = (abi: AbiType): boolean =>
  abi.kind === "option" || (abi.kind === "slice" && abi.nullable);

/**
 * Host value of a native representation. `raw` is read twice for the
 * kinds `readsTwice` names, so it must be a plain location for those.
 */
export const fromAbi = (
  raw: CSharpExpressionAst,
  abi: AbiType,
  scope: CallScope,
  wrap: HandleWrap
): CSharpExpressionAst => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      switch (abi.primitive) {
        case "bool":
          return binary(raw, "!=", intLiteral(0));
        case "char":
          return newObject(systemType(RUNE), [raw]);
        default:
          return raw;
      }
    case "enum":
      return raw;
    case "pointer":
      return invoke(
        member(
          generatedType(scope.context, hostNameOf(scope.context, abi.typeId)),
          abi.nullable ? "FromNullableHandle" : "FromHandle"
        ),
        [raw, boolLiteral(wrap.owned), ...wrap.edges]
      );
    case "struct":
      return invoke(
        member(generatedType(scope.context, hostNameOf(scope.context, abi.typeId)), "FromAbi"),
        [raw]
      );
    case "slice": {
      const decoded = decodeSlice(raw, abi.element);
      return abi.nullable ? conditional(member(raw, "IsNull"), nullLiteral(), decoded) : decoded;
    }
    case "option":
      return conditional(
        binary(member(raw, "IsSome"), "!=", intLiteral(0)),
        fromAbi(member(raw, "Value"), abi.inner, scope, wrap),
        nullLiteral()
      );
    case "structPointer":
    case "result":
    case "write":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never converted to host values`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in fromAbi");
    }
  }
};
