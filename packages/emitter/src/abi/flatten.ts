/**
 * Scalar leaves of an aggregate passed flattened (wasm32 convention):
 * structs field by field, slices as pointer then length, options as the
 * payload leaves followed by the presence flag.
 */

import type { PrimitiveName } from "@ffigen/frontend";
import type { LayoutContext } from "./layout.js";
import type { AbiType } from "./types.js";

export type LeafType = PrimitiveName | "ptr";

export const flattenLeaves = (
  abi: AbiType,
  context: LayoutContext
): readonly LeafType[] => {
  switch (abi.kind) {
    case "scalar":
    case "alias":
      return [abi.primitive];
    case "enum":
      return ["i32"];
    case "pointer":
    case "structPointer":
    case "write":
      return ["ptr"];
    case "slice":
      return ["ptr", "usize"];
    case "struct":
      return context
        .structFields(abi.typeId)
        .flatMap((field) => flattenLeaves(field, context));
    case "option":
      return [...flattenLeaves(abi.inner, context), "bool"];
    case "result":
    case "void":
      throw new Error(`ICE: ${abi.kind} values are never passed as parameters`);
    default: {
      const exhaustive: never = abi;
      void exhaustive;
      throw new Error("ICE: Unhandled ABI kind in flattenLeaves");
    }
  }
};
