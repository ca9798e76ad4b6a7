/**
 * C# host naming
 */

import type { NamingPolicyConfig, TypeDefKind } from "@ffigen/frontend";
import type { HostNaming } from "../plan/host-naming.js";

/** Generated locals start with this prefix */
export const LOCAL_PREFIX = "__";

/** Class generated beside the units; nested helper types every unit may declare */
export const CSHARP_RESERVED_TYPE_NAMES: readonly string[] = ["Abi", "FfiLibrary", "Native"];

const reservedMembers = (typeHostName: string, kind: TypeDefKind): readonly string[] => {
  switch (kind) {
    case "opaque":
      return [
        typeHostName,
        "Dispose",
        "Finalize",
        "FromHandle",
        "FromNullableHandle",
        "Handle",
        "Native",
        "TakeHandle",
        "_edges",
        "_handle",
        "_owned",
      ];
    case "struct":
      return [typeHostName, "Abi", "FromAbi", "Native", "ToAbi"];
    case "enum":
      return [typeHostName];
    case "primitive":
      return [];
    default: {
      const exhaustive: never = kind;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in reservedMembers");
    }
  }
};

/**
 * Keywords are escaped with `@` by the printer, so parameter names pass
 * through unchanged.
 */
export const csharpNaming = (config?: NamingPolicyConfig): HostNaming => ({
  backend: "csharp",
  defaults: {
    types: "clr",
    methods: "clr",
    fields: "clr",
    enumMembers: "clr",
    parameters: "camel",
  },
  ...(config ? { config } : {}),
  escapeParameter: (name) => name,
  reservedMembers,
  reservedTypeNames: CSHARP_RESERVED_TYPE_NAMES,
  reservedParameterPrefix: LOCAL_PREFIX,
});
