/**
 * JavaScript host naming
 */

import type { NamingPolicyConfig, TypeDefKind } from "@ffigen/frontend";
import type { HostNaming } from "../plan/host-naming.js";

/**
 * Reserved words and strict-mode restricted names; none may name a
 * binding in an ES module
 */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "await",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "new",
  "null",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "with",
  "yield",
  "arguments",
  "eval",
]);

export const isJsReservedWord = (name: string): boolean => RESERVED_WORDS.has(name);

/** Exports of the runtime module and the index, plus globals the units use */
export const JS_RESERVED_TYPE_NAMES: readonly string[] = [
  "Arena",
  "FfiError",
  "FinalizationRegistry",
  "LibraryExports",
  "Object",
  "TypeError",
  "bindLibrary",
  "index",
  ...RESERVED_WORDS,
];

const reservedMembers = (_typeHostName: string, kind: TypeDefKind): readonly string[] => {
  switch (kind) {
    case "opaque":
      return ["constructor", "free", "prototype"];
    case "struct":
      return ["constructor", "prototype"];
    case "enum":
    case "primitive":
      return [];
    default: {
      const exhaustive: never = kind;
      void exhaustive;
      throw new Error("ICE: Unhandled TypeDef kind in reservedMembers");
    }
  }
};

export const jsNaming = (config?: NamingPolicyConfig): HostNaming => ({
  backend: "js",
  defaults: {
    types: "clr",
    methods: "camel",
    fields: "camel",
    enumMembers: "clr",
    parameters: "camel",
  },
  ...(config ? { config } : {}),
  escapeParameter: (name) => (isJsReservedWord(name) ? `${name}_` : name),
  reservedMembers,
  reservedTypeNames: JS_RESERVED_TYPE_NAMES,
});
