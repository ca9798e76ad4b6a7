/**
 * The shared runtime header: primitive options, slice typedefs, the write
 * sink and the support functions the native library exports.
 */

import type { PrimitiveName } from "@ffigen/frontend";
import { PRIMITIVE_NAMES } from "@ffigen/frontend";
import type { AbiTarget } from "../abi/target.js";
import { cPrimitive } from "./c-types.js";

export const RUNTIME_HEADER = "ffigen_runtime.h";

/** Native exports every host relies on besides the bound symbols */
export const SUPPORT_EXPORTS: readonly string[] = [
  "ffigen_alloc",
  "ffigen_free",
  "ffigen_write_create",
  "ffigen_write_bytes",
  "ffigen_write_len",
  "ffigen_write_append",
  "ffigen_write_destroy",
];

const typedefStruct = (name: string, members: readonly string[]): string =>
  [
    `typedef struct ${name} {`,
    ...members.map((member) => `    ${member};`),
    `} ${name};`,
  ].join("\n");

const primitiveOption = (primitive: PrimitiveName): string =>
  typedefStruct(`ffi_option_${primitive}`, [
    `${cPrimitive(primitive)} value`,
    "bool is_some",
  ]);

const primitiveSlices = (primitive: PrimitiveName): readonly string[] => [
  typedefStruct(`ffi_slice_${primitive}`, [
    `const ${cPrimitive(primitive)}* data`,
    "size_t len",
  ]),
  typedefStruct(`ffi_slice_mut_${primitive}`, [
    `${cPrimitive(primitive)}* data`,
    "size_t len",
  ]),
];

export const emitRuntimeHeader = (target: AbiTarget): string => {
  const sections: string[] = [
    [
      "// ffigen runtime ABI",
      `// Target: ${target.name} (pointer size ${target.pointerSize})`,
      "//",
      `// Aggregates larger than ${target.registerWidth} bytes are returned through a`,
      "// trailing `ffi_out` pointer. Fallible results always are; their layout",
      "// is `{ union { ok; err; }; bool is_ok; }` with unit payloads omitted.",
      "// Writeable output goes through a trailing `ffi_write` sink.",
    ].join("\n"),
    "#ifndef FFIGEN_RUNTIME_H\n#define FFIGEN_RUNTIME_H",
    "#include <stdbool.h>\n#include <stddef.h>\n#include <stdint.h>",
    '#ifdef __cplusplus\nextern "C" {\n#endif',
    ...PRIMITIVE_NAMES.map(primitiveOption),
    ...PRIMITIVE_NAMES.filter((primitive) => primitive !== "bool").flatMap(
      primitiveSlices
    ),
    typedefStruct("ffi_str_utf8", ["const char* data", "size_t len"]),
    typedefStruct("ffi_str_mut_utf8", ["char* data", "size_t len"]),
    typedefStruct("ffi_str_utf16", ["const uint16_t* data", "size_t len"]),
    typedefStruct("ffi_str_mut_utf16", ["uint16_t* data", "size_t len"]),
    typedefStruct("ffi_slice_str_utf8", [
      "const ffi_str_utf8* data",
      "size_t len",
    ]),
    typedefStruct("ffi_slice_str_utf16", [
      "const ffi_str_utf16* data",
      "size_t len",
    ]),
    "typedef struct ffi_write ffi_write;",
    [
      "void* ffigen_alloc(size_t size, size_t align);",
      "void ffigen_free(void* ptr, size_t size, size_t align);",
      "ffi_write* ffigen_write_create(size_t capacity);",
      "const uint8_t* ffigen_write_bytes(const ffi_write* write);",
      "size_t ffigen_write_len(const ffi_write* write);",
      "bool ffigen_write_append(ffi_write* write, const uint8_t* bytes, size_t len);",
      "void ffigen_write_destroy(ffi_write* write);",
    ].join("\n"),
    "#ifdef __cplusplus\n}\n#endif",
    "#endif",
  ];

  return `${sections.join("\n\n")}\n`;
};
