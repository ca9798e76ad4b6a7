import { describe, it } from "mocha";
import { expect } from "chai";
import { ir } from "@ffigen/frontend";
import { generateBindings } from "../generate.js";
import { artifactText, lines, registryOf } from "../test-harness.js";

const {
  enumDef,
  enumRef,
  fallible,
  field,
  method,
  opaqueDef,
  ownedOpaque,
  param,
  primitive,
  refSelf,
  struct,
  structDef,
  unit,
  variant,
  writeable,
} = ir;

const registry = registryOf([
  opaqueDef("Canvas", [
    method("new", [], ownedOpaque("Canvas")),
    method("draw", [param("at", struct("Point")), param("color", enumRef("Color"))], unit(), {
      self: refSelf(true),
    }),
    method("title", [], fallible(writeable(), unit()), {
      self: refSelf(),
      docs: "Current title",
    }),
  ]),
  enumDef("Color", [variant("Red", 0), variant("Green", 1)], { docs: "Display colors" }),
  structDef("Point", [field("x", primitive("i32")), field("y", primitive("i32"))]),
]);

describe("C headers", () => {
  const result = generateBindings(registry, { backend: "csharp" });

  it("should generate without diagnostics", () => {
    expect(result.diagnostics).to.deep.equal([]);
    expect(result.ok).to.equal(true);
  });

  it("should declare opaque types without a definition", () => {
    expect(artifactText(result, "native/Canvas.d.h")).to.equal(
      lines(
        "#ifndef Canvas_D_H",
        "#define Canvas_D_H",
        "",
        '#include "ffigen_runtime.h"',
        "",
        "typedef struct Canvas Canvas;",
        "",
        "#endif"
      )
    );
  });

  it("should define structs with their option struct", () => {
    expect(artifactText(result, "native/Point.d.h")).to.equal(
      lines(
        "#ifndef Point_D_H",
        "#define Point_D_H",
        "",
        '#include "ffigen_runtime.h"',
        "",
        "typedef struct Point {",
        "    int32_t x;",
        "    int32_t y;",
        "} Point;",
        "",
        "typedef struct ffi_option_Point {",
        "    Point value;",
        "    bool is_some;",
        "} ffi_option_Point;",
        "",
        "#endif"
      )
    );
  });

  it("should prefix enum constants with the enum name", () => {
    expect(artifactText(result, "native/Color.d.h")).to.equal(
      lines(
        "#ifndef Color_D_H",
        "#define Color_D_H",
        "",
        '#include "ffigen_runtime.h"',
        "",
        "// Display colors",
        "typedef enum Color {",
        "    Color_Red = 0,",
        "    Color_Green = 1,",
        "} Color;",
        "",
        "typedef struct ffi_option_Color {",
        "    Color value;",
        "    bool is_some;",
        "} ffi_option_Color;",
        "",
        "#endif"
      )
    );
  });

  it("should declare one prototype per method plus the destructor", () => {
    expect(artifactText(result, "native/Canvas.h")).to.equal(
      lines(
        "#ifndef Canvas_H",
        "#define Canvas_H",
        "",
        '#include "ffigen_runtime.h"',
        '#include "Canvas.d.h"',
        '#include "Color.d.h"',
        '#include "Point.d.h"',
        "",
        "#ifdef __cplusplus",
        'extern "C" {',
        "#endif",
        "",
        "typedef struct Canvas_title_result {",
        "    bool is_ok;",
        "} Canvas_title_result;",
        "",
        "Canvas* Canvas_new(void);",
        "",
        "void Canvas_draw(Canvas* self, Point at, Color color);",
        "",
        "// Current title",
        "void Canvas_title(const Canvas* self, ffi_write* ffi_write, Canvas_title_result* ffi_out);",
        "",
        "void Canvas_destroy(Canvas* self);",
        "",
        "#ifdef __cplusplus",
        "}",
        "#endif",
        "",
        "#endif"
      )
    );
  });

  it("should include every generated type from the library header", () => {
    expect(artifactText(result, "native/native_bindings.h")).to.equal(
      lines(
        "#ifndef native_FFIGEN_H",
        "#define native_FFIGEN_H",
        "",
        '#include "ffigen_runtime.h"',
        '#include "Canvas.h"',
        '#include "Color.h"',
        '#include "Point.h"',
        "",
        "#endif"
      )
    );
  });

  it("should describe the target in the runtime header", () => {
    const header = artifactText(result, "native/ffigen_runtime.h");

    expect(header.split("\n").slice(0, 2)).to.deep.equal([
      "// ffigen runtime ABI",
      "// Target: x86_64 (pointer size 8)",
    ]);
    expect(header).to.contain("bool ffigen_write_append(ffi_write* write, const uint8_t* bytes, size_t len);");
  });
});
