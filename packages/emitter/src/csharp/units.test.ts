import { describe, it } from "mocha";
import { expect } from "chai";
import { ir } from "@ffigen/frontend";
import { generateBindings } from "../generate.js";
import { artifactText, lines, registryOf } from "../test-harness.js";

const {
  borrowedOpaque,
  enumDef,
  enumRef,
  fallible,
  field,
  method,
  nullable,
  opaqueDef,
  ownedOpaque,
  param,
  primitive,
  primitiveDef,
  refSelf,
  struct,
  structDef,
  unit,
  utf8,
  valueSelf,
  variant,
  writeable,
} = ir;

const registry = registryOf(
  [
    primitiveDef("Meters", "f64", { docs: "Distance in meters" }),
    enumDef("Shape", [variant("Circle", 0), variant("Square", 1)]),
    structDef(
      "Point",
      [field("x", primitive("f32")), field("y", primitive("f32"))],
      [method("scaled", [param("factor", primitive("f32"))], struct("Point"), { self: valueSelf() })]
    ),
    opaqueDef("Token", []),
    opaqueDef("Counter", [
      method("new", [param("start", primitive("i32"))], ownedOpaque("Counter"), {
        docs: "Create a counter",
      }),
      method("add", [param("by", primitive("i32"))], unit(), { self: refSelf(true) }),
      method("label", [], writeable(), { self: refSelf() }),
      method("peek", [], nullable(primitive("i32")), { self: refSelf() }),
      method("check", [param("flag", primitive("bool"))], fallible(primitive("u32"), enumRef("Shape")), {
        self: refSelf(),
      }),
      method("merge", [param("other", ownedOpaque("Counter"))], unit(), { self: refSelf(true) }),
      method("peer", [], nullable(borrowedOpaque("Counter")), { self: refSelf() }),
      method("rename", [param("name", utf8())], unit(), { self: refSelf(true) }),
    ]),
  ],
  "geo"
);

const HEADER = [
  "// <auto-generated>",
  "// Generated by ffigen for the 'geo' library. Do not edit.",
  "// </auto-generated>",
];

const INTEROP = "global::System.Runtime.InteropServices";
const IMPORT = `[${INTEROP}.DllImport(global::Geo.FfiLibrary.Name, ExactSpelling = true)]`;

/** Lines indented as members of a type inside the namespace */
const indented = (depth: number, text: readonly string[]): string =>
  text.map((line) => (line.length > 0 ? `${" ".repeat(depth * 4)}${line}` : line)).join("\n");

describe("C# backend", () => {
  const result = generateBindings(registry, { backend: "csharp", csharp: { namespace: "Geo" } });

  it("should generate without diagnostics", () => {
    expect(result.diagnostics).to.deep.equal([]);
    expect(result.artifacts.map((artifact) => artifact.path)).to.deep.equal([
      "Counter.cs",
      "FfiLibrary.cs",
      "FfiRuntime.cs",
      "Meters.cs",
      "Point.cs",
      "Shape.cs",
      "Token.cs",
      "native/Counter.d.h",
      "native/Counter.h",
      "native/Meters.d.h",
      "native/Meters.h",
      "native/Point.d.h",
      "native/Point.h",
      "native/Shape.d.h",
      "native/Shape.h",
      "native/Token.d.h",
      "native/Token.h",
      "native/ffigen_runtime.h",
      "native/geo_bindings.h",
    ]);
  });

  it("should emit enums with explicit values", () => {
    expect(artifactText(result, "Shape.cs")).to.equal(
      lines(
        ...HEADER,
        "",
        "#nullable enable",
        "",
        "namespace Geo",
        "{",
        "    public enum Shape : int",
        "    {",
        "        Circle = 0,",
        "        Square = 1",
        "    }",
        "}"
      )
    );
  });

  it("should emit primitive aliases as global using aliases", () => {
    expect(artifactText(result, "Meters.cs")).to.equal(
      lines(
        ...HEADER,
        "//",
        "// Distance in meters",
        "",
        "global using Meters = global::System.Double;"
      )
    );
  });

  it("should emit structs with an explicit native layout", () => {
    expect(artifactText(result, "Point.cs")).to.equal(
      lines(
        ...HEADER,
        "",
        "#nullable enable",
        "",
        "namespace Geo",
        "{",
        "    public partial struct Point",
        "    {",
        indented(2, [
          "public float X;",
          "",
          "public float Y;",
          "",
          "public Point Scaled(float factor)",
          "{",
          "    using var __arena = new global::Ffigen.Runtime.FfiArena();",
          "    return global::Geo.Point.FromAbi(Native.Point_scaled(this.ToAbi(__arena), factor));",
          "}",
          "",
          "internal Abi ToAbi(global::Ffigen.Runtime.FfiArena __arena)",
          "{",
          "    var __abi = default(Abi);",
          "    __abi.X = this.X;",
          "    __abi.Y = this.Y;",
          "    return __abi;",
          "}",
          "",
          "internal static Point FromAbi(Abi __abi)",
          "{",
          "    var __value = default(Point);",
          "    __value.X = __abi.X;",
          "    __value.Y = __abi.Y;",
          "    return __value;",
          "}",
          "",
          `[${INTEROP}.StructLayout(${INTEROP}.LayoutKind.Explicit, Size = 8)]`,
          "internal struct Abi",
          "{",
          `    [${INTEROP}.FieldOffset(0)]`,
          "    public float X;",
          "",
          `    [${INTEROP}.FieldOffset(4)]`,
          "    public float Y;",
          "}",
          "",
          "internal static class Native",
          "{",
          `    ${IMPORT}`,
          "    internal static extern Point.Abi Point_scaled(Point.Abi self, float factor);",
          "}",
        ]),
        "    }",
        "}"
      )
    );
  });

  it("should emit opaque wrappers owning their handle", () => {
    expect(artifactText(result, "Token.cs")).to.equal(
      lines(
        ...HEADER,
        "",
        "#nullable enable",
        "",
        "namespace Geo",
        "{",
        "    public sealed partial class Token : global::System.IDisposable",
        "    {",
        indented(2, [
          "private nint _handle;",
          "",
          "private readonly bool _owned;",
          "",
          "private readonly object[] _edges;",
          "",
          "private Token(nint handle, bool owned, object[] edges)",
          "{",
          "    _handle = handle;",
          "    _owned = owned;",
          "    _edges = edges;",
          "}",
          "",
          "~Token()",
          "{",
          "    var handle = global::System.Threading.Interlocked.Exchange(ref _handle, 0);",
          "    if (handle != 0 && _owned)",
          "    {",
          "        Native.Token_destroy(handle);",
          "    }",
          "}",
          "",
          "internal static Token FromHandle(nint handle, bool owned, params object[] edges)",
          "{",
          "    if (handle == 0)",
          "    {",
          '        throw new global::System.InvalidOperationException("Native code returned a null Token");',
          "    }",
          "    return new Token(handle, owned, edges);",
          "}",
          "",
          "internal static Token? FromNullableHandle(nint handle, bool owned, params object[] edges)",
          "{",
          "    return handle == 0 ? null : new Token(handle, owned, edges);",
          "}",
          "",
          "internal nint Handle()",
          "{",
          "    var handle = _handle;",
          "    if (handle == 0)",
          "    {",
          '        throw new global::System.ObjectDisposedException("Token");',
          "    }",
          "    return handle;",
          "}",
          "",
          "internal nint TakeHandle()",
          "{",
          "    if (!_owned)",
          "    {",
          '        throw new global::System.InvalidOperationException("Cannot transfer a borrowed Token");',
          "    }",
          "    var handle = global::System.Threading.Interlocked.Exchange(ref _handle, 0);",
          "    if (handle == 0)",
          "    {",
          '        throw new global::System.ObjectDisposedException("Token");',
          "    }",
          "    global::System.GC.SuppressFinalize(this);",
          "    return handle;",
          "}",
          "",
          "/// <summary>",
          "/// Destroy the native object now if this wrapper owns it. The wrapper is unusable afterwards.",
          "/// </summary>",
          "public void Dispose()",
          "{",
          "    var handle = global::System.Threading.Interlocked.Exchange(ref _handle, 0);",
          "    if (handle != 0 && _owned)",
          "    {",
          "        Native.Token_destroy(handle);",
          "    }",
          "    global::System.GC.SuppressFinalize(this);",
          "}",
          "",
          "internal static class Native",
          "{",
          `    ${IMPORT}`,
          "    internal static extern void Token_destroy(nint self);",
          "}",
        ]),
        "    }",
        "}"
      )
    );
  });

  describe("methods", () => {
    const counter = artifactText(result, "Counter.cs");

    it("should adopt owned returns", () => {
      expect(counter).to.contain(
        indented(2, [
          "/// <summary>",
          "/// Create a counter",
          "/// </summary>",
          "public static Counter New(int start)",
          "{",
          "    return global::Geo.Counter.FromHandle(Native.Counter_new(start), true);",
          "}",
        ])
      );
    });

    it("should pass borrowed self as the current handle", () => {
      expect(counter).to.contain(
        indented(2, [
          "public void Add(int by)",
          "{",
          "    Native.Counter_add(this.Handle(), by);",
          "}",
        ])
      );
    });

    it("should collect writeable output through a sink", () => {
      expect(counter).to.contain(
        indented(2, [
          "public string Label()",
          "{",
          "    var __write = global::Geo.FfiLibrary.ffigen_write_create(0);",
          "    try",
          "    {",
          "        Native.Counter_label(this.Handle(), __write);",
          "        return global::Geo.FfiLibrary.ReadWrite(__write);",
          "    }",
          "    finally",
          "    {",
          "        global::Geo.FfiLibrary.ffigen_write_destroy(__write);",
          "    }",
          "}",
        ])
      );
    });

    it("should read options once through a local", () => {
      expect(counter).to.contain(
        indented(2, [
          "public int? Peek()",
          "{",
          "    var __result = Native.Counter_peek(this.Handle());",
          "    return __result.IsSome != 0 ? __result.Value : null;",
          "}",
        ])
      );
    });

    it("should throw the error payload of a failed call", () => {
      expect(counter).to.contain(
        indented(2, [
          "public uint Check(bool flag)",
          "{",
          "    Native.Counter_check_result __out;",
          "    Native.Counter_check(this.Handle(), flag ? (byte)1 : (byte)0, out __out);",
          "    if (__out.IsOk != 0)",
          "    {",
          "        return __out.Ok;",
          "    }",
          "    throw new global::Ffigen.Runtime.FfiException<Shape>(__out.Err);",
          "}",
        ])
      );
    });

    it("should take transferred handles after every other argument", () => {
      expect(counter).to.contain(
        indented(2, [
          "public void Merge(Counter other)",
          "{",
          "    var __self = this.Handle();",
          "    var __arg0 = other.TakeHandle();",
          "    Native.Counter_merge(__self, __arg0);",
          "}",
        ])
      );
    });

    it("should keep the owner of a borrowed return reachable", () => {
      expect(counter).to.contain(
        indented(2, [
          "public Counter? Peer()",
          "{",
          "    return global::Geo.Counter.FromNullableHandle(Native.Counter_peer(this.Handle()), false, this);",
          "}",
        ])
      );
    });

    it("should encode text in a call arena", () => {
      expect(counter).to.contain(
        indented(2, [
          "public void Rename(string name)",
          "{",
          "    using var __arena = new global::Ffigen.Runtime.FfiArena();",
          "    Native.Counter_rename(this.Handle(), __arena.Utf8(name));",
          "}",
        ])
      );
    });
  });

  describe("native imports", () => {
    const counter = artifactText(result, "Counter.cs");

    it("should declare one import per symbol plus the destructor", () => {
      const imports = counter
        .split("\n")
        .filter((line) => line.includes("static extern"))
        .map((line) => line.trim());

      expect(imports).to.deep.equal([
        "internal static extern nint Counter_new(int start);",
        "internal static extern void Counter_add(nint self, int by);",
        "internal static extern void Counter_label(nint self, nint ffi_write);",
        "internal static extern Native.ffi_option_i32 Counter_peek(nint self);",
        "internal static extern void Counter_check(nint self, byte flag, out Native.Counter_check_result ffi_out);",
        "internal static extern void Counter_merge(nint self, nint other);",
        "internal static extern nint Counter_peer(nint self);",
        "internal static extern void Counter_rename(nint self, global::Ffigen.Runtime.FfiSlice name);",
        "internal static extern void Counter_destroy(nint self);",
      ]);
    });

    it("should lay out option and result structs like the C glue", () => {
      expect(counter).to.contain(
        indented(3, [
          `[${INTEROP}.StructLayout(${INTEROP}.LayoutKind.Explicit, Size = 8)]`,
          "internal struct ffi_option_i32",
          "{",
          `    [${INTEROP}.FieldOffset(0)]`,
          "    public int Value;",
          "",
          `    [${INTEROP}.FieldOffset(4)]`,
          "    public byte IsSome;",
          "}",
          "",
          `[${INTEROP}.StructLayout(${INTEROP}.LayoutKind.Explicit, Size = 8)]`,
          "internal struct Counter_check_result",
          "{",
          `    [${INTEROP}.FieldOffset(0)]`,
          "    public uint Ok;",
          "",
          `    [${INTEROP}.FieldOffset(0)]`,
          "    public Shape Err;",
          "",
          `    [${INTEROP}.FieldOffset(4)]`,
          "    public byte IsOk;",
          "}",
        ])
      );
    });
  });

  it("should emit the library class with the write sink imports", () => {
    const sink = (returns: string, name: string, params: string): readonly string[] => [
      `[${INTEROP}.DllImport(Name, ExactSpelling = true)]`,
      `internal static extern ${returns} ${name}(${params});`,
      "",
    ];

    expect(artifactText(result, "FfiLibrary.cs")).to.equal(
      lines(
        ...HEADER,
        "",
        "#nullable enable",
        "",
        "namespace Geo",
        "{",
        "    internal static class FfiLibrary",
        "    {",
        indented(2, [
          'internal const string Name = "geo";',
          "",
          ...sink("nint", "ffigen_write_create", "nuint capacity"),
          ...sink("nint", "ffigen_write_bytes", "nint write"),
          ...sink("nuint", "ffigen_write_len", "nint write"),
          ...sink("void", "ffigen_write_destroy", "nint write"),
          "internal static string ReadWrite(nint write)",
          "{",
          "    return new global::Ffigen.Runtime.FfiSlice(ffigen_write_bytes(write), ffigen_write_len(write)).ToUtf8String();",
          "}",
        ]),
        "    }",
        "}"
      )
    );
  });

  it("should copy the runtime support file", () => {
    const runtime = result.artifacts.find((artifact) => artifact.path === "FfiRuntime.cs");

    expect(runtime?.role).to.equal("support");
    expect(runtime?.contents).to.contain("namespace Ffigen.Runtime");
  });

  it("should use the configured library name in imports", () => {
    const renamed = generateBindings(registry, {
      backend: "csharp",
      csharp: { namespace: "Geo", libraryName: "libgeo.so" },
    });

    expect(artifactText(renamed, "FfiLibrary.cs")).to.contain('internal const string Name = "libgeo.so";');
  });

  it("should qualify generated types named like a member of the calling type", () => {
    const shadowed = registryOf([
      structDef("Big", [field("size", primitive("i32"))], []),
      opaqueDef("Pair", []),
      opaqueDef("Thing", [
        method("big", [], struct("Big"), { self: refSelf() }),
        method("pair", [], nullable(borrowedOpaque("Pair")), { self: refSelf() }),
      ]),
    ]);

    const generated = generateBindings(shadowed, { backend: "csharp", csharp: { namespace: "Geo" } });
    const thing = artifactText(generated, "Thing.cs");

    expect(generated.ok).to.equal(true);
    expect(thing).to.contain(
      indented(2, [
        "public Big Big()",
        "{",
        "    return global::Geo.Big.FromAbi(Native.Thing_big(this.Handle()));",
        "}",
        "",
        "public Pair? Pair()",
        "{",
        "    return global::Geo.Pair.FromNullableHandle(Native.Thing_pair(this.Handle()), false, this);",
        "}",
      ])
    );
  });

  it("should report members colliding with generated ones", () => {
    const clash = registryOf([
      opaqueDef("Handle", [
        method("zap", [], unit(), {
          self: refSelf(),
          attributes: { rules: [], renames: [{ backend: "csharp", name: "Dispose" }] },
        }),
      ]),
    ]);

    const failed = generateBindings(clash, { backend: "csharp" });

    expect(failed.ok).to.equal(false);
    expect(failed.failedTypes).to.deep.equal(["Handle"]);
    expect(failed.diagnostics.map((d) => d.message)).to.deep.equal([
      "Naming policy collision in type Handle members: Dispose (generated), zap (method) all map to host identifier 'Dispose'",
    ]);
  });
});
