import { describe, it } from "mocha";
import { expect } from "chai";
import type { IrMethod } from "@ffigen/frontend";
import { formatDiagnostic, ir } from "@ffigen/frontend";
import { generateBindings } from "./generate.js";
import { artifactText, registryOf } from "./test-harness.js";

const {
  borrowedOpaque,
  disabledFor,
  enumDef,
  field,
  method,
  opaqueDef,
  ownedOpaque,
  param,
  refSelf,
  struct,
  structDef,
  unit,
  valueSelf,
  variant,
} = ir;

const session = (extra: readonly IrMethod[] = []) =>
  opaqueDef("Session", [
    method("open", [], ownedOpaque("Session")),
    method("close", [], unit(), { self: valueSelf() }),
    ...extra,
  ]);

const level = enumDef("Level", [variant("Low", 0), variant("High", 1)]);

describe("Generation", () => {
  describe("artifacts", () => {
    it("should list artifacts sorted by path", () => {
      const result = generateBindings(registryOf([session(), level]), { backend: "js" });

      expect(result.artifacts.map((artifact) => artifact.path)).to.deep.equal([
        "Level.d.mts",
        "Level.mjs",
        "Session.d.mts",
        "Session.mjs",
        "ffigen-runtime.d.mts",
        "ffigen-runtime.mjs",
        "index.d.mts",
        "index.mjs",
        "native/Level.d.h",
        "native/Level.h",
        "native/Session.d.h",
        "native/Session.h",
        "native/ffigen_runtime.h",
        "native/native_bindings.h",
      ]);
    });

    it("should export one symbol per method plus the destructor", () => {
      const result = generateBindings(
        registryOf([
          session([method("ping", [param("peer", borrowedOpaque("Session"))], unit(), { self: refSelf() })]),
        ]),
        { backend: "csharp" }
      );

      const header = artifactText(result, "native/Session.h");
      const symbols = [...header.matchAll(/\b(Session_\w+)\(/g)].map((match) => match[1]);

      expect(symbols).to.deep.equal([
        "Session_open",
        "Session_close",
        "Session_ping",
        "Session_destroy",
      ]);
    });

    it("should produce identical output on every run", () => {
      const registry = registryOf([session(), level]);

      for (const backend of ["csharp", "js"] as const) {
        expect(generateBindings(registry, { backend })).to.deep.equal(
          generateBindings(registry, { backend })
        );
      }
    });
  });

  describe("filtering", () => {
    const traced = registryOf([
      session([
        method("trace", [param("sink", borrowedOpaque("Tracer"))], unit(), {
          self: refSelf(true),
        }),
      ]),
      opaqueDef("Tracer", [], { attributes: disabledFor("js") }),
    ]);

    it("should fail types that reference a disabled type", () => {
      const result = generateBindings(traced, { backend: "js" });

      expect(result.ok).to.equal(false);
      expect(result.failedTypes).to.deep.equal(["Session"]);
      expect(result.diagnostics.map(formatDiagnostic)).to.deep.equal([
        "Session.trace: error FFG1001: Type 'Tracer' is not available for backend 'js' Hint: Enable the referenced type for this backend or disable the referencing item",
      ]);
      expect(result.omitted).to.deep.equal([{ subject: { typeId: "Tracer" }, reason: "disabled" }]);
      expect(result.artifacts.map((artifact) => artifact.path)).to.deep.equal([
        "ffigen-runtime.d.mts",
        "ffigen-runtime.mjs",
        "index.d.mts",
        "index.mjs",
        "native/ffigen_runtime.h",
        "native/native_bindings.h",
      ]);
    });

    it("should keep the artifacts of types unrelated to a failed one", () => {
      const result = generateBindings(
        registryOf([session(), level, structDef("Node", [field("next", struct("Node"))])]),
        { backend: "js" }
      );

      expect(result.ok).to.equal(false);
      expect(result.failedTypes).to.deep.equal(["Node"]);
      expect(result.diagnostics.map(formatDiagnostic)).to.deep.equal([
        "Node: error FFG1003: Struct 'Node' contains itself by value (Node -> Node) Hint: Break the cycle with an opaque handle",
      ]);
      expect(result.artifacts.map((artifact) => artifact.path)).to.deep.equal([
        "Level.d.mts",
        "Level.mjs",
        "Session.d.mts",
        "Session.mjs",
        "ffigen-runtime.d.mts",
        "ffigen-runtime.mjs",
        "index.d.mts",
        "index.mjs",
        "native/Level.d.h",
        "native/Level.h",
        "native/Session.d.h",
        "native/Session.h",
        "native/ffigen_runtime.h",
        "native/native_bindings.h",
      ]);
    });

    it("should keep the same types for a backend that enables them", () => {
      const result = generateBindings(traced, { backend: "csharp" });

      expect(result.ok).to.equal(true);
      expect(result.failedTypes).to.deep.equal([]);
      expect(result.omitted).to.deep.equal([]);
    });

    it("should omit methods disabled by a feature", () => {
      const gated = registryOf([
        session([
          method("debug", [], unit(), {
            self: refSelf(),
            attributes: {
              rules: [{ backend: "*", features: ["release"], outcome: "disabled" }],
              renames: [],
            },
          }),
        ]),
      ]);

      const release = generateBindings(gated, { backend: "js", features: ["release"] });
      const debug = generateBindings(gated, { backend: "js" });

      expect(release.omitted).to.deep.equal([
        { subject: { typeId: "Session", member: "debug" }, reason: "disabled" },
      ]);
      expect(artifactText(release, "Session.mjs")).not.to.contain("debug()");
      expect(debug.omitted).to.deep.equal([]);
      expect(artifactText(debug, "Session.mjs")).to.contain("debug()");
    });
  });

  describe("cross-type conflicts", () => {
    it("should report symbols exported by more than one type", () => {
      const result = generateBindings(
        registryOf([
          opaqueDef("A", [method("b_c", [], unit())]),
          opaqueDef("A_b", [method("c", [], unit())]),
        ]),
        { backend: "js" }
      );

      expect(result.failedTypes).to.deep.equal(["A", "A_b"]);
      expect(result.diagnostics.map((d) => [d.subject?.typeId, d.message])).to.deep.equal([
        ["A", "Symbol 'A_b_c' is exported by types A, A_b"],
        ["A_b", "Symbol 'A_b_c' is exported by types A, A_b"],
      ]);
    });

    it("should report host type names produced by more than one type", () => {
      const result = generateBindings(
        registryOf([opaqueDef("AudioDevice", []), opaqueDef("audio_device", [])]),
        { backend: "js" }
      );

      expect(result.failedTypes).to.deep.equal(["AudioDevice", "audio_device"]);
      expect(result.diagnostics.map((d) => d.message)).to.deep.equal([
        "Host type name 'AudioDevice' is produced by types AudioDevice, audio_device",
        "Host type name 'AudioDevice' is produced by types AudioDevice, audio_device",
      ]);
    });

    it("should reserve the runtime's own names", () => {
      const result = generateBindings(registryOf([opaqueDef("FfiError", [])]), { backend: "js" });

      expect(result.diagnostics.map((d) => d.message)).to.deep.equal([
        "Host type name 'FfiError' is reserved by the js runtime",
      ]);
      expect(result.artifacts.map((artifact) => artifact.path)).not.to.include("FfiError.mjs");
    });
  });

  describe("targets", () => {
    it("should reject a target the backend cannot bind", () => {
      const result = generateBindings(registryOf([level]), { backend: "js", target: "x86_64" });

      expect(result.ok).to.equal(false);
      expect(result.artifacts).to.deep.equal([]);
      expect(result.diagnostics.map(formatDiagnostic)).to.deep.equal([
        "error FFG1003: ABI target 'x86_64' is not supported by backend 'js' Hint: Supported targets: wasm32",
      ]);
    });

    it("should lay out the runtime header for the requested target", () => {
      const result = generateBindings(registryOf([level]), { backend: "csharp", target: "x86" });

      expect(artifactText(result, "native/ffigen_runtime.h").split("\n")[1]).to.equal(
        "// Target: x86 (pointer size 4)"
      );
    });
  });
});
