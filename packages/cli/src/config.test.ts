/**
 * Tests for configuration loading and resolution
 */

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";
import type { FfigenConfig } from "./types.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept every documented key", () => {
      const json = {
        $schema: "./ffigen.schema.json",
        backend: "csharp",
        ir: "ir/demo.json",
        outputDirectory: "out",
        features: ["extra"],
        target: "x86",
        namingPolicy: { all: "none" },
        csharp: { namespace: "Demo.Native", libraryName: "demo" },
      };

      expect(parseConfig(json)).to.deep.equal({ ok: true, value: json });
    });

    it("should reject unknown keys", () => {
      expect(parseConfig({ backends: "js" })).to.deep.equal({
        ok: false,
        error: "ffigen.json: unknown key 'backends'",
      });
    });

    it("should reject unknown backends and targets", () => {
      expect(parseConfig({ backend: "python" })).to.deep.equal({
        ok: false,
        error: "ffigen.json: 'backend' must be one of: csharp, js",
      });
      expect(parseConfig({ target: "riscv" })).to.deep.equal({
        ok: false,
        error: "ffigen.json: 'target' must be one of: x86_64, aarch64, x86, wasm32",
      });
    });

    it("should validate naming policies", () => {
      expect(parseConfig({ namingPolicy: { methods: "snake" } })).to.deep.equal({
        ok: false,
        error: "ffigen.json: 'namingPolicy.methods' must be one of: clr, camel, none",
      });
      expect(parseConfig({ namingPolicy: { consts: "clr" } })).to.deep.equal({
        ok: false,
        error:
          "ffigen.json: 'namingPolicy.consts' is not a naming bucket (expected all, types, methods, fields, enumMembers, parameters)",
      });
    });

    it("should reject features that are not strings", () => {
      expect(parseConfig({ features: ["a", 1] })).to.deep.equal({
        ok: false,
        error: "ffigen.json: 'features' must be an array of strings",
      });
    });
  });

  describe("resolveConfig", () => {
    it("should use config values relative to the project root", () => {
      const config: FfigenConfig = {
        backend: "csharp",
        ir: "ir/demo.json",
        outputDirectory: "out",
        features: ["extra"],
        target: "aarch64",
        csharp: { namespace: "Demo.Native" },
      };

      const result = resolveConfig(config, {}, "/work/demo");

      expect(result).to.deep.equal({
        ok: true,
        value: {
          projectRoot: "/work/demo",
          backend: "csharp",
          irPath: "/work/demo/ir/demo.json",
          outputDirectory: "/work/demo/out",
          features: ["extra"],
          target: "aarch64",
          namingPolicy: undefined,
          csharp: { namespace: "Demo.Native" },
          force: false,
          verbose: false,
          quiet: false,
        },
      });
    });

    it("should apply defaults", () => {
      const result = resolveConfig({ backend: "js" }, {}, "/work/demo");

      expect(result.ok && result.value.irPath).to.equal("/work/demo/ir/library.json");
      expect(result.ok && result.value.outputDirectory).to.equal("/work/demo/generated");
      expect(result.ok && result.value.target).to.equal(undefined);
    });

    it("should override config with CLI options", () => {
      const config: FfigenConfig = {
        backend: "csharp",
        ir: "ir/demo.json",
        features: ["extra"],
        csharp: { namespace: "Demo.Native", libraryName: "demo" },
      };

      const result = resolveConfig(
        config,
        {
          backend: "js",
          ir: "other.json",
          out: "web",
          features: ["tracing", "extra"],
          namespace: "Other",
          force: true,
        },
        "/work/demo",
        "/work/demo/sub"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.backend).to.equal("js");
      expect(result.value.irPath).to.equal("/work/demo/sub/other.json");
      expect(result.value.outputDirectory).to.equal("/work/demo/sub/web");
      expect(result.value.features).to.deep.equal(["extra", "tracing"]);
      expect(result.value.csharp).to.deep.equal({ namespace: "Other", libraryName: "demo" });
      expect(result.value.force).to.equal(true);
    });

    it("should require a backend", () => {
      expect(resolveConfig({}, {}, "/work/demo")).to.deep.equal({
        ok: false,
        error: "No backend selected; set 'backend' in ffigen.json or pass --backend",
      });
    });

    it("should reject invalid CLI values", () => {
      expect(resolveConfig({}, { backend: "go" }, "/work/demo")).to.deep.equal({
        ok: false,
        error: "Unknown backend 'go' (expected one of: csharp, js)",
      });
      expect(resolveConfig({ backend: "js" }, { target: "mips" }, "/work/demo")).to.deep.equal({
        ok: false,
        error: "Unknown ABI target 'mips' (expected one of: x86_64, aarch64, x86, wasm32)",
      });
    });
  });

  describe("files", () => {
    let root = "";

    beforeEach(() => {
      root = realpathSync(mkdtempSync(join(tmpdir(), "ffigen-config-")));
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("should find ffigen.json in a parent directory", () => {
      const nested = join(root, "a", "b");
      mkdirSync(nested, { recursive: true });
      writeFileSync(join(root, "ffigen.json"), "{}");

      expect(findConfig(nested)).to.equal(join(root, "ffigen.json"));
    });

    it("should load and validate a config file", () => {
      const path = join(root, "ffigen.json");
      writeFileSync(path, JSON.stringify({ backend: "js", features: ["extra"] }));

      expect(loadConfig(path)).to.deep.equal({
        ok: true,
        value: { backend: "js", features: ["extra"] },
      });
    });

    it("should report malformed JSON", () => {
      const path = join(root, "ffigen.json");
      writeFileSync(path, "{");

      const result = loadConfig(path);
      expect(result.ok).to.equal(false);
      expect(!result.ok && result.error.startsWith("Failed to parse ffigen.json: ")).to.equal(true);
    });

    it("should report a missing file", () => {
      const path = join(root, "missing.json");
      expect(loadConfig(path)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${path}`,
      });
    });
  });
});
