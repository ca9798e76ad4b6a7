import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadRegistry } from "@ffigen/frontend";
import { loadConfig } from "../config.js";
import { initProject } from "./init.js";

describe("init command", () => {
  let root = "";

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "ffigen-init-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should create a config and a sample IR document", () => {
    const result = initProject(root);

    expect(result).to.deep.equal({ ok: true, value: ["ffigen.json", "ir/library.json"] });
    expect(loadConfig(join(root, "ffigen.json"))).to.deep.equal({
      ok: true,
      value: { backend: "js", ir: "ir/library.json", outputDirectory: "generated" },
    });
  });

  it("should write a sample the IR loader accepts", () => {
    initProject(root);

    const registry = loadRegistry(join(root, "ir/library.json"));

    expect(registry.ok).to.equal(true);
    if (!registry.ok) return;
    expect(registry.value.library).to.equal("sample");
    expect(registry.value.allTypes().map((def) => def.id)).to.deep.equal([
      "Counter",
      "Direction",
      "Point",
    ]);
  });

  it("should add a C# namespace for the csharp backend", () => {
    initProject(root, { backend: "csharp" });

    const config: unknown = JSON.parse(readFileSync(join(root, "ffigen.json"), "utf-8"));
    expect(config).to.deep.equal({
      backend: "csharp",
      ir: "ir/library.json",
      outputDirectory: "generated",
      csharp: { namespace: "Sample.Native" },
    });
  });

  it("should keep an existing IR document", () => {
    mkdirSync(join(root, "ir"));
    writeFileSync(join(root, "ir/library.json"), "{}");

    const result = initProject(root);

    expect(result).to.deep.equal({ ok: true, value: ["ffigen.json"] });
    expect(readFileSync(join(root, "ir/library.json"), "utf-8")).to.equal("{}");
  });

  it("should refuse to overwrite ffigen.json", () => {
    initProject(root);

    expect(initProject(root)).to.deep.equal({
      ok: false,
      error: `ffigen.json already exists in ${root}`,
    });
  });

  it("should reject unknown backends", () => {
    expect(initProject(root, { backend: "ruby" })).to.deep.equal({
      ok: false,
      error: "Unknown backend 'ruby' (expected one of: csharp, js)",
    });
    expect(existsSync(join(root, "ffigen.json"))).to.equal(false);
  });
});
