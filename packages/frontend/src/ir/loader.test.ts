/**
 * Tests for the IR document loader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadIrFile, loadRegistry, parseIrDocument, parseTypeRef } from "./loader.js";

const demoDocument = {
  version: 1,
  library: "demo",
  types: [
    {
      kind: "opaque",
      id: "OpaqueStruct",
      methods: [
        {
          name: "add_two",
          params: [{ name: "x", type: { kind: "primitive", name: "i32" } }],
          returns: { kind: "primitive", name: "i32" },
        },
      ],
    },
    {
      kind: "enum",
      id: "Mode",
      docs: "Drawing mode",
      variants: [
        { name: "Fill", value: 0 },
        { name: "Stroke", value: 4 },
      ],
    },
  ],
};

const withTempFile = <T>(contents: string, fn: (filePath: string) => T): T => {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ffigen-ir-"));
  const filePath = path.join(tmpDir, "ir.json");
  fs.writeFileSync(filePath, contents);
  try {
    return fn(filePath);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
};

describe("IR Loader", () => {
  describe("parseIrDocument", () => {
    it("should fill in defaults for optional fields", () => {
      const result = parseIrDocument(demoDocument);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const [opaque, mode] = result.value.types;
      expect(result.value.library).to.equal("demo");
      expect(opaque).to.deep.equal({
        id: "OpaqueStruct",
        name: "OpaqueStruct",
        attributes: { rules: [], renames: [] },
        kind: "opaque",
        methods: [
          {
            name: "add_two",
            params: [{ name: "x", type: { kind: "primitive", name: "i32" } }],
            returns: { kind: "primitive", name: "i32" },
            attributes: { rules: [], renames: [] },
          },
        ],
      });
      expect(mode?.docs).to.equal("Drawing mode");
    });

    it("should default a missing return to unit and self passing to reference", () => {
      const result = parseIrDocument({
        version: 1,
        types: [
          {
            kind: "opaque",
            id: "Buf",
            methods: [{ name: "clear", self: { mutable: true } }],
          },
        ],
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const [buf] = result.value.types;
      expect(buf?.kind).to.equal("opaque");
      if (buf?.kind !== "opaque") return;
      expect(buf.methods[0]?.returns).to.deep.equal({ kind: "unit" });
      expect(buf.methods[0]?.self).to.deep.equal({
        passing: "reference",
        mutable: true,
      });
      expect(result.value.library).to.equal("native");
    });

    it("should reject non-object documents with FFG9004", () => {
      const result = parseIrDocument([1, 2]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG9004");
    });

    it("should reject unknown versions with FFG9005", () => {
      const result = parseIrDocument({ version: 2, types: [] });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG9005");
    });

    it("should require a types array", () => {
      const result = parseIrDocument({ version: 1 });
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG9006");
    });

    it("should report every malformed item", () => {
      const result = parseIrDocument({
        version: 1,
        types: [
          { kind: "class", id: "A" },
          {
            kind: "opaque",
            id: "B",
            methods: [{ name: "bad-name", params: [] }],
          },
          {
            kind: "struct",
            id: "C",
            fields: [{ name: "x", type: { kind: "primitive", name: "i128" } }],
          },
        ],
      });

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal([
        "FFG9007",
        "FFG9012",
        "FFG9010",
      ]);
      expect(result.error[1]?.message).to.equal(
        "types[1] (B).methods[0].name: 'bad-name' is not a valid identifier"
      );
    });

    it("should keep unknown rule backends for the attribute filter", () => {
      const result = parseIrDocument({
        version: 1,
        types: [
          {
            kind: "opaque",
            id: "A",
            attributes: {
              rules: [{ backend: "kotlin", outcome: "disabled" }],
            },
          },
        ],
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.types[0]?.attributes.rules).to.deep.equal([
        { backend: "kotlin", features: [], outcome: "disabled" },
      ]);
    });
  });

  describe("parseTypeRef", () => {
    it("should parse nested combinators", () => {
      const result = parseTypeRef(
        {
          kind: "fallible",
          ok: {
            kind: "nullable",
            inner: { kind: "opaque", id: "Doc", ownership: "owned" },
          },
          err: { kind: "enum", id: "DocError" },
        },
        "returns"
      );

      expect(result).to.deep.equal({
        ok: true,
        value: {
          kind: "fallible",
          ok: {
            kind: "nullable",
            inner: { kind: "opaque", id: "Doc", ownership: "owned", mutable: false },
          },
          err: { kind: "enum", id: "DocError" },
        },
      });
    });

    it("should parse slice element encodings", () => {
      const result = parseTypeRef(
        { kind: "slice", element: { encoding: "strings", text: "utf16" } },
        "param"
      );

      expect(result).to.deep.equal({
        ok: true,
        value: {
          kind: "slice",
          element: { encoding: "strings", text: "utf16" },
          mutable: false,
        },
      });
    });

    it("should reject an opaque reference without ownership", () => {
      const result = parseTypeRef({ kind: "opaque", id: "Doc" }, "param");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.message).to.equal(
        `param: 'ownership' must be "owned" or "borrowed"`
      );
    });
  });

  describe("loadIrFile", () => {
    it("should load a valid file", () => {
      const result = withTempFile(JSON.stringify(demoDocument), loadIrFile);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.types).to.have.length(2);
    });

    it("should return FFG9001 for a missing file", () => {
      const result = loadIrFile("/nonexistent/ffigen/ir.json");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG9001");
    });

    it("should return FFG9003 for invalid JSON", () => {
      const result = withTempFile("{ invalid json }", loadIrFile);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG9003");
    });
  });

  describe("loadRegistry", () => {
    it("should build a registry from a file", () => {
      const result = withTempFile(JSON.stringify(demoDocument), loadRegistry);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.allTypes().map((def) => def.id)).to.deep.equal([
        "Mode",
        "OpaqueStruct",
      ]);
    });

    it("should surface registry errors as LoweringError", () => {
      const broken = {
        version: 1,
        types: [
          {
            kind: "opaque",
            id: "A",
            methods: [
              { name: "f", returns: { kind: "opaque", id: "Nope", ownership: "owned" } },
            ],
          },
        ],
      };
      const result = withTempFile(JSON.stringify(broken), loadRegistry);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("FFG1005");
      expect(result.error[0]?.kind).to.equal("LoweringError");
    });
  });
});
