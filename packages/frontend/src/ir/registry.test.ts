import { describe, it } from "mocha";
import { expect } from "chai";
import { createRegistry } from "./registry.js";
import {
  alias,
  borrowedOpaque,
  enumDef,
  enumRef,
  field,
  method,
  opaqueDef,
  ownedOpaque,
  param,
  primitive,
  primitiveDef,
  refSelf,
  structDef,
  variant,
} from "./builders.js";

describe("TypeRegistry", () => {
  const counter = opaqueDef("Counter", [
    method("new", [], ownedOpaque("Counter")),
    method("get", [], primitive("i32"), { self: refSelf() }),
  ]);

  it("should return types sorted by TypeId", () => {
    const result = createRegistry([
      opaqueDef("Zeta", []),
      enumDef("Alpha", [variant("A", 0)]),
      counter,
    ]);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.allTypes().map((def) => def.id)).to.deep.equal([
      "Alpha",
      "Counter",
      "Zeta",
    ]);
  });

  it("should resolve known ids and fail with FFG1006 for unknown ones", () => {
    const result = createRegistry([counter]);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    const known = result.value.resolve("Counter");
    expect(known.ok).to.equal(true);

    const unknown = result.value.resolve("Missing");
    expect(unknown.ok).to.equal(false);
    if (unknown.ok) return;
    expect(unknown.error.code).to.equal("FFG1006");
    expect(unknown.error.kind).to.equal("UnknownTypeId");
    expect(result.value.has("Missing")).to.equal(false);
  });

  it("should freeze the stored definitions", () => {
    const result = createRegistry([counter]);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;

    const [def] = result.value.allTypes();
    expect(Object.isFrozen(def)).to.equal(true);
    expect(Object.isFrozen(result.value.allTypes())).to.equal(true);
    expect(Object.isFrozen(result.value)).to.equal(true);
  });

  it("should report duplicate TypeIds", () => {
    const result = createRegistry([opaqueDef("A", []), opaqueDef("A", [])]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.message)).to.deep.equal([
      "Duplicate TypeId 'A'",
    ]);
    expect(result.error[0]?.kind).to.equal("LoweringError");
  });

  it("should report dangling and wrong-kind references together", () => {
    const result = createRegistry([
      primitiveDef("Handle", "u32"),
      opaqueDef("Owner", [
        method("take", [param("other", borrowedOpaque("Ghost"))], alias("Owner")),
      ]),
    ]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.message)).to.deep.equal([
      "Reference to undeclared type 'Ghost'",
      "Reference of kind 'alias' to 'Owner' requires a primitive type, found opaque",
    ]);
    expect(result.error[0]?.subject).to.deep.equal({
      typeId: "Owner",
      member: "take",
    });
  });

  it("should reject duplicate fields, variants and discriminants", () => {
    const result = createRegistry([
      structDef("Point", [field("x", primitive("i32")), field("x", primitive("i32"))]),
      enumDef("Mode", [variant("On", 1), variant("Off", 1), variant("On", 2)]),
    ]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.message)).to.deep.equal([
      "Duplicate field 'x'",
      "Duplicate variant 'On'",
      "Duplicate discriminant 1",
    ]);
  });

  it("should reject discriminants outside i32", () => {
    const result = createRegistry([
      enumDef("Big", [variant("Huge", 2147483648), variant("Low", -2147483648)]),
    ]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error).to.have.length(1);
    expect(result.error[0]?.subject).to.deep.equal({
      typeId: "Big",
      member: "Huge",
    });
  });

  it("should reject lifetimes naming unknown sources", () => {
    const result = createRegistry([
      opaqueDef("Doc", [
        method("first", [param("other", borrowedOpaque("Doc"))], borrowedOpaque("Doc"), {
          lifetimes: ["self", "other"],
        }),
      ]),
    ]);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.map((d) => d.message)).to.deep.equal([
      "Lifetime source 'self' is neither self nor a parameter",
    ]);
  });

  it("should accept references to every kind of definition", () => {
    const result = createRegistry(
      [
        primitiveDef("Handle", "u32"),
        enumDef("Mode", [variant("On", 1)]),
        structDef("Point", [field("x", primitive("f64"))]),
        opaqueDef("Canvas", [
          method(
            "draw",
            [param("at", { kind: "struct", id: "Point", passing: "value" }), param("mode", enumRef("Mode"))],
            alias("Handle"),
            { self: refSelf(true) }
          ),
        ]),
      ],
      "canvas"
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.library).to.equal("canvas");
  });
});
