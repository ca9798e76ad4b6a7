import { describe, it } from "mocha";
import { expect } from "chai";
import type { TypeId } from "@ffigen/frontend";
import type { LayoutContext } from "./layout.js";
import {
  layoutOf,
  optionLayoutOf,
  resultLayoutOf,
  returnsDirectly,
  sequentialLayout,
  structLayoutOf,
} from "./layout.js";
import type { AbiTargetName } from "./target.js";
import { ABI_TARGETS, resolveTarget } from "./target.js";
import type { AbiType } from "./types.js";

const i32: AbiType = { kind: "scalar", primitive: "i32" };
const f64: AbiType = { kind: "scalar", primitive: "f64" };
const u8: AbiType = { kind: "scalar", primitive: "u8" };

// Sample { i32 id; f64 weight; u8 flags; }
const fields: ReadonlyMap<TypeId, readonly AbiType[]> = new Map([
  ["Sample", [i32, f64, u8]],
  ["Pair", [i32, i32]],
]);

const contextFor = (target: AbiTargetName): LayoutContext => ({
  target: ABI_TARGETS[target],
  structFields: (typeId) => fields.get(typeId) ?? [],
});

describe("C layout", () => {
  it("should place members at multiples of their alignment", () => {
    const layout = sequentialLayout([
      { size: 4, align: 4 },
      { size: 1, align: 1 },
      { size: 8, align: 8 },
    ]);

    expect(layout).to.deep.equal({ size: 16, align: 8, offsets: [0, 4, 8] });
  });

  it("should round struct sizes up to the largest alignment", () => {
    expect(structLayoutOf("Sample", contextFor("x86_64"))).to.deep.equal({
      size: 24,
      align: 8,
      offsets: [0, 8, 16],
    });
  });

  it("should align 8-byte scalars to 4 on x86", () => {
    expect(structLayoutOf("Sample", contextFor("x86"))).to.deep.equal({
      size: 16,
      align: 4,
      offsets: [0, 4, 12],
    });
    expect(optionLayoutOf({ kind: "scalar", primitive: "f64" }, contextFor("x86"))).to.deep.equal({
      size: 12,
      align: 4,
      valueOffset: 0,
      isSomeOffset: 8,
    });
    expect(layoutOf({ kind: "scalar", primitive: "u64" }, contextFor("wasm32"))).to.deep.equal({
      size: 8,
      align: 8,
    });
  });

  it("should size slices and pointers per target", () => {
    const slice: AbiType = {
      kind: "slice",
      element: { encoding: "utf8" },
      mutable: false,
      nullable: false,
    };

    expect(layoutOf(slice, contextFor("x86_64"))).to.deep.equal({ size: 16, align: 8 });
    expect(layoutOf(slice, contextFor("wasm32"))).to.deep.equal({ size: 8, align: 4 });
    expect(layoutOf({ kind: "scalar", primitive: "usize" }, contextFor("x86"))).to.deep.equal({
      size: 4,
      align: 4,
    });
  });

  it("should put the option flag after the value", () => {
    expect(optionLayoutOf({ kind: "scalar", primitive: "f64" }, contextFor("x86_64"))).to.deep.equal({
      size: 16,
      align: 8,
      valueOffset: 0,
      isSomeOffset: 8,
    });
  });

  it("should overlay result payloads and follow them with the flag", () => {
    const layout = resultLayoutOf(i32, f64, contextFor("x86_64"));

    expect(layout).to.deep.equal({ size: 16, align: 8, payloadOffset: 0, isOkOffset: 8 });
  });

  it("should reduce a result without payloads to its flag", () => {
    expect(resultLayoutOf(undefined, undefined, contextFor("x86"))).to.deep.equal({
      size: 1,
      align: 1,
      payloadOffset: 0,
      isOkOffset: 0,
    });
  });

  it("should return aggregates directly only when they fit the register width", () => {
    const pair: AbiType = { kind: "struct", typeId: "Pair", name: "Pair" };
    const sample: AbiType = { kind: "struct", typeId: "Sample", name: "Sample" };

    expect(returnsDirectly(pair, contextFor("x86_64"))).to.equal(true);
    expect(returnsDirectly(sample, contextFor("x86_64"))).to.equal(false);
    expect(returnsDirectly(pair, contextFor("wasm32"))).to.equal(false);
    expect(returnsDirectly(i32, contextFor("wasm32"))).to.equal(true);
    expect(returnsDirectly({ kind: "result", ok: i32 }, contextFor("aarch64"))).to.equal(false);
  });
});

describe("ABI targets", () => {
  it("should default per backend and reject unsupported targets", () => {
    expect(resolveTarget("csharp")?.name).to.equal("x86_64");
    expect(resolveTarget("js")?.name).to.equal("wasm32");
    expect(resolveTarget("csharp", "aarch64")?.name).to.equal("aarch64");
    expect(resolveTarget("js", "x86_64")).to.equal(undefined);
  });
});
