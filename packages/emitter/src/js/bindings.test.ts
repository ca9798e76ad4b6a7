import { after, before, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { pathToFileURL } from "node:url";
import { ir } from "@ffigen/frontend";
import { generateBindings } from "../generate.js";
import { registryOf } from "../test-harness.js";

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
  primitiveSlice,
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
    opaqueDef("Counter", [
      method("new", [param("start", primitive("i32"))], ownedOpaque("Counter")),
      method("add", [param("by", primitive("i32"))], unit(), { self: refSelf(true) }),
      method("value", [], primitive("i32"), { self: refSelf() }),
      method("describe", [], writeable(), { self: refSelf() }),
      method("parse", [param("text", utf8())], fallible(ownedOpaque("Counter"), unit())),
      method("move_to", [param("p", struct("Point"))], unit(), { self: refSelf(true) }),
      method("position", [], struct("Point"), { self: refSelf() }),
      method("link", [param("other", borrowedOpaque("Counter"))], unit(), {
        self: refSelf(true),
      }),
      method("peer", [], nullable(borrowedOpaque("Counter")), { self: refSelf() }),
      method("absorb", [param("other", ownedOpaque("Counter"))], unit(), {
        self: refSelf(true),
      }),
      method("sum", [param("values", primitiveSlice("i32"))], primitive("i32")),
      method("half", [], nullable(primitive("f64")), { self: refSelf() }),
      method("set_mode", [param("mode", enumRef("Mode"))], unit(), { self: refSelf(true) }),
      method("compare", [param("other", nullable(borrowedOpaque("Counter")))], primitive("i32"), {
        self: refSelf(),
      }),
    ]),
    opaqueDef("OpaqueStruct", [
      method("add_two", [param("x", primitive("i32"))], primitive("i32")),
    ]),
    structDef(
      "Point",
      [field("x", primitive("i32")), field("y", primitive("i32"))],
      [method("length_sq", [], primitive("i32"), { self: valueSelf() })]
    ),
    enumDef("Mode", [variant("Up", 0), variant("Down", 1)]),
  ],
  "calc"
);

type CounterState = { value: number; peer: number; x: number; y: number; mode: number };

/**
 * In-process stand-in for the instantiated wasm library
 */
const createLibrary = () => {
  const memory = { buffer: new ArrayBuffer(1 << 16) };
  const view = (): DataView => new DataView(memory.buffer);
  let next = 16;
  const bump = (size: number, align: number): number => {
    next = Math.ceil(next / align) * align;
    const ptr = next;
    next += Math.max(size, 1);
    return ptr;
  };

  const live = new Set<number>();
  const destroyed: number[] = [];
  const counters = new Map<number, CounterState>();
  const sinks = new Map<number, number[]>();

  const counter = (ptr: number): CounterState => {
    const state = counters.get(ptr);
    if (!state) throw new Error(`No counter at ${ptr}`);
    return state;
  };
  const sink = (ptr: number): number[] => {
    const bytes = sinks.get(ptr);
    if (!bytes) throw new Error(`No write sink at ${ptr}`);
    return bytes;
  };
  const create = (value: number): number => {
    const ptr = bump(16, 4);
    counters.set(ptr, { value, peer: 0, x: 0, y: 0, mode: 0 });
    return ptr;
  };
  const destroy = (ptr: number): void => {
    counter(ptr);
    counters.delete(ptr);
    destroyed.push(ptr);
  };
  const text = (ptr: number, len: number): string =>
    new TextDecoder().decode(new Uint8Array(memory.buffer, ptr, len));

  const exports = {
    memory,
    ffigen_alloc: (size: number, align: number): number => {
      const ptr = bump(size, align);
      live.add(ptr);
      return ptr;
    },
    ffigen_free: (ptr: number): void => {
      live.delete(ptr);
    },
    ffigen_write_create: (): number => {
      const ptr = bump(4, 4);
      sinks.set(ptr, []);
      return ptr;
    },
    ffigen_write_bytes: (write: number): number => {
      const bytes = sink(write);
      const ptr = bump(bytes.length, 1);
      new Uint8Array(memory.buffer, ptr, bytes.length).set(bytes);
      return ptr;
    },
    ffigen_write_len: (write: number): number => sink(write).length,
    ffigen_write_destroy: (write: number): void => {
      sinks.delete(write);
    },
    Counter_new: (start: number): number => create(start),
    Counter_add: (self: number, by: number): void => {
      counter(self).value += by;
    },
    Counter_value: (self: number): number => counter(self).value,
    Counter_describe: (self: number, write: number): void => {
      sink(write).push(...new TextEncoder().encode(`Counter(${counter(self).value})`));
    },
    Counter_parse: (ptr: number, len: number, out: number): void => {
      const source = text(ptr, len);
      const parsed = /^\d+$/.test(source);
      if (parsed) {
        view().setUint32(out, create(Number(source)), true);
      }
      view().setUint8(out + 4, parsed ? 1 : 0);
    },
    Counter_move_to: (self: number, x: number, y: number): void => {
      const state = counter(self);
      state.x = x;
      state.y = y;
    },
    Counter_position: (self: number, out: number): void => {
      const state = counter(self);
      view().setInt32(out, state.x, true);
      view().setInt32(out + 4, state.y, true);
    },
    Counter_link: (self: number, other: number): void => {
      counter(self).peer = other;
    },
    Counter_peer: (self: number): number => counter(self).peer,
    Counter_absorb: (self: number, other: number): void => {
      counter(self).value += counter(other).value;
      destroy(other);
    },
    Counter_sum: (ptr: number, len: number): number => {
      let total = 0;
      for (let i = 0; i < len; i++) {
        total += view().getInt32(ptr + i * 4, true);
      }
      return total;
    },
    Counter_half: (self: number, out: number): void => {
      const value = counter(self).value;
      const even = value % 2 === 0;
      if (even) {
        view().setFloat64(out, value / 2, true);
      }
      view().setUint8(out + 8, even ? 1 : 0);
    },
    Counter_set_mode: (self: number, mode: number): void => {
      counter(self).mode = mode;
    },
    Counter_compare: (self: number, other: number): number =>
      other === 0 ? -1 : counter(self).value - counter(other).value,
    Counter_destroy: (self: number): void => {
      destroy(self);
    },
    Point_length_sq: (x: number, y: number): number => x * x + y * y,
    OpaqueStruct_add_two: (x: number): number => x + 2,
    OpaqueStruct_destroy: (self: number): void => {
      destroyed.push(self);
    },
  };

  return { exports, live, destroyed, counter };
};

const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const get = (target: unknown, key: string): unknown => {
  if (!isObjectLike(target)) {
    throw new TypeError(`Cannot read '${key}' of ${String(target)}`);
  }
  return Reflect.get(target, key);
};

const invoke = (target: unknown, key: string, ...args: readonly unknown[]): unknown => {
  const fn = get(target, key);
  if (typeof fn !== "function") {
    throw new TypeError(`'${key}' is not a function`);
  }
  return Reflect.apply(fn, target, args);
};

const construct = (ctor: unknown, ...args: readonly unknown[]): unknown => {
  if (typeof ctor !== "function") {
    throw new TypeError("Not a constructor");
  }
  return Reflect.construct(ctor, args);
};

const thrown = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
};

describe("JavaScript bindings", function () {
  this.timeout(10000);

  let outDir = "";
  let bindings: unknown;
  let library = createLibrary();

  const Counter = (): unknown => get(bindings, "Counter");
  const Point = (): unknown => get(bindings, "Point");

  before(async () => {
    const result = generateBindings(registry, { backend: "js" });
    expect(result.diagnostics).to.deep.equal([]);

    outDir = mkdtempSync(join(tmpdir(), "ffigen-js-"));
    for (const artifact of result.artifacts) {
      const path = join(outDir, artifact.path);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, artifact.contents);
    }

    const loaded: unknown = await import(pathToFileURL(join(outDir, "index.mjs")).href);
    bindings = loaded;
  });

  beforeEach(() => {
    library = createLibrary();
    invoke(bindings, "bindLibrary", library.exports);
  });

  after(() => {
    if (outDir !== "") {
      rmSync(outDir, { recursive: true, force: true });
    }
  });

  it("should call static methods", () => {
    expect(invoke(get(bindings, "OpaqueStruct"), "addTwo", 3)).to.equal(5);
  });

  it("should call static constructors and instance methods", () => {
    const counter = invoke(Counter(), "new", 5);
    invoke(counter, "add", 3);

    expect(invoke(counter, "value")).to.equal(8);
  });

  it("should read writeable results as strings", () => {
    const counter = invoke(Counter(), "new", 12);

    expect(invoke(counter, "describe")).to.equal("Counter(12)");
  });

  it("should flatten struct arguments and read struct returns", () => {
    const counter = invoke(Counter(), "new", 0);
    invoke(counter, "moveTo", construct(Point(), { x: 2, y: 7 }));

    const position = invoke(counter, "position");

    const pointClass = Point();
    expect(typeof pointClass === "function" && position instanceof pointClass).to.equal(true);
    expect(get(position, "x")).to.equal(2);
    expect(get(position, "y")).to.equal(7);
    expect(library.live.size).to.equal(0);
  });

  it("should pass a struct self by value", () => {
    const point = construct(Point(), { x: 3, y: 4 });

    expect(invoke(point, "lengthSq")).to.equal(25);
  });

  it("should copy buffers into native memory", () => {
    expect(invoke(Counter(), "sum", [1, 2, 3])).to.equal(6);
    expect(library.live.size).to.equal(0);
  });

  it("should pass enums as their values", () => {
    const counter = invoke(Counter(), "new", 0);
    invoke(counter, "setMode", get(get(bindings, "Mode"), "Down"));

    expect(get(bindings, "Mode")).to.deep.equal({ Up: 0, Down: 1 });
    expect(library.counter(16).mode).to.equal(1);
  });

  it("should return successful fallible values and free the call's memory", () => {
    const parsed = invoke(Counter(), "parse", "12");

    expect(invoke(parsed, "value")).to.equal(12);
    expect(library.live.size).to.equal(0);
  });

  it("should throw FfiError when a fallible call fails", () => {
    const error = thrown(() => invoke(Counter(), "parse", "abc"));

    expect(error).to.be.instanceOf(Error);
    expect(get(error, "name")).to.equal("FfiError");
    expect(get(error, "message")).to.equal("Native call failed: null");
    expect(get(error, "error")).to.equal(null);
    expect(library.live.size).to.equal(0);
  });

  it("should map null pointers to null", () => {
    const counter = invoke(Counter(), "new", 1);

    expect(invoke(counter, "peer")).to.equal(null);
  });

  it("should forward null for a nullable handle", () => {
    const first = invoke(Counter(), "new", 7);
    const second = invoke(Counter(), "new", 4);

    expect(invoke(first, "compare", null)).to.equal(-1);
    expect(invoke(first, "compare", second)).to.equal(3);
  });

  it("should wrap borrowed handles without taking ownership", () => {
    const first = invoke(Counter(), "new", 1);
    const second = invoke(Counter(), "new", 2);
    invoke(first, "link", second);

    const peer = invoke(first, "peer");

    expect(invoke(peer, "value")).to.equal(2);
    expect(thrown(() => invoke(first, "absorb", peer))).to.have.property(
      "message",
      "Cannot transfer a borrowed Counter"
    );
  });

  it("should give up a transferred handle", () => {
    const first = invoke(Counter(), "new", 1);
    const second = invoke(Counter(), "new", 2);

    invoke(first, "absorb", second);

    expect(invoke(first, "value")).to.equal(3);
    expect(library.destroyed).to.deep.equal([32]);
    expect(thrown(() => invoke(second, "value"))).to.have.property(
      "message",
      "Counter has been freed"
    );
  });

  it("should destroy owned handles on free", () => {
    const counter = invoke(Counter(), "new", 1);

    invoke(counter, "free");
    invoke(counter, "free");

    expect(library.destroyed).to.deep.equal([16]);
  });

  it("should read optional scalars", () => {
    expect(invoke(invoke(Counter(), "new", 8), "half")).to.equal(4);
    expect(invoke(invoke(Counter(), "new", 3), "half")).to.equal(null);
  });

  it("should reject direct construction of handle classes", () => {
    expect(thrown(() => construct(Counter()))).to.have.property(
      "message",
      "Counter cannot be constructed directly"
    );
  });
});
