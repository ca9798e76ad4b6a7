import { describe, it } from "mocha";
import { expect } from "chai";
import { collectResults, error, flatMap, map, ok } from "./result.js";
import type { Result } from "./result.js";

describe("Result", () => {
  it("should map and chain successful values", () => {
    const doubled = map(ok<number, string>(4), (n) => n * 2);
    const checked = flatMap(doubled, (n): Result<number, string> =>
      n > 5 ? ok(n) : error("too small")
    );
    expect(checked).to.deep.equal({ ok: true, value: 8 });
  });

  it("should collect every error in input order", () => {
    const results: Result<number, readonly string[]>[] = [
      ok(1),
      error(["a"]),
      ok(2),
      error(["b", "c"]),
    ];
    expect(collectResults(results)).to.deep.equal({
      ok: false,
      error: ["a", "b", "c"],
    });
  });

  it("should collect values when nothing failed", () => {
    const results: Result<number, readonly string[]>[] = [ok(1), ok(2)];
    expect(collectResults(results)).to.deep.equal({
      ok: true,
      value: [1, 2],
    });
  });
});
