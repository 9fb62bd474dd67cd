/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, type Result } from "./result.js";

const parseCount = (text: string): Result<number, string> => {
  const value = Number(text);
  return Number.isInteger(value) && value >= 0
    ? ok(value)
    : error(`'${text}' is not a count`);
};

describe("Result", () => {
  it("should wrap values", () => {
    expect(ok<number, string>(3)).to.deep.equal({ ok: true, value: 3 });
  });

  it("should wrap errors", () => {
    expect(error<number, string>("no handle")).to.deep.equal({
      ok: false,
      error: "no handle",
    });
  });

  it("should narrow on ok", () => {
    const results = ["2", "x"].map(parseCount);
    expect(results.map((r) => (r.ok ? r.value : r.error))).to.deep.equal([
      2,
      "'x' is not a count",
    ]);
  });
});
