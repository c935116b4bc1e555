import { describe, expect, it } from "vitest";
import {
  type Result,
  andThen,
  err,
  isErr,
  isOk,
  map,
  ok,
  unwrapOr,
} from "../../main/ts/common/result.js";

const half = (n: number): Result<number, string> =>
  n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);

describe("Result", () => {
  it("should tell the two variants apart", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isOk(err("no"))).toBe(false);
    expect(isErr(err("no"))).toBe(true);
  });

  it("should map and chain only the Ok variant", () => {
    expect(map(half(8), (n) => n + 1)).toEqual({ ok: true, value: 5 });
    expect(andThen(half(8), half)).toEqual({ ok: true, value: 2 });
    expect(andThen(half(6), half)).toEqual({ ok: false, error: "3 is odd" });
    expect(map(half(3), (n) => n + 1)).toEqual({
      ok: false,
      error: "3 is odd",
    });
  });

  it("should fall back for the Err variant", () => {
    expect(unwrapOr(half(4), 0)).toBe(2);
    expect(unwrapOr(half(5), 0)).toBe(0);
  });
});
