import { describe, expect, it } from "vitest";
import { CALENDAR_ERROR, type CalendarErrorDto } from "../lib/errors";
import { err, isErr, isOk, ok, type Result } from "../lib/result";

describe("lib/result", () => {
  it("ok() carries the value", () => {
    const r = ok(2460453);
    expect(r.ok).toBe(true);
    if (!r.ok) throw new Error("expected ok");
    expect(r.value).toBe(2460453);
  });

  it("err() carries the dto", () => {
    const e: CalendarErrorDto = { code: CALENDAR_ERROR.INVALID_DATE, message: "bad day" };
    const r = err<number>(e);
    expect(r.ok).toBe(false);
    if (r.ok) throw new Error("expected err");
    expect(r.error).toBe(e);
  });

  it("isOk/isErr narrow", () => {
    const a: Result<number> = ok(1);
    const b: Result<number> = err({ code: CALENDAR_ERROR.JDN_RANGE, message: "out" });
    expect(isOk(a)).toBe(true);
    expect(isErr(a)).toBe(false);
    expect(isOk(b)).toBe(false);
    expect(isErr(b)).toBe(true);
  });
});
