import { describe, expect, it } from "vitest";
import {
  CALENDAR_ERROR,
  CalendarError,
  EraTableLookupFailure,
  InvalidConfigError,
  InvalidDateError,
  InvalidMyanmarDateError,
  isCalendarError,
  OutOfSupportedJdnRangeError,
  toErrorDto,
} from "../lib/errors";

describe("lib/errors", () => {
  it("each subclass carries its code", () => {
    expect(new InvalidDateError("x").code).toBe(CALENDAR_ERROR.INVALID_DATE);
    expect(new InvalidMyanmarDateError("x").code).toBe(CALENDAR_ERROR.INVALID_MYANMAR_DATE);
    expect(new OutOfSupportedJdnRangeError(1, 2, 3).code).toBe(CALENDAR_ERROR.JDN_RANGE);
    expect(new EraTableLookupFailure(5).code).toBe(CALENDAR_ERROR.ERA_TABLE);
    expect(new InvalidConfigError("x").code).toBe(CALENDAR_ERROR.CONFIG);
  });

  it("keeps message, name and details", () => {
    const e = new InvalidDateError("Invalid Western month: 13", { month: 13 });
    expect(e).toBeInstanceOf(CalendarError);
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe("InvalidDateError");
    expect(e.message).toBe("Invalid Western month: 13");
    expect(e.dto).toEqual({ code: "E_INVALID_DATE", message: "Invalid Western month: 13", details: { month: 13 } });
  });

  it("describes era table failures", () => {
    expect(new EraTableLookupFailure(1385).dto).toEqual({
      code: "E_ERA_TABLE",
      message: "No era constants available for Myanmar year 1385",
      details: { myanmarYear: 1385 },
    });
  });

  describe("isCalendarError", () => {
    it("accepts instances", () => {
      expect(isCalendarError(new InvalidConfigError("x"))).toBe(true);
    });

    it("accepts plain errors that carry a known dto", () => {
      const e = Object.assign(new Error("moved"), { dto: { code: "E_JDN_RANGE", message: "moved" } });
      expect(isCalendarError(e)).toBe(true);
    });

    it("rejects everything else", () => {
      expect(isCalendarError(new Error("x"))).toBe(false);
      expect(isCalendarError(Object.assign(new Error("x"), { dto: { code: "E_NOPE", message: "x" } }))).toBe(false);
      expect(isCalendarError({ dto: { code: "E_JDN_RANGE", message: "x" } })).toBe(false);
      expect(isCalendarError(null)).toBe(false);
    });
  });

  describe("toErrorDto", () => {
    const fallback = { code: CALENDAR_ERROR.INTERNAL, message: "Conversion failed" };

    it("passes calendar errors through", () => {
      const e = new InvalidDateError("bad");
      expect(toErrorDto(e, fallback)).toBe(e.dto);
    });

    it("wraps other errors with their message as cause", () => {
      expect(toErrorDto(new TypeError("boom"), fallback)).toEqual({
        code: "E_INTERNAL",
        message: "Conversion failed",
        details: { cause: "boom" },
      });
      expect(toErrorDto("plain", fallback).details).toEqual({ cause: "plain" });
      expect(toErrorDto(undefined, fallback).details).toEqual({ cause: "unknown error" });
    });
  });
});
