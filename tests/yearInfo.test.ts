import { describe, expect, it } from "vitest";
import { ERA_TABLE, type EraDefinition } from "../lib/eraTable";
import { getMyanmarYearLength } from "../lib/myanmar";
import { calculateYearType, getMyanmarYearInfo, getYearStartJdn, isWatatYear } from "../lib/yearInfo";

describe("lib/yearInfo", () => {
  it("ME 1385 is a big watat year", () => {
    expect(getMyanmarYearInfo(1385)).toEqual({
      year: 1385,
      yearType: 2,
      isWatat: true,
      firstDayJdn: 2460025,
      fullMoonJdn: 2460158,
      watatError: false,
    });
  });

  it("ME 1386 is a common year controlled by the previous watat full moon", () => {
    expect(getMyanmarYearInfo(1386)).toEqual({
      year: 1386,
      yearType: 0,
      isWatat: false,
      firstDayJdn: 2460410,
      fullMoonJdn: 2460512,
      watatError: false,
    });
  });

  it("ME 1382 is a little watat year", () => {
    const info = getMyanmarYearInfo(1382);
    expect(info.yearType).toBe(1);
    expect(info.firstDayJdn).toBe(2458933);
    expect(info.fullMoonJdn).toBe(2459065);
  });

  it("helpers agree with the resolver", () => {
    expect(calculateYearType(1385)).toBe(2);
    expect(isWatatYear(1385)).toBe(true);
    expect(isWatatYear(1386)).toBe(false);
    expect(getYearStartJdn(1386)).toBe(2460410);
  });

  it("consecutive controlling full moons are 354, 384 or 385 days apart (ME 1300-1400)", () => {
    const gaps = new Set<number>();
    for (let y = 1300; y < 1400; y++) {
      gaps.add(getMyanmarYearInfo(y + 1).fullMoonJdn - getMyanmarYearInfo(y).fullMoonJdn);
    }
    expect([...gaps].sort()).toEqual([354, 384, 385]);
  });

  it("year boundaries match year lengths", () => {
    for (let y = 1300; y < 1400; y++) {
      expect(getYearStartJdn(y + 1) - getYearStartJdn(y)).toBe(getMyanmarYearLength(y));
    }
  });

  it("never reports an inconsistent watat gap with the built-in table", () => {
    const bad: number[] = [];
    for (let y = 1; y <= 9999; y++) {
      if (getMyanmarYearInfo(y).watatError) bad.push(y);
    }
    expect(bad).toEqual([]);
  });

  it("flags an inconsistent gap but still returns a year type", () => {
    const table: EraDefinition[] = ERA_TABLE.map((e) =>
      e.start === 1312 ? { ...e, fullMoonOffsetExceptions: [...e.fullMoonOffsetExceptions, [1385, 5] as const] } : e,
    );
    expect(getMyanmarYearInfo(1385, table)).toEqual({
      year: 1385,
      yearType: 2,
      isWatat: true,
      firstDayJdn: 2460025,
      fullMoonJdn: 2460163,
      watatError: true,
    });
  });
});
