// /lib/yearInfo.ts
import { LUNAR_YEAR_DAYS, MAX_COMMON_YEAR_RUN, WASO_FULL_MOON_TO_TAGU } from "./constants";
import { ERA_TABLE, type EraDefinition } from "./eraTable";
import { checkWatat, mod } from "./watat";

/** 0 = common, 1 = little watat (extra Waso), 2 = big watat (extra Waso and Nayon day). */
export type YearType = 0 | 1 | 2;

export type MyanmarYearInfo = {
  readonly year: number;
  readonly yearType: YearType;
  readonly isWatat: boolean;
  /** JDN of Tagu 1. */
  readonly firstDayJdn: number;
  /** JDN of the Waso full moon controlling the year. */
  readonly fullMoonJdn: number;
  /**
   * The gap to the previous watat full moon was neither 30 nor 31 days (mod 354).
   * yearType is then a best guess.
   */
  readonly watatError: boolean;
};

/**
 * Year type and boundaries of a Myanmar year. Walks back at most three years to
 * the previous watat year; this is the only place year boundaries are computed.
 */
export function getMyanmarYearInfo(myanmarYear: number, table: ReadonlyArray<EraDefinition> = ERA_TABLE): MyanmarYearInfo {
  const current = checkWatat(myanmarYear, table);

  let offset = 0;
  let previous = current;
  while (offset < MAX_COMMON_YEAR_RUN) {
    offset++;
    previous = checkWatat(myanmarYear - offset, table);
    if (previous.isWatat) break;
  }

  let yearType: YearType = 0;
  let fullMoonJdn = previous.fullMoonJdn + LUNAR_YEAR_DAYS * offset;
  let watatError = false;
  if (current.isWatat) {
    const gap = mod(current.fullMoonJdn - previous.fullMoonJdn, LUNAR_YEAR_DAYS);
    yearType = gap >= 31 ? 2 : 1;
    fullMoonJdn = current.fullMoonJdn;
    watatError = gap !== 30 && gap !== 31;
  }

  return {
    year: myanmarYear,
    yearType,
    isWatat: current.isWatat,
    firstDayJdn: previous.fullMoonJdn + LUNAR_YEAR_DAYS * offset - WASO_FULL_MOON_TO_TAGU,
    fullMoonJdn,
    watatError,
  };
}

export function calculateYearType(myanmarYear: number): YearType {
  return getMyanmarYearInfo(myanmarYear).yearType;
}

export function isWatatYear(myanmarYear: number): boolean {
  return getMyanmarYearInfo(myanmarYear).yearType > 0;
}

export function getYearStartJdn(myanmarYear: number): number {
  return getMyanmarYearInfo(myanmarYear).firstDayJdn;
}
