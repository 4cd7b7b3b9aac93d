// /lib/eraTable.ts
import { EraTableLookupFailure } from "./errors";

// Historical constants of the Myanmar calendar. Each era holds from `start` up to the
// next era's start; the last one is open-ended and years before the first era use
// the first era. The exception lists record years where the published calendar
// departed from the formula, and must stay as recorded.

export type EraDefinition = {
  readonly name: string;
  readonly start: number;
  /** EI: 1.x eras decide watat by the 19-year cycle, 2+ by excess days. */
  readonly eraIndex: number;
  /** WO: full-moon offset, days. */
  readonly watatOffset: number;
  /** NM: intercalary months per Metonic cycle (-1 where unused). */
  readonly numMonths: number;
  /** [year, days] added to WO for that year. */
  readonly fullMoonOffsetExceptions: ReadonlyArray<readonly [number, number]>;
  /** Years whose watat status is the inverse of the formula's. */
  readonly watatExceptionYears: readonly number[];
};

export type EraConstant = {
  readonly name: string;
  readonly yearRangeStart: number;
  readonly eraIndex: number;
  readonly watatOffset: number;
  readonly numMonths: number;
  /** EW: 1 flips the computed watat status. */
  readonly watatExceptionMask: 0 | 1;
};

export const ERA_TABLE: ReadonlyArray<EraDefinition> = [
  {
    name: "Makaranta 1",
    start: 0,
    eraIndex: 1.1,
    watatOffset: -1.1,
    numMonths: -1,
    fullMoonOffsetExceptions: [
      [205, 1], [246, 1], [471, 1], [572, -1], [651, 1],
      [653, 2], [656, 1], [672, 1], [729, 1], [767, -1],
    ],
    watatExceptionYears: [],
  },
  {
    name: "Makaranta 2",
    start: 798,
    eraIndex: 1.2,
    watatOffset: -1.1,
    numMonths: -1,
    fullMoonOffsetExceptions: [
      [813, -1], [849, -1], [851, -1], [854, -1], [927, -1], [933, -1], [936, -1],
      [938, -1], [949, -1], [952, -1], [963, -1], [968, -1], [1039, -1],
    ],
    watatExceptionYears: [],
  },
  {
    name: "Thandeikta",
    start: 1100,
    eraIndex: 1.3,
    watatOffset: -0.85,
    numMonths: -1,
    fullMoonOffsetExceptions: [[1120, 1], [1126, -1], [1150, 1], [1172, -1], [1207, 1]],
    watatExceptionYears: [1201, 1202],
  },
  {
    name: "British colony",
    start: 1217,
    eraIndex: 2,
    watatOffset: -1,
    numMonths: 4,
    fullMoonOffsetExceptions: [[1234, 1], [1261, -1]],
    watatExceptionYears: [1263, 1264],
  },
  {
    name: "After independence",
    start: 1312,
    eraIndex: 3,
    watatOffset: -0.5,
    numMonths: 8,
    fullMoonOffsetExceptions: [[1377, 1]],
    watatExceptionYears: [1344, 1345],
  },
];

/**
 * Constants in force for `myanmarYear`, exceptions applied.
 * Throws EraTableLookupFailure only when `table` is empty.
 */
export function lookupEra(myanmarYear: number, table: ReadonlyArray<EraDefinition> = ERA_TABLE): EraConstant {
  if (table.length === 0) throw new EraTableLookupFailure(myanmarYear);
  let era = table[0];
  for (const candidate of table) {
    if (candidate.start > myanmarYear) break;
    era = candidate;
  }
  const fmException = era.fullMoonOffsetExceptions.find(([y]) => y === myanmarYear);
  return {
    name: era.name,
    yearRangeStart: era.start,
    eraIndex: era.eraIndex,
    watatOffset: era.watatOffset + (fmException ? fmException[1] : 0),
    numMonths: era.numMonths,
    watatExceptionMask: era.watatExceptionYears.includes(myanmarYear) ? 1 : 0,
  };
}
