// /lib/myanmar.ts
// Myanmar lunisolar dates ⇄ Julian Day Number.
import {
  BUDDHIST_ERA_OFFSET,
  LUNAR_YEAR_DAYS,
  MAX_MYANMAR_DAY,
  MAX_MYANMAR_MONTH,
  MAX_MYANMAR_YEAR,
  MIN_MYANMAR_DAY,
  MIN_MYANMAR_MONTH,
  MIN_MYANMAR_YEAR,
  MYANMAR_EPOCH,
  SOLAR_YEAR,
} from "./constants";
import { DEFAULT_CONFIG, localToUtc, type CalendarConfig, type SasanaYearType } from "./config";
import { CALENDAR_ERROR, InvalidMyanmarDateError, isCalendarError } from "./errors";
import { err, ok, type Result } from "./result";
import { assertJdnInRange, splitLocalJdn, timeToFraction, weekdayOf, type Weekday } from "./western";
import { getMyanmarYearInfo, type YearType } from "./yearInfo";

// ========== Tables ==========
export const MYANMAR_MONTH = {
  FIRST_WASO: 0,
  TAGU: 1,
  KASON: 2,
  NAYON: 3,
  WASO: 4,
  WAGAUNG: 5,
  TAWTHALIN: 6,
  THADINGYUT: 7,
  TAZAUNGMON: 8,
  NADAW: 9,
  PYATHO: 10,
  TABODWE: 11,
  TABAUNG: 12,
  LATE_TAGU: 13,
  LATE_KASON: 14,
} as const;

export const MOON_PHASE = {
  WAXING: 0,
  FULL: 1,
  WANING: 2,
  NEW: 3,
} as const;

export type MoonPhase = (typeof MOON_PHASE)[keyof typeof MOON_PHASE];

export type MyanmarDateInput = {
  year: number;
  /** 0 … 14, see MYANMAR_MONTH. */
  month: number;
  /** 1 … 30, counted from the first waxing day. */
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
};

export type MyanmarDate = {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly yearType: YearType;
  readonly moonPhase: MoonPhase;
  readonly fortnightDay: number;
  readonly weekday: Weekday;
  readonly sasanaYear: number;
  readonly monthLength: 29 | 30;
  /** 0 = first occurrence, 1 = late month repeated after Tabaung. */
  readonly monthType: 0 | 1;
  /** UTC-based JDN this date was read from. */
  readonly julianDayNumber: number;
};

// ========== Helpers ==========
/** 29 days for odd months, 30 for even ones; Nayon has 30 in a big watat year. */
export function getMonthLength(month: number, yearType: YearType): 29 | 30 {
  if (month === MYANMAR_MONTH.NAYON && yearType === 2) return 30;
  return month % 2 === 1 ? 29 : 30;
}

export function moonPhaseOf(day: number, monthLength: number): MoonPhase {
  const p = Math.floor((day + 1) / 16) + Math.floor(day / 16) + Math.floor(day / monthLength);
  switch (p) {
    case 0:
    case 1:
    case 2:
    case 3:
      return p;
    default:
      throw new RangeError(`Day ${day} does not fit a ${monthLength}-day month`);
  }
}

export function calculateMoonPhase(day: number, month: number, yearType: YearType): MoonPhase {
  return moonPhaseOf(day, getMonthLength(month, yearType));
}

/** Day within the waxing or waning fortnight, 1 … 15. */
export function calculateFortnightDay(day: number): number {
  return day - 15 * Math.floor(day / 16);
}

/**
 * Sasana (Buddhist era) year. `month` uses the full 0 … 14 numbering.
 * Type 1 moves the late months into the next Sasana year; type 2 keeps Tagu and
 * Kason before its full moon in the previous one.
 */
export function calculateSasanaYear(myanmarYear: number, month: number, day: number, type: SasanaYearType): number {
  let offset = BUDDHIST_ERA_OFFSET;
  if (type === 1 && month >= MYANMAR_MONTH.LATE_TAGU) offset += 1;
  else if (type === 2 && (month === MYANMAR_MONTH.TAGU || (month === MYANMAR_MONTH.KASON && day < 15))) offset -= 1;
  return myanmarYear + offset;
}

/** Days in a Myanmar year: 354, 384 (little watat) or 385 (big watat). */
export function getMyanmarYearLength(myanmarYear: number): number {
  const { yearType } = getMyanmarYearInfo(myanmarYear);
  return LUNAR_YEAR_DAYS + (yearType > 0 ? 30 : 0) + (yearType === 2 ? 1 : 0);
}

function isIntIn(v: number, min: number, max: number): boolean {
  return Number.isInteger(v) && v >= min && v <= max;
}

function validateMyanmarDate(input: Required<MyanmarDateInput>): void {
  const { year, month, day, hour, minute, second } = input;
  if (!isIntIn(year, MIN_MYANMAR_YEAR, MAX_MYANMAR_YEAR)) {
    throw new InvalidMyanmarDateError(
      `Myanmar year must be between ${MIN_MYANMAR_YEAR} and ${MAX_MYANMAR_YEAR}, got ${year}`,
      { year, month, day },
    );
  }
  if (!isIntIn(month, MIN_MYANMAR_MONTH, MAX_MYANMAR_MONTH)) {
    throw new InvalidMyanmarDateError(
      `Myanmar month must be between ${MIN_MYANMAR_MONTH} and ${MAX_MYANMAR_MONTH}, got ${month}`,
      { year, month, day },
    );
  }
  if (!isIntIn(day, MIN_MYANMAR_DAY, MAX_MYANMAR_DAY)) {
    throw new InvalidMyanmarDateError(
      `Myanmar day must be between ${MIN_MYANMAR_DAY} and ${MAX_MYANMAR_DAY}, got ${day}`,
      { year, month, day },
    );
  }
  if (!isIntIn(hour, 0, 23)) throw new InvalidMyanmarDateError(`Invalid hour: ${hour}`, { hour });
  if (!isIntIn(minute, 0, 59)) throw new InvalidMyanmarDateError(`Invalid minute: ${minute}`, { minute });
  if (!isIntIn(second, 0, 59)) throw new InvalidMyanmarDateError(`Invalid second: ${second}`, { second });
}

// ========== Myanmar → JDN ==========
/**
 * JDN (UTC-based) of a local Myanmar date-time.
 *
 * Only component ranges are checked: day 30 of a 29-day month is accepted and resolves
 * to the month's last day. Use validateMyanmarDateStrict to reject such
 * dates.
 */
export function myanmarToJulian(input: MyanmarDateInput, config: CalendarConfig = DEFAULT_CONFIG): number {
  const d = { ...input, hour: input.hour ?? 12, minute: input.minute ?? 0, second: input.second ?? 0 };
  validateMyanmarDate(d);
  const { year, month, day } = d;

  const info = getMyanmarYearInfo(year);
  const monthType = Math.floor(month / 13);
  const mm = (month % 13) + monthType;
  const b = Math.floor(info.yearType / 2);
  const c = info.yearType === 0 ? 1 : 0;

  const monthLength = getMonthLength(mm, info.yearType);

  // day → (phase, fortnight day) → day of month
  const phase = moonPhaseOf(day, monthLength);
  const fd = calculateFortnightDay(day);
  const m1 = phase % 2;
  const m2 = Math.floor(phase / 2);
  const md = m1 * (15 + m2 * (monthLength - 15)) + (1 - m1) * (fd + 15 * m2);

  // months counted from Tagu with First Waso folded in after Nayon
  const am = mm + 4 - Math.floor((mm + 15) / 16) * 4 + Math.floor((mm + 12) / 16);
  let dd =
    md +
    Math.floor(29.544 * am - 29.26) -
    c * Math.floor((am + 11) / 16) * 30 +
    b * Math.floor((am + 12) / 16);
  dd += monthType * (LUNAR_YEAR_DAYS + (1 - c) * 30 + b);

  const jd = dd + info.firstDayJdn - 1;
  const result = localToUtc(jd + timeToFraction(d.hour, d.minute, d.second), config);
  assertJdnInRange(result);
  return result;
}

// ========== JDN → Myanmar ==========
export function julianToMyanmar(julianDayNumber: number, config: CalendarConfig = DEFAULT_CONFIG): MyanmarDate {
  assertJdnInRange(julianDayNumber);
  const jdn = splitLocalJdn(julianDayNumber, config).dayNumber;

  let year = Math.floor((jdn - 0.5 - MYANMAR_EPOCH) / SOLAR_YEAR);
  let info = getMyanmarYearInfo(year);
  let dayCount = jdn - info.firstDayJdn + 1;
  // the solar estimate can overshoot into the next year by a day
  if (dayCount < 1) {
    year -= 1;
    info = getMyanmarYearInfo(year);
    dayCount = jdn - info.firstDayJdn + 1;
  }

  const b = Math.floor(info.yearType / 2);
  const c = info.yearType === 0 ? 1 : 0;
  const yearLength = LUNAR_YEAR_DAYS + (1 - c) * 30 + b;

  // past the lunar year: late Tagu / late Kason
  const monthType = dayCount > yearLength ? 1 : 0;
  dayCount -= monthType * yearLength;

  const a = Math.floor((dayCount + 423) / 512);
  let mm = Math.floor((dayCount - b * a + c * a * 30 + 29.26) / 29.544);
  const e = Math.floor((mm + 12) / 16);
  const f = Math.floor((mm + 11) / 16);
  const day = dayCount - Math.floor(29.544 * mm - 29.26) - b * e + c * f * 30;
  mm += f * 3 - e * 4;

  const monthLength = getMonthLength(mm, info.yearType);
  const month = mm + 12 * monthType;

  return Object.freeze({
    year,
    month,
    day,
    yearType: info.yearType,
    moonPhase: moonPhaseOf(day, monthLength),
    fortnightDay: calculateFortnightDay(day),
    weekday: weekdayOf(jdn),
    sasanaYear: calculateSasanaYear(year, month, day, config.sasanaYearType),
    monthLength,
    monthType,
    julianDayNumber,
  });
}

// ========== Strict validation ==========
/** Range check plus round trip: rejects dates that never occurred (e.g. Tagu in a common year's late months). */
export function validateMyanmarDateStrict(
  year: number,
  month: number,
  day: number,
  config: CalendarConfig = DEFAULT_CONFIG,
): Result<MyanmarDate> {
  try {
    const date = julianToMyanmar(myanmarToJulian({ year, month, day }, config), config);
    if (date.year !== year || date.month !== month || date.day !== day) {
      return err({
        code: CALENDAR_ERROR.INVALID_MYANMAR_DATE,
        message: `Myanmar date ${year}/${month}/${day} does not exist`,
        details: { year, month, day, resolvesTo: { year: date.year, month: date.month, day: date.day } },
      });
    }
    return ok(date);
  } catch (e) {
    if (isCalendarError(e)) return err(e.dto);
    throw e;
  }
}
