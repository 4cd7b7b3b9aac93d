// /lib/western.ts
// Western (British / Gregorian / Julian) dates ⇄ Julian Day Number.
import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc";
import {
  MAX_JDN,
  MAX_WESTERN_YEAR,
  MIN_JDN,
  MIN_WESTERN_YEAR,
  MS_PER_DAY,
  UNIX_EPOCH_JDN,
} from "./constants";
import { DEFAULT_CONFIG, localToUtc, utcToLocal, type CalendarConfig } from "./config";
import { InvalidDateError, OutOfSupportedJdnRangeError } from "./errors";

dayjs.extend(utc);

/** 0 = Saturday … 6 = Friday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export type WesternDateInput = {
  year: number;
  month: number;
  day: number;
  /** Defaults to 12 (noon). */
  hour?: number;
  minute?: number;
  second?: number;
};

export type WesternDate = {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly weekday: Weekday;
  /** UTC-based JDN this date was read from. */
  readonly julianDayNumber: number;
};

// ========== Helpers ==========
/** Integer JDNs of a civil date under both rules. Jan/Feb count as months 13/14 of the previous year. */
function civilDayNumbers(year: number, month: number, day: number): { gregorian: number; julian: number } {
  const a = Math.floor((14 - month) / 12);
  const y = year + 4800 - a;
  const m = month + 12 * a - 3;
  const base = day + Math.floor((153 * m + 2) / 5) + 365 * y + Math.floor(y / 4);
  return { gregorian: base - Math.floor(y / 100) + Math.floor(y / 400) - 32045, julian: base - 32083 };
}

/** Under `british` the Julian rule holds while Feb 29 would still fall before the switch day. */
export function isWesternLeapYear(year: number, config: CalendarConfig = DEFAULT_CONFIG): boolean {
  const julianRule = year % 4 === 0;
  if (config.calendarType === "julian") return julianRule;
  if (config.calendarType === "british" && civilDayNumbers(year, 2, 28).julian + 1 < config.gregorianStartJdn) {
    return julianRule;
  }
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInWesternMonth(year: number, month: number, config: CalendarConfig = DEFAULT_CONFIG): number {
  switch (month) {
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    case 2:
      return isWesternLeapYear(year, config) ? 29 : 28;
    default:
      return month >= 1 && month <= 12 ? 31 : 0;
  }
}

/** Fraction of a day relative to noon. */
export function timeToFraction(hour: number, minute: number, second: number): number {
  return (hour - 12) / 24 + minute / 1440 + second / 86400;
}

export function weekdayOf(localJdn: number): Weekday {
  const w = (((Math.floor(localJdn + 0.5) + 2) % 7) + 7) % 7;
  return asWeekday(w);
}

export function asWeekday(n: number): Weekday {
  switch (n) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
      return n;
    default:
      throw new RangeError(`Not a weekday index: ${n}`);
  }
}

export function assertJdnInRange(jdn: number): void {
  if (!Number.isFinite(jdn) || jdn < MIN_JDN || jdn > MAX_JDN) {
    throw new OutOfSupportedJdnRangeError(jdn, MIN_JDN, MAX_JDN);
  }
}

/**
 * Local civil day number and second of day of a UTC JDN. Rounds to the second
 * first, so 23:59:59.9999 never shows up as second 60 or on the wrong day.
 */
export function splitLocalJdn(julianDayNumber: number, config: CalendarConfig): { dayNumber: number; secondOfDay: number } {
  const local = utcToLocal(julianDayNumber, config);
  const total = Math.round((local + 0.5) * 86400);
  const dayNumber = Math.floor(total / 86400);
  return { dayNumber, secondOfDay: total - dayNumber * 86400 };
}

function isIntIn(v: number, min: number, max: number): boolean {
  return Number.isInteger(v) && v >= min && v <= max;
}

function validateWesternDate(d: Required<WesternDateInput>, config: CalendarConfig): void {
  const { year, month, day, hour, minute, second } = d;
  if (!isIntIn(year, MIN_WESTERN_YEAR, MAX_WESTERN_YEAR)) {
    throw new InvalidDateError(`Invalid Western year: ${year}`, { year });
  }
  if (!isIntIn(month, 1, 12)) throw new InvalidDateError(`Invalid Western month: ${month}`, { month });
  const maxDay = daysInWesternMonth(year, month, config);
  if (!isIntIn(day, 1, maxDay)) {
    throw new InvalidDateError(`Invalid Western day: ${day} for year ${year} month ${month}`, { year, month, day, maxDay });
  }
  if (!isIntIn(hour, 0, 23)) throw new InvalidDateError(`Invalid hour: ${hour}`, { hour });
  if (!isIntIn(minute, 0, 59)) throw new InvalidDateError(`Invalid minute: ${minute}`, { minute });
  if (!isIntIn(second, 0, 59)) throw new InvalidDateError(`Invalid second: ${second}`, { second });
}

// ========== Western → JDN ==========
/**
 * JDN (UTC-based, fractional) of a local Western date-time.
 *
 * Under `british` a Gregorian
 * result before `gregorianStartJdn` is recomputed with the Julian rule and clamped to
 * `gregorianStartJdn`, so 1752-09-03 … 1752-09-13 all land on the switch day.
 */
export function westernToJulian(input: WesternDateInput, config: CalendarConfig = DEFAULT_CONFIG): number {
  const d = { ...input, hour: input.hour ?? 12, minute: input.minute ?? 0, second: input.second ?? 0 };
  validateWesternDate(d, config);

  const { gregorian, julian } = civilDayNumbers(d.year, d.month, d.day);

  let jd = gregorian;
  if (config.calendarType === "julian") jd = julian;
  else if (config.calendarType === "british" && gregorian < config.gregorianStartJdn) {
    jd = Math.min(julian, config.gregorianStartJdn);
  }

  const result = localToUtc(jd + timeToFraction(d.hour, d.minute, d.second), config);
  assertJdnInRange(result);
  return result;
}

// ========== JDN → Western ==========
export function julianToWestern(julianDayNumber: number, config: CalendarConfig = DEFAULT_CONFIG): WesternDate {
  assertJdnInRange(julianDayNumber);
  const { dayNumber, secondOfDay: secs } = splitLocalJdn(julianDayNumber, config);

  let year: number;
  let month: number;
  let day: number;

  if (config.calendarType === "julian" || (config.calendarType === "british" && dayNumber < config.gregorianStartJdn)) {
    const b = dayNumber + 1524;
    const c = Math.floor((b - 122.1) / 365.25);
    const f = Math.floor(365.25 * c);
    const e = Math.floor((b - f) / 30.6001);
    month = e > 13 ? e - 13 : e - 1;
    day = b - f - Math.floor(30.6001 * e);
    year = month < 3 ? c - 4715 : c - 4716;
  } else {
    let j = dayNumber - 1721119;
    let y = Math.floor((4 * j - 1) / 146097);
    j = 4 * j - 1 - 146097 * y;
    let d = Math.floor(j / 4);
    j = Math.floor((4 * d + 3) / 1461);
    d = 4 * d + 3 - 1461 * j;
    d = Math.floor((d + 4) / 4);
    let m = Math.floor((5 * d - 3) / 153);
    d = 5 * d - 3 - 153 * m;
    d = Math.floor((d + 5) / 5);
    y = 100 * y + j;
    if (m < 10) m += 3;
    else {
      m -= 9;
      y += 1;
    }
    year = y;
    month = m;
    day = d;
  }

  return Object.freeze({
    year,
    month,
    day,
    hour: Math.floor(secs / 3600),
    minute: Math.floor((secs % 3600) / 60),
    second: secs % 60,
    weekday: weekdayOf(dayNumber),
    julianDayNumber,
  });
}

// ========== Instants ==========
/** UTC JDN of an instant (Date, dayjs, ISO string or epoch ms). */
export function jdnFromInstant(instant: Date | Dayjs | string | number): number {
  const d = dayjs.utc(instant);
  if (!d.isValid()) throw new InvalidDateError(`Invalid instant: ${String(instant)}`);
  return d.valueOf() / MS_PER_DAY + UNIX_EPOCH_JDN;
}

export function instantFromJdn(julianDayNumber: number): Dayjs {
  assertJdnInRange(julianDayNumber);
  return dayjs.utc(Math.round((julianDayNumber - UNIX_EPOCH_JDN) * MS_PER_DAY));
}

/** Proleptic Gregorian `YYYY-MM-DD` of an integer JDN, for diagnostics. */
export function jdnToGregorianString(jdn: number): string {
  const a = Math.round(jdn) + 32044;
  const b = Math.floor((4 * a + 3) / 146097);
  const c = a - Math.floor((146097 * b) / 4);
  const d = Math.floor((4 * c + 3) / 1461);
  const e = c - Math.floor((1461 * d) / 4);
  const m = Math.floor((5 * e + 2) / 153);

  const day = e - Math.floor((153 * m + 2) / 5) + 1;
  const month = m + 3 - 12 * Math.floor(m / 10);
  const year = 100 * b + d - 4800 + Math.floor(m / 10);
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}
