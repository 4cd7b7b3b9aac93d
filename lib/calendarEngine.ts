// /lib/calendarEngine.ts
// Public API. Everything here is a pure function of (input, config); callers that
// cache results can key them on the input and the config values.
import type { Dayjs } from "dayjs";
import { DEFAULT_CONFIG, type CalendarConfig } from "./config";
import { MAX_MYANMAR_DAY } from "./constants";
import {
  julianToMyanmar,
  myanmarToJulian,
  type MyanmarDate,
  type MyanmarDateInput,
} from "./myanmar";
import { jdnFromInstant, julianToWestern, westernToJulian, type WesternDate, type WesternDateInput } from "./western";

export * from "./constants";
export * from "./config";
export * from "./errors";
export * from "./result";
export * from "./eraTable";
export * from "./watat";
export * from "./yearInfo";
export * from "./western";
export * from "./myanmar";

export type ConvertedDate = {
  julianDayNumber: number;
  western: WesternDate;
  myanmar: MyanmarDate;
};

export function westernToMyanmar(date: WesternDateInput, config: CalendarConfig = DEFAULT_CONFIG): MyanmarDate {
  return julianToMyanmar(westernToJulian(date, config), config);
}

export function myanmarToWestern(date: MyanmarDateInput, config: CalendarConfig = DEFAULT_CONFIG): WesternDate {
  return julianToWestern(myanmarToJulian(date, config), config);
}

export function convertJulianDay(julianDayNumber: number, config: CalendarConfig = DEFAULT_CONFIG): ConvertedDate {
  return {
    julianDayNumber,
    western: julianToWestern(julianDayNumber, config),
    myanmar: julianToMyanmar(julianDayNumber, config),
  };
}

/** Both calendars for an instant (Date, dayjs, ISO string or epoch ms). */
export function convertInstant(
  instant: Date | Dayjs | string | number,
  config: CalendarConfig = DEFAULT_CONFIG,
): ConvertedDate {
  return convertJulianDay(jdnFromInstant(instant), config);
}

/**
 * Days of a Myanmar month that fall within `year`, in order. Tagu and the late months
 * straddle the solar new year, so they are usually partial; First Waso is empty
 * outside watat years.
 */
export function getMyanmarMonth(year: number, month: number, config: CalendarConfig = DEFAULT_CONFIG): MyanmarDate[] {
  const days: MyanmarDate[] = [];
  const first = myanmarToJulian({ year, month, day: 1 }, config);
  for (let i = 0; i < MAX_MYANMAR_DAY; i++) {
    const date = julianToMyanmar(first + i, config);
    if (date.year === year && date.month === month) days.push(date);
    else if (days.length > 0) break;
  }
  return days;
}
