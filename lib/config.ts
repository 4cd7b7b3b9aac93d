// /lib/config.ts
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import tz from "dayjs/plugin/timezone";
import { z } from "zod";
import {
  ANCIENT_MYANMAR_TIME_OFFSET,
  DEFAULT_GREGORIAN_START,
  MAX_JDN,
  MIN_JDN,
  MYANMAR_TIME_OFFSET,
} from "./constants";
import { InvalidConfigError } from "./errors";

dayjs.extend(utc);
dayjs.extend(tz);

/**
 * british   Julian rule before `gregorianStartJdn`, Gregorian rule from it on
 * gregorian proleptic Gregorian
 * julian    proleptic Julian
 */
export type CalendarType = "british" | "gregorian" | "julian";

/**
 * Sasana year numbering:
 * 0 = solar only, year + 1182
 * 1 = late months (13, 14) already count toward the next Sasana year
 * 2 = the Sasana year turns over on Kason full moon
 */
export type SasanaYearType = 0 | 1 | 2;

export type CalendarConfig = {
  readonly calendarType: CalendarType;
  readonly gregorianStartJdn: number;
  /** Hours east of UTC. Dates are read and written in this local time. */
  readonly timezoneOffsetHours: number;
  readonly sasanaYearType: SasanaYearType;
};

export const DEFAULT_CONFIG: CalendarConfig = Object.freeze({
  calendarType: "british",
  gregorianStartJdn: DEFAULT_GREGORIAN_START,
  timezoneOffsetHours: MYANMAR_TIME_OFFSET,
  sasanaYearType: 0,
});

export const CONFIG_PRESETS = {
  myanmarTime: DEFAULT_CONFIG,
  ancientMyanmarTime: Object.freeze({ ...DEFAULT_CONFIG, timezoneOffsetHours: ANCIENT_MYANMAR_TIME_OFFSET }),
  utc: Object.freeze({ ...DEFAULT_CONFIG, timezoneOffsetHours: 0 }),
} satisfies Record<string, CalendarConfig>;

// ========== Validation ==========
export const CalendarConfigSchema = z
  .object({
    calendarType: z.enum(["british", "gregorian", "julian"]),
    gregorianStartJdn: z.number().int().min(MIN_JDN).max(MAX_JDN),
    timezoneOffsetHours: z.number().min(-14).max(14),
    sasanaYearType: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  })
  .strict();

const PartialConfigSchema = CalendarConfigSchema.partial();

/** Validate a raw (possibly partial) config object and fill in defaults. */
export function resolveConfig(raw: unknown = {}, base: CalendarConfig = DEFAULT_CONFIG): CalendarConfig {
  const parsed = PartialConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new InvalidConfigError("Invalid calendar config", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    });
  }
  const p = parsed.data;
  return Object.freeze({
    calendarType: p.calendarType ?? base.calendarType,
    gregorianStartJdn: p.gregorianStartJdn ?? base.gregorianStartJdn,
    timezoneOffsetHours: p.timezoneOffsetHours ?? base.timezoneOffsetHours,
    sasanaYearType: p.sasanaYearType ?? base.sasanaYearType,
  });
}

// ========== Time zones ==========
/** UTC offset (hours) of an IANA zone at the given instant (default: now). */
export function timezoneOffsetForZone(tzId: string, at?: Date | string | number): number {
  const instant = dayjs(at ?? Date.now());
  if (!instant.isValid()) {
    throw new InvalidConfigError(`Invalid instant for time zone lookup: ${String(at)}`, { tzId });
  }
  try {
    return instant.tz(tzId).utcOffset() / 60;
  } catch (e) {
    // Intl throws RangeError for unknown zones
    throw new InvalidConfigError(`Unknown time zone: ${tzId}`, {
      tzId,
      cause: e instanceof Error ? e.message : String(e),
    });
  }
}

export function localToUtc(jdn: number, config: CalendarConfig): number {
  return jdn - config.timezoneOffsetHours / 24;
}

export function utcToLocal(jdn: number, config: CalendarConfig): number {
  return jdn + config.timezoneOffsetHours / 24;
}
