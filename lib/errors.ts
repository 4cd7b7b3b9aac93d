// /lib/errors.ts
// Every failure the engine reports is a CalendarError carrying a serialisable dto,
// so the HTTP layer (and any cache in front of the engine) can pass it on unchanged.

export const CALENDAR_ERROR = {
  INVALID_DATE: "E_INVALID_DATE",
  INVALID_MYANMAR_DATE: "E_INVALID_MYANMAR_DATE",
  JDN_RANGE: "E_JDN_RANGE",
  ERA_TABLE: "E_ERA_TABLE",
  CONFIG: "E_CONFIG",
  VALIDATION: "E_VALIDATION",
  INTERNAL: "E_INTERNAL",
} as const;

export type CalendarErrorCode = (typeof CALENDAR_ERROR)[keyof typeof CALENDAR_ERROR];

export type CalendarErrorDto = {
  code: CalendarErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export class CalendarError extends Error {
  readonly dto: CalendarErrorDto;

  constructor(dto: CalendarErrorDto) {
    super(dto.message);
    this.name = "CalendarError";
    this.dto = dto;
  }

  get code(): CalendarErrorCode {
    return this.dto.code;
  }
}

/** A Western date or time component is out of range. */
export class InvalidDateError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: CALENDAR_ERROR.INVALID_DATE, message, details });
    this.name = "InvalidDateError";
  }
}

/** A Myanmar year, month or day is out of range. Impossible combinations are not detected here. */
export class InvalidMyanmarDateError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: CALENDAR_ERROR.INVALID_MYANMAR_DATE, message, details });
    this.name = "InvalidMyanmarDateError";
  }
}

export class OutOfSupportedJdnRangeError extends CalendarError {
  constructor(julianDayNumber: number, min: number, max: number) {
    super({
      code: CALENDAR_ERROR.JDN_RANGE,
      message: `Julian Day Number ${julianDayNumber} is outside the supported range [${min}, ${max}]`,
      details: { julianDayNumber, min, max },
    });
    this.name = "OutOfSupportedJdnRangeError";
  }
}

/** The era table is misconfigured. Never caused by user input. */
export class EraTableLookupFailure extends CalendarError {
  constructor(myanmarYear: number) {
    super({
      code: CALENDAR_ERROR.ERA_TABLE,
      message: `No era constants available for Myanmar year ${myanmarYear}`,
      details: { myanmarYear },
    });
    this.name = "EraTableLookupFailure";
  }
}

export class InvalidConfigError extends CalendarError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: CALENDAR_ERROR.CONFIG, message, details });
    this.name = "InvalidConfigError";
  }
}

const CODES: ReadonlySet<string> = new Set(Object.values(CALENDAR_ERROR));

function isErrorDto(v: unknown): v is CalendarErrorDto {
  if (typeof v !== "object" || v === null) return false;
  if (!("code" in v) || !("message" in v)) return false;
  return typeof v.code === "string" && CODES.has(v.code) && typeof v.message === "string";
}

export function isCalendarError(e: unknown): e is CalendarError {
  if (e instanceof CalendarError) return true;
  // errors crossing a realm (worker, vm) lose their prototype but keep the dto
  return e instanceof Error && "dto" in e && isErrorDto(e.dto);
}

export function toErrorDto(e: unknown, fallback: CalendarErrorDto): CalendarErrorDto {
  if (isCalendarError(e)) return e.dto;
  const cause = e instanceof Error ? e.message : String(e ?? "unknown error");
  return { ...fallback, details: { ...(fallback.details ?? {}), cause } };
}
