// /lib/result.ts
import type { CalendarErrorDto } from "./errors";

export type Result<T> = { ok: true; value: T } | { ok: false; error: CalendarErrorDto };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: CalendarErrorDto): Result<T> {
  return { ok: false, error };
}

export function isOk<T>(r: Result<T>): r is { ok: true; value: T } {
  return r.ok;
}

export function isErr<T>(r: Result<T>): r is { ok: false; error: CalendarErrorDto } {
  return !r.ok;
}
