// /api/convert.ts
import type { VercelRequest } from '@vercel/node';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import tz from 'dayjs/plugin/timezone';
import { z } from 'zod';
import {
  CALENDAR_ERROR,
  CalendarConfigSchema,
  convertJulianDay,
  getMyanmarYearInfo,
  InvalidConfigError,
  isCalendarError,
  myanmarToJulian,
  resolveConfig,
  timezoneOffsetForZone,
  toErrorDto,
  westernToJulian,
  type CalendarConfig,
} from '../lib/calendarEngine';
import { createLogger, type Logger } from '../lib/log';

dayjs.extend(utc);
dayjs.extend(tz);

/**
 * Request body, one of:
 * { kind: 'western', dateISO: '2024-05-22', time: '18:30', tzId: 'Asia/Yangon' }
 * { kind: 'myanmar', year: 1386, month: 2, day: 15 }
 * { kind: 'julian',  julianDayNumber: 2460453 }
 * Every variant also takes the calendar config fields (calendarType,
 * gregorianStartJdn, timezoneOffsetHours, sasanaYearType).
 */

const ConfigFields = CalendarConfigSchema.partial().shape;
const zTime = z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, 'expected HH:mm or HH:mm:ss');

const BodySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('western'),
    dateISO: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
    time: zTime.optional(),
    tzId: z.string().min(1).optional(),
    ...ConfigFields,
  }),
  z.object({
    kind: z.literal('myanmar'),
    year: z.number().int(),
    month: z.number().int(),
    day: z.number().int(),
    time: zTime.optional(),
    tzId: z.string().min(1).optional(),
    ...ConfigFields,
  }),
  z.object({
    kind: z.literal('julian'),
    julianDayNumber: z.number(),
    tzId: z.string().min(1).optional(),
    ...ConfigFields,
  }),
]);

export type ConvertBody = z.infer<typeof BodySchema>;

// Narrow views of the Vercel request and response, so tests can pass plain objects
export type ConvertRequest = Pick<VercelRequest, 'method' | 'body'>;
export type ConvertResponse = {
  status: (statusCode: number) => ConvertResponse;
  json: (body: unknown) => ConvertResponse;
};

function parseTime(time: string | undefined): { hour: number; minute: number; second: number } {
  const [hour = 12, minute = 0, second = 0] = (time ?? '12:00').split(':').map(Number);
  return { hour, minute, second };
}

/** Offset of `tzId` at the local wall-clock moment being converted (DST aware). */
function zoneOffsetHours(tzId: string, localISO: string): number {
  try {
    return dayjs.tz(localISO, tzId).utcOffset() / 60;
  } catch (e) {
    throw new InvalidConfigError(`Unknown time zone: ${tzId}`, { tzId, cause: e instanceof Error ? e.message : String(e) });
  }
}

function configFor(body: ConvertBody, localISO: string | undefined): CalendarConfig {
  const { calendarType, gregorianStartJdn, timezoneOffsetHours, sasanaYearType } = body;
  const raw = { calendarType, gregorianStartJdn, timezoneOffsetHours, sasanaYearType };
  if (body.tzId) {
    raw.timezoneOffsetHours = localISO ? zoneOffsetHours(body.tzId, localISO) : timezoneOffsetForZone(body.tzId);
  }
  return resolveConfig(raw);
}

function toJulianDay(body: ConvertBody, log: Logger): { julianDayNumber: number; config: CalendarConfig } {
  switch (body.kind) {
    case 'western': {
      const t = parseTime(body.time);
      const [year, month, day] = body.dateISO.split('-').map(Number);
      const config = configFor(body, `${body.dateISO}T${body.time ?? '12:00'}`);
      return { julianDayNumber: westernToJulian({ year, month, day, ...t }, config), config };
    }
    case 'myanmar': {
      const t = parseTime(body.time);
      // Myanmar dates have no ISO form; the zone offset is taken at request time
      const config = configFor(body, undefined);
      const julianDayNumber = myanmarToJulian({ year: body.year, month: body.month, day: body.day, ...t }, config);
      log.info('myanmar date resolved', { year: body.year, month: body.month, day: body.day, julianDayNumber });
      return { julianDayNumber, config };
    }
    case 'julian':
      return { julianDayNumber: body.julianDayNumber, config: configFor(body, undefined) };
  }
}

export function createHandler(log: Logger = createLogger('api/convert')) {
  return async function handler(req: ConvertRequest, res: ConvertResponse) {
    if (req.method !== 'POST') {
      return res.status(405).json({ ok: false, error: { code: CALENDAR_ERROR.VALIDATION, message: 'Method not allowed' } });
    }

    const parsed = BodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      log.warn('invalid body', { issues });
      return res.status(400).json({
        ok: false,
        error: { code: CALENDAR_ERROR.VALIDATION, message: 'Invalid request body', details: { issues } },
      });
    }

    try {
      const { julianDayNumber, config } = toJulianDay(parsed.data, log);
      const converted = convertJulianDay(julianDayNumber, config);
      const yearInfo = getMyanmarYearInfo(converted.myanmar.year);
      if (yearInfo.watatError) {
        log.warn('inconsistent watat gap, year type is a best guess', { year: yearInfo.year, yearType: yearInfo.yearType });
      }
      return res.status(200).json({ ok: true, data: { ...converted, yearInfo } });
    } catch (e) {
      if (isCalendarError(e)) {
        log.warn('conversion rejected', { code: e.dto.code, message: e.dto.message });
        return res.status(400).json({ ok: false, error: e.dto });
      }
      const dto = toErrorDto(e, { code: CALENDAR_ERROR.INTERNAL, message: 'Conversion failed' });
      log.error('unexpected failure', { ...dto.details });
      return res.status(500).json({ ok: false, error: dto });
    }
  };
}

export default createHandler();
