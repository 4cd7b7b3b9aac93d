import { describe, expect, it, vi } from "vitest";
import { createHandler, type ConvertRequest, type ConvertResponse } from "../api/convert";
import { createLogger, memorySink, type LogSink } from "../lib/log";

function fakeRes() {
  const sent: { status?: number; body?: unknown } = {};
  const res: ConvertResponse = {
    status: vi.fn((code: number) => {
      sent.status = code;
      return res;
    }),
    json: vi.fn((body: unknown) => {
      sent.body = body;
      return res;
    }),
  };
  return { res, sent };
}

async function call(req: ConvertRequest, sink: LogSink = memorySink()) {
  const handler = createHandler(createLogger("api/convert", { sink }));
  const { res, sent } = fakeRes();
  await handler(req, res);
  return sent;
}

describe("api/convert", () => {
  it("only accepts POST", async () => {
    const sent = await call({ method: "GET", body: undefined });
    expect(sent).toEqual({
      status: 405,
      body: { ok: false, error: { code: "E_VALIDATION", message: "Method not allowed" } },
    });
  });

  it("rejects malformed bodies and logs the issues", async () => {
    const sink = memorySink();
    const sent = await call({ method: "POST", body: { kind: "western", dateISO: "2024/05/22" } }, sink);
    expect(sent).toEqual({
      status: 400,
      body: {
        ok: false,
        error: {
          code: "E_VALIDATION",
          message: "Invalid request body",
          details: { issues: ["dateISO: expected YYYY-MM-DD"] },
        },
      },
    });
    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]).toMatchObject({ level: "warn", message: "api/convert: invalid body" });
  });

  it("rejects a missing body and out-of-range config fields", async () => {
    expect((await call({ method: "POST", body: undefined })).status).toBe(400);
    const sent = await call({ method: "POST", body: { kind: "julian", julianDayNumber: 2460453, timezoneOffsetHours: 20 } });
    expect(sent.status).toBe(400);
    expect(sent.body).toMatchObject({ ok: false, error: { code: "E_VALIDATION" } });
  });

  it("converts a Western date in a named zone", async () => {
    const sent = await call({ method: "POST", body: { kind: "western", dateISO: "2024-05-22", tzId: "Asia/Yangon" } });
    expect(sent.status).toBe(200);
    expect(sent.body).toMatchObject({
      ok: true,
      data: {
        western: { year: 2024, month: 5, day: 22, hour: 12, minute: 0 },
        myanmar: { year: 1386, month: 2, day: 15, moonPhase: 1, sasanaYear: 2568 },
        yearInfo: { year: 1386, yearType: 0, watatError: false },
      },
    });
  });

  it("converts a Julian Day Number", async () => {
    const sent = await call({ method: "POST", body: { kind: "julian", julianDayNumber: 2460453, timezoneOffsetHours: 0 } });
    expect(sent.body).toMatchObject({
      ok: true,
      data: {
        julianDayNumber: 2460453,
        western: { year: 2024, month: 5, day: 22, hour: 12, weekday: 4 },
        myanmar: { year: 1386, month: 2, day: 15 },
      },
    });
  });

  it("converts a Myanmar date and logs the resolved JDN", async () => {
    const sink = memorySink();
    const sent = await call({ method: "POST", body: { kind: "myanmar", year: 1385, month: 4, day: 15, time: "08:15" } }, sink);
    expect(sent.status).toBe(200);
    expect(sent.body).toMatchObject({
      ok: true,
      data: {
        western: { year: 2023, month: 8, day: 1, hour: 8, minute: 15, second: 0 },
        myanmar: { year: 1385, month: 4, day: 15, yearType: 2 },
        yearInfo: { yearType: 2, firstDayJdn: 2460025, fullMoonJdn: 2460158 },
      },
    });
    expect(sink.entries.map((e) => e.message)).toEqual(["api/convert: myanmar date resolved"]);
  });

  it("returns calendar errors as 400 with their dto", async () => {
    const sink = memorySink();
    const sent = await call({ method: "POST", body: { kind: "julian", julianDayNumber: 6_000_000 } }, sink);
    expect(sent).toEqual({
      status: 400,
      body: {
        ok: false,
        error: {
          code: "E_JDN_RANGE",
          message: "Julian Day Number 6000000 is outside the supported range [1000000, 5000000]",
          details: { julianDayNumber: 6000000, min: 1000000, max: 5000000 },
        },
      },
    });
    expect(sink.entries[0]).toMatchObject({ level: "warn", message: "api/convert: conversion rejected" });
  });

  it("rejects impossible Western dates and unknown zones", async () => {
    const leap = await call({ method: "POST", body: { kind: "western", dateISO: "1900-02-29", calendarType: "gregorian" } });
    expect(leap.status).toBe(400);
    expect(leap.body).toMatchObject({ ok: false, error: { code: "E_INVALID_DATE" } });

    const zone = await call({ method: "POST", body: { kind: "western", dateISO: "2024-05-22", tzId: "Mars/Olympus_Mons" } });
    expect(zone.status).toBe(400);
    expect(zone.body).toMatchObject({ ok: false, error: { code: "E_CONFIG", message: "Unknown time zone: Mars/Olympus_Mons" } });
  });

  it("answers 500 on unexpected failures", async () => {
    const entries: string[] = [];
    const sink: LogSink = (entry) => {
      if (entry.level === "info") throw new Error("sink down");
      entries.push(`${entry.level} ${entry.message}`);
    };
    const sent = await call({ method: "POST", body: { kind: "myanmar", year: 1385, month: 4, day: 15 } }, sink);
    expect(sent).toEqual({
      status: 500,
      body: { ok: false, error: { code: "E_INTERNAL", message: "Conversion failed", details: { cause: "sink down" } } },
    });
    expect(entries).toEqual(["error api/convert: unexpected failure"]);
  });
});
