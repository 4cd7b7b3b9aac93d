// /lib/watat.ts
import { LUNAR_MONTH, MYANMAR_EPOCH, SOLAR_YEAR } from "./constants";
import { ERA_TABLE, lookupEra, type EraDefinition } from "./eraTable";

export type WatatCheck = {
  isWatat: boolean;
  /** JDN of the Waso full moon (second Waso in a watat year). */
  fullMoonJdn: number;
};

/** Floored modulo, result has the sign of `b`. */
export function mod(a: number, b: number): number {
  return a - b * Math.floor(a / b);
}

/**
 * Decide whether a Myanmar year is watat and locate its Waso full moon.
 *
 * Excess days `ed` are the solar year's overshoot of whole lunar months; the era's
 * NM keeps `ed` above the threshold `ta`. From the British era on (EI >= 2) a year is
 * watat when `ed` reaches `tw`; earlier eras follow the 19-year cycle. The era's
 * exception mask flips the result for years the historical calendars decided
 * otherwise.
 */
export function checkWatat(myanmarYear: number, table: ReadonlyArray<EraDefinition> = ERA_TABLE): WatatCheck {
  const era = lookupEra(myanmarYear, table);
  const drift = SOLAR_YEAR / 12 - LUNAR_MONTH;

  const ta = drift * (12 - era.numMonths);
  let ed = mod(SOLAR_YEAR * (myanmarYear + 3739), LUNAR_MONTH);
  if (ed < ta) ed += LUNAR_MONTH;

  const fullMoonJdn = Math.round(SOLAR_YEAR * myanmarYear + MYANMAR_EPOCH - ed + 4.5 * LUNAR_MONTH + era.watatOffset);

  let watat: number;
  if (era.eraIndex >= 2) {
    const tw = LUNAR_MONTH - drift * era.numMonths;
    watat = ed >= tw ? 1 : 0;
  } else {
    // 7 intercalations in 19 years
    watat = Math.floor(mod(myanmarYear * 7 + 2, 19) / 12);
  }
  watat ^= era.watatExceptionMask;

  return { isWatat: watat === 1, fullMoonJdn };
}
