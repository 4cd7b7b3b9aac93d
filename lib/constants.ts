// /lib/constants.ts
// Astronomical constants of the Myanmar calendar (Makaranta / Thandeikta reckoning)
// and the supported ranges of every date component.

// ========== Astronomy ==========
/** Solar year in days (1577917828 / 4320000). */
export const SOLAR_YEAR = 1577917828 / 4320000;
/** Synodic lunar month in days (1577917828 / 53433336). */
export const LUNAR_MONTH = 1577917828 / 53433336;
/** JDN of the beginning of Myanmar Era 0. */
export const MYANMAR_EPOCH = 1954168.050623;

// Waso full moon → Tagu 1
export const WASO_FULL_MOON_TO_TAGU = 102;
export const LUNAR_YEAR_DAYS = 354;
// at most 3 common years sit between two watat years
export const MAX_COMMON_YEAR_RUN = 3;

export const BUDDHIST_ERA_OFFSET = 1182;

// 1970-01-01T00:00Z
export const UNIX_EPOCH_JDN = 2440587.5;
export const MS_PER_DAY = 86400000;

// ========== Ranges ==========
export const MIN_JDN = 1000000;
export const MAX_JDN = 5000000;

export const MIN_WESTERN_YEAR = 1;
export const MAX_WESTERN_YEAR = 9999;

export const MIN_MYANMAR_YEAR = 1;
export const MAX_MYANMAR_YEAR = 9999;
export const MIN_MYANMAR_MONTH = 0;
export const MAX_MYANMAR_MONTH = 14;
export const MIN_MYANMAR_DAY = 1;
export const MAX_MYANMAR_DAY = 30;

// ========== Defaults ==========
/** 1752-09-14, the British adoption of the Gregorian calendar. */
export const DEFAULT_GREGORIAN_START = 2361222;
/** Myanmar Time, UTC+6:30. */
export const MYANMAR_TIME_OFFSET = 6.5;
/** Ancient Myanmar Time, UTC+6:24:47. */
export const ANCIENT_MYANMAR_TIME_OFFSET = 6.41306;
