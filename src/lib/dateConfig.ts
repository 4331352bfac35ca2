/**
 * Week starts on Monday (1) for weekly hour rollups.
 * Sunday = 0, Monday = 1, Tuesday = 2, etc.
 */
export const WEEK_STARTS_ON = 1;

/** Storage and report format for calendar dates. */
export const DATE_FORMAT = 'yyyy-MM-dd';
