import { roundToHundredths } from '@/utils/currency';

const MINUTES_PER_DAY = 24 * 60;

const CLOCK_TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parses a clock time (HH:MM or HH:MM:SS) into minutes since midnight.
 * Seconds are dropped, so 08:15:59 is 08:15.
 * @returns minutes since midnight, or null when the value is not a valid time
 */
export const parseClockTime = (value: string): number | null => {
  const match = CLOCK_TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, hourPart, minutePart, secondPart = '00'] = match;
  const hours = Number.parseInt(hourPart, 10);
  const minutes = Number.parseInt(minutePart, 10);
  const seconds = Number.parseInt(secondPart, 10);

  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return hours * 60 + minutes;
};

/**
 * Round hours to 2 decimal places.
 */
export const roundHours = (hours: number): number => roundToHundredths(hours);

/**
 * Hours between two clock times on the same work date.
 * A time out earlier than the time in is an overnight shift; equal times are zero.
 * @returns decimal hours rounded to 2 places, or null if either time is missing or invalid
 */
export const calculateHoursFromClockTimes = (
  timeIn: string | null | undefined,
  timeOut: string | null | undefined
): number | null => {
  if (!timeIn || !timeOut) return null;

  const start = parseClockTime(timeIn);
  const end = parseClockTime(timeOut);
  if (start === null || end === null) return null;

  let elapsed = end - start;
  if (elapsed < 0) {
    elapsed += MINUTES_PER_DAY;
  }

  return roundHours(elapsed / 60);
};

/**
 * Hours for an entry: an explicit hours_worked always wins over clock times.
 */
export const resolveHoursWorked = (entry: {
  hours_worked: number | null | undefined;
  time_in: string | null | undefined;
  time_out: string | null | undefined;
}): number | null => {
  if (entry.hours_worked !== null && entry.hours_worked !== undefined) {
    return entry.hours_worked;
  }
  return calculateHoursFromClockTimes(entry.time_in, entry.time_out);
};

