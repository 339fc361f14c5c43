/**
 * Date and Time Utilities
 *
 * Pure functions for converting API timestamps into civil time.
 * Timezone rules come from the IANA database bundled with the runtime (Intl),
 * so daylight-saving transitions are resolved per instant.
 */

/**
 * Milliseconds in one minute
 */
export const MILLISECONDS_PER_MINUTE = 60 * 1000;

// Date and time with a mandatory UTC designator or ±HH:MM offset (upper-case T and Z only)
const ISO_INSTANT_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(?:Z|([+-])(\d{2}):(\d{2}))$/;

interface CivilTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function getCivilTimeParts(timestamp: number, timeZone: string): CivilTimeParts {
  const parts = getFormatter(timeZone).formatToParts(new Date(timestamp));
  const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((entry) => entry.type === type);
    return part ? Number(part.value) : NaN;
  };
  const civil: CivilTimeParts = {
    year: getPart('year'),
    month: getPart('month'),
    day: getPart('day'),
    hour: getPart('hour'),
    minute: getPart('minute'),
    second: getPart('second'),
  };
  if (Object.values(civil).some((value) => !Number.isFinite(value))) {
    throw new RangeError(`Cannot resolve civil time in ${timeZone} for ${timestamp}`);
  }
  return civil;
}

const pad = (value: number, length: number = 2): string => String(value).padStart(length, '0');

/**
 * Parse an ISO 8601 timestamp that states its own offset.
 * @param value - Candidate timestamp, e.g. "2024-01-01T00:00:00Z"
 * @returns Epoch milliseconds, or null when the value is not an unambiguous instant
 */
export function parseIsoInstant(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = ISO_INSTANT_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, sign, offsetHourText, offsetMinuteText] = match;

  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = secondText ? Number(secondText) : 0;
  const millis = fractionText ? Number(fractionText.padEnd(3, '0')) : 0;
  const offsetHours = offsetHourText ? Number(offsetHourText) : 0;
  const offsetMinutes = offsetMinuteText ? Number(offsetMinuteText) : 0;

  // Date.UTC rolls overflowing fields forward (Feb 30 -> Mar 1), so range-check first
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth
    || hour > 23 || minute > 59 || second > 59
    || offsetHours > 23 || offsetMinutes > 59) {
    return null;
  }

  const offset = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMinutes);
  return Date.UTC(year, month - 1, day, hour, minute, second, millis) - offset * MILLISECONDS_PER_MINUTE;
}

/**
 * UTC offset of a timezone at a given instant, in minutes east of UTC.
 */
export function getTimeZoneOffsetMinutes(timestamp: number, timeZone: string): number {
  const civil = getCivilTimeParts(timestamp, timeZone);
  const wholeSecond = timestamp - (((timestamp % 1000) + 1000) % 1000);
  const asUtc = Date.UTC(civil.year, civil.month - 1, civil.day, civil.hour, civil.minute, civil.second);
  return Math.round((asUtc - wholeSecond) / MILLISECONDS_PER_MINUTE);
}

/**
 * Format an instant as ISO 8601 in the civil time of a timezone,
 * e.g. "2024-03-31T03:30:00+02:00".
 * Milliseconds are only written when non-zero.
 */
export function formatInTimeZone(timestamp: number, timeZone: string): string {
  const civil = getCivilTimeParts(timestamp, timeZone);
  const offset = getTimeZoneOffsetMinutes(timestamp, timeZone);
  const millis = ((timestamp % 1000) + 1000) % 1000;

  const sign = offset < 0 ? '-' : '+';
  const absOffset = Math.abs(offset);
  const offsetText = `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`;
  const fraction = millis ? `.${pad(millis, 3)}` : '';

  return `${pad(civil.year, 4)}-${pad(civil.month)}-${pad(civil.day)}`
    + `T${pad(civil.hour)}:${pad(civil.minute)}:${pad(civil.second)}${fraction}${offsetText}`;
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in a timezone
 * @param now - Timestamp in milliseconds (defaults to Date.now())
 */
export function getDateKeyInTimeZone(timeZone: string, now: number = Date.now()): string {
  const civil = getCivilTimeParts(now, timeZone);
  return `${pad(civil.year, 4)}-${pad(civil.month)}-${pad(civil.day)}`;
}
