/**
 * Calendar day keys (YYYY-MM-DD).
 *
 * Day arithmetic runs on UTC midnight so adding days never lands on a
 * daylight-saving boundary. Only "now" is read in a real time zone.
 */

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const START_DATE_NOW = 'now';

function dayKeyToUtc(dayKey: string): Date {
  return new Date(`${dayKey}T00:00:00.000Z`);
}

function utcToDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * True when `value` is a well-formed key naming a real calendar day
 * (rejects 2024-02-30 and friends).
 */
export function isDayKey(value: string): boolean {
  if (!DAY_KEY_PATTERN.test(value)) return false;
  const date = dayKeyToUtc(value);
  return !isNaN(date.getTime()) && utcToDayKey(date) === value;
}

export function addDays(dayKey: string, days: number): string {
  const date = dayKeyToUtc(dayKey);
  return utcToDayKey(new Date(date.getTime() + days * MS_PER_DAY));
}

/**
 * Weekday index with Monday = 0 and Sunday = 6.
 */
export function weekdayIndex(dayKey: string): number {
  return (dayKeyToUtc(dayKey).getUTCDay() + 6) % 7;
}

/**
 * Calendar day of `instant` as seen in `timeZone`.
 */
export function toDayKey(instant: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const year = parts.find(part => part.type === 'year')?.value;
  const month = parts.find(part => part.type === 'month')?.value;
  const day = parts.find(part => part.type === 'day')?.value;
  if (!year || !month || !day) return '';
  return `${year}-${month}-${day}`;
}

/**
 * Resolve a configured start date to a day key.
 * Returns null when the value is neither "now" nor a valid day key, or when
 * the time zone is unknown.
 */
export function resolveStartDate(
  startDate: string,
  now: Date,
  timeZone: string
): string | null {
  if (startDate === START_DATE_NOW) {
    if (isNaN(now.getTime())) return null;
    try {
      const dayKey = toDayKey(now, timeZone);
      return isDayKey(dayKey) ? dayKey : null;
    } catch (error) {
      if (error instanceof RangeError) return null;
      throw error;
    }
  }
  return isDayKey(startDate) ? startDate : null;
}

const dateLabelFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: 'UTC',
  weekday: 'long',
  year: 'numeric',
  month: 'long',
  day: 'numeric',
});

/**
 * Long label such as "Thursday, February 15, 2024".
 */
export function formatDateLabel(dayKey: string): string {
  return dateLabelFormatter.format(dayKeyToUtc(dayKey));
}
