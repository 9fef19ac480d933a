/**
 * Wall-clock helpers for a configured IANA time zone
 */

function partsOf(
  timestamp: number,
  timeZone: string,
  options: Intl.DateTimeFormatOptions,
): Record<string, string> {
  const parts = new Intl.DateTimeFormat("en-US", { timeZone, ...options })
    .formatToParts(new Date(timestamp));
  const result: Record<string, string> = {};
  for (const part of parts) {
    result[part.type] = part.value;
  }
  return result;
}

/**
 * Hour of the day (0-23) in the time zone
 */
export function localHour(timestamp: number, timeZone: string): number {
  const { hour } = partsOf(timestamp, timeZone, {
    hour: "numeric",
    hourCycle: "h23",
  });
  return Number(hour);
}

/**
 * Time of day in fractional hours (0 <= h < 24) in the time zone
 */
export function localTimeOfDay(timestamp: number, timeZone: string): number {
  const { hour, minute } = partsOf(timestamp, timeZone, {
    hour: "numeric",
    minute: "numeric",
    hourCycle: "h23",
  });
  return Number(hour) + Number(minute) / 60;
}

/**
 * Month (1-12) in the time zone
 */
export function localMonth(timestamp: number, timeZone: string): number {
  return Number(partsOf(timestamp, timeZone, { month: "numeric" }).month);
}

/**
 * Calendar date in the time zone as YYYY-MM-DD
 */
export function localDateKey(timestamp: number, timeZone: string): string {
  const { year, month, day } = partsOf(timestamp, timeZone, {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return `${year}-${month}-${day}`;
}

/**
 * Short start time: "7:00PM" today, "5/15 7:00PM" on another day
 */
export function formatStartTime(
  startTime: number,
  now: number,
  timeZone: string,
): string {
  const parts = partsOf(startTime, timeZone, {
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "2-digit",
    hour12: true,
  });
  const time = `${parts.hour}:${parts.minute}${parts.dayPeriod}`;

  if (localDateKey(startTime, timeZone) === localDateKey(now, timeZone)) {
    return time;
  }
  return `${parts.month}/${parts.day} ${time}`;
}

/**
 * "3PM" style label for an hour of the day (0-23)
 */
export function formatHourLabel(hour: number): string {
  const normalized = ((hour % 24) + 24) % 24;
  const period = normalized < 12 ? "AM" : "PM";
  const display = normalized % 12 === 0 ? 12 : normalized % 12;
  return `${display}${period}`;
}
