import { ConfigError } from "../errors.js";
import type { TimeWindow } from "../types.js";

export interface TimeWindowOptions {
  startDate?: string;
  endDate?: string;
  startOfWeek: string;
  weeksBack: number;
  now?: Date;
  timezone?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAYS: Record<string, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6
};

export function defaultTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function parseWeekday(value: string): number {
  const day = WEEKDAYS[value.trim().toLowerCase()];
  if (day === undefined) {
    throw new ConfigError("InvalidWeekday", `Invalid value for -start_of_week: "${value}"`);
  }
  return day;
}

export function parseIsoDate(value: string): Date {
  const match = value.trim().match(ISO_DATE_PATTERN);
  if (!match) {
    throw new ConfigError("InvalidDate", `Invalid date "${value}". Expected YYYY-MM-DD.`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2026-02-30 over into March.
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    throw new ConfigError("InvalidDate", `Invalid date "${value}". Expected YYYY-MM-DD.`);
  }
  return parsed;
}

function createFormatter(timezone: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit"
    });
  } catch (error: unknown) {
    throw new ConfigError("InvalidTimezone", `Invalid timezone: "${timezone}"`, { cause: error });
  }
}

/** Milliseconds the zone is ahead of UTC at `instant`. */
export function timezoneOffsetMs(instant: Date, timezone: string): number {
  const parts = createFormatter(timezone).formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");

  const wallClockAsUtc = Date.UTC(
    read("year"),
    read("month") - 1,
    read("day"),
    read("hour"),
    read("minute"),
    read("second")
  );
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return wallClockAsUtc - wholeSeconds;
}

/** The instant at which the wall clock in `timezone` reads `wallClock` (an epoch read as UTC). */
function zonedInstant(wallClock: number, timezone: string): Date {
  const guess = wallClock - timezoneOffsetMs(new Date(wallClock), timezone);
  return new Date(wallClock - timezoneOffsetMs(new Date(guess), timezone));
}

/**
 * Bounds of the week `weeksBack` weeks before `now`, where weeks begin on
 * `firstDay` (0 = Sunday). The weekday is matched on the wall-clock date in
 * `timezone`, and the week starts at local midnight of that day.
 */
export function weekBounds(now: Date, weeksBack: number, firstDay: number, timezone: string): TimeWindow {
  if (!Number.isInteger(firstDay) || firstDay < 0 || firstDay > 6) {
    throw new ConfigError("InvalidWeekday", `Not a valid day: ${firstDay}`);
  }

  let wallClock = now.getTime() + timezoneOffsetMs(now, timezone) - weeksBack * 7 * DAY_MS;
  while (new Date(wallClock).getUTCDay() !== firstDay) {
    wallClock -= DAY_MS;
  }

  const start = zonedInstant(Math.floor(wallClock / DAY_MS) * DAY_MS, timezone);
  const end = new Date(start.getTime() + 7 * DAY_MS);
  return { start, end };
}

export function resolveTimeWindow(options: TimeWindowOptions): TimeWindow {
  if (options.startDate && options.endDate) {
    const start = parseIsoDate(options.startDate);
    const end = parseIsoDate(options.endDate);
    if (start.getTime() > end.getTime()) {
      throw new ConfigError("InvalidDate", "-start_date must not be later than -end_date");
    }
    return { start, end };
  }

  if (!Number.isInteger(options.weeksBack) || options.weeksBack < 0) {
    throw new ConfigError("InvalidOption", `-weeks_back must be a non-negative integer, got ${options.weeksBack}`);
  }

  const firstDay = parseWeekday(options.startOfWeek);
  return weekBounds(
    options.now ?? new Date(),
    options.weeksBack,
    firstDay,
    options.timezone ?? defaultTimezone()
  );
}

export function isWithinWindow(instant: Date, window: TimeWindow): boolean {
  const ts = instant.getTime();
  if (!Number.isFinite(ts)) {
    return false;
  }
  return ts >= window.start.getTime() && ts <= window.end.getTime();
}
