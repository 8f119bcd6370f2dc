import { DateTime, IANAZone } from "luxon";

export const DEFAULT_BUSINESS_TIMEZONE = "Europe/Brussels";

const hhmmRegex = /^([01]\d|2[0-3]):([0-5]\d)$/;
const isoDateRegex = /^\d{4}-\d{2}-\d{2}$/;

export type TimeInterval = {
  startMs: number;
  endMs: number;
};

/** Calendar dates `[from, to)` in `yyyy-MM-dd`, read in the business timezone. */
export type DateRange = {
  from: string;
  to: string;
};

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

export function parseHHmm(value: string): { hour: number; minute: number } {
  const match = hhmmRegex.exec(value);

  if (!match) {
    throw new Error(`Invalid time format: ${value}`);
  }

  return {
    hour: Number(match[1]),
    minute: Number(match[2]),
  };
}

/** Strict `yyyy-MM-dd` parse; rejects dates luxon would roll over (2026-02-30). */
export function parseIsoDate(dateIso: string, zone: string): DateTime | null {
  if (!isoDateRegex.test(dateIso)) {
    return null;
  }

  const date = DateTime.fromISO(dateIso, { zone });
  if (!date.isValid || date.toFormat("yyyy-MM-dd") !== dateIso) {
    return null;
  }

  return date.startOf("day");
}

export function buildDateTimeForDay(dateIso: string, time: string, zone: string): DateTime {
  const date = parseIsoDate(dateIso, zone);

  if (!date) {
    throw new Error(`Invalid date: ${dateIso}`);
  }

  const { hour, minute } = parseHHmm(time);
  const datetime = date.set({ hour, minute, second: 0, millisecond: 0 });

  if (!datetime.isValid) {
    throw new Error(`Invalid datetime from date=${dateIso}, time=${time}`);
  }

  return datetime;
}

export function buildIntervalForDay(
  dateIso: string,
  startTime: string,
  endTime: string,
  zone: string
): TimeInterval | null {
  const start = buildDateTimeForDay(dateIso, startTime, zone);
  const end = buildDateTimeForDay(dateIso, endTime, zone);

  if (end <= start) {
    return null;
  }

  return {
    startMs: start.toUTC().toMillis(),
    endMs: end.toUTC().toMillis(),
  };
}

// luxon weekdays run 1 (Monday) .. 7 (Sunday); rules store 0 (Sunday) .. 6.
export function weekdayOf(date: DateTime): number {
  return date.weekday % 7;
}

export function enumerateDates(range: DateRange, zone: string): string[] {
  const from = parseIsoDate(range.from, zone);
  const to = parseIsoDate(range.to, zone);

  if (!from || !to) {
    throw new Error(`Invalid date range: ${range.from}..${range.to}`);
  }

  const dates: string[] = [];
  for (let cursor = from; cursor < to; cursor = cursor.plus({ days: 1 })) {
    dates.push(cursor.toFormat("yyyy-MM-dd"));
  }

  return dates;
}

export function dateRangeToInterval(range: DateRange, zone: string): TimeInterval {
  const from = parseIsoDate(range.from, zone);
  const to = parseIsoDate(range.to, zone);

  if (!from || !to) {
    throw new Error(`Invalid date range: ${range.from}..${range.to}`);
  }

  return {
    startMs: from.toUTC().toMillis(),
    endMs: to.toUTC().toMillis(),
  };
}

export function intervalsOverlap(
  startA: number,
  endA: number,
  startB: number,
  endB: number
): boolean {
  return startA < endB && startB < endA;
}

export function clampInterval(interval: TimeInterval, bounds: TimeInterval): TimeInterval | null {
  const startMs = Math.max(interval.startMs, bounds.startMs);
  const endMs = Math.min(interval.endMs, bounds.endMs);

  return endMs > startMs ? { startMs, endMs } : null;
}

export function normalizeIntervals(intervals: TimeInterval[]): TimeInterval[] {
  const sorted = intervals
    .filter((interval) => interval.endMs > interval.startMs)
    .sort((a, b) => a.startMs - b.startMs);

  if (sorted.length === 0) {
    return [];
  }

  const merged: TimeInterval[] = [{ ...sorted[0] }];

  for (let index = 1; index < sorted.length; index += 1) {
    const current = sorted[index];
    const last = merged[merged.length - 1];

    if (current.startMs <= last.endMs) {
      last.endMs = Math.max(last.endMs, current.endMs);
      continue;
    }

    merged.push({ ...current });
  }

  return merged;
}

export function subtractIntervals(
  baseIntervals: TimeInterval[],
  blockedIntervals: TimeInterval[]
): TimeInterval[] {
  const result: TimeInterval[] = [];
  const mergedBlocked = normalizeIntervals(blockedIntervals);

  for (const base of normalizeIntervals(baseIntervals)) {
    let cursor = base.startMs;

    for (const blocked of mergedBlocked) {
      if (blocked.endMs <= cursor) {
        continue;
      }

      if (blocked.startMs >= base.endMs) {
        break;
      }

      if (blocked.startMs > cursor) {
        result.push({
          startMs: cursor,
          endMs: Math.min(blocked.startMs, base.endMs),
        });
      }

      cursor = Math.max(cursor, blocked.endMs);

      if (cursor >= base.endMs) {
        break;
      }
    }

    if (cursor < base.endMs) {
      result.push({ startMs: cursor, endMs: base.endMs });
    }
  }

  return result;
}
