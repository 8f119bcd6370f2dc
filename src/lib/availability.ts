import type {
  AvailabilityRule,
  OverrideAvailabilityRule,
  RecurringAvailabilityRule,
} from "../services/appointments/types";
import {
  buildIntervalForDay,
  clampInterval,
  DateRange,
  enumerateDates,
  parseIsoDate,
  subtractIntervals,
  TimeInterval,
  weekdayOf,
} from "./time";

export type DayAvailability = {
  date: string;
  /** Rule the day was resolved from, `null` when nothing applied. */
  source: AvailabilityRule["kind"] | null;
  intervals: TimeInterval[];
};

type RuleIndex = {
  overridesByDate: Map<string, OverrideAvailabilityRule>;
  recurringByWeekday: Map<number, RecurringAvailabilityRule>;
};

function indexRules(rules: AvailabilityRule[]): RuleIndex {
  const overridesByDate = new Map<string, OverrideAvailabilityRule>();
  const recurringByWeekday = new Map<number, RecurringAvailabilityRule>();

  for (const rule of rules) {
    if (rule.kind === "override") {
      if (overridesByDate.has(rule.date)) {
        throw new Error(`Duplicate availability override for therapist=${rule.therapistId} date=${rule.date}`);
      }
      overridesByDate.set(rule.date, rule);
      continue;
    }

    if (recurringByWeekday.has(rule.weekday)) {
      throw new Error(
        `Duplicate recurring availability for therapist=${rule.therapistId} weekday=${rule.weekday}`
      );
    }
    recurringByWeekday.set(rule.weekday, rule);
  }

  return { overridesByDate, recurringByWeekday };
}

/**
 * Work window minus break. A break reaching outside the window is clamped to
 * it; one lying wholly outside, or ending before it starts, is ignored.
 */
export function ruleToOpenIntervals(dateIso: string, rule: AvailabilityRule, zone: string): TimeInterval[] {
  if (!rule.isAvailable || !rule.startTime || !rule.endTime) {
    return [];
  }

  const work = buildIntervalForDay(dateIso, rule.startTime, rule.endTime, zone);
  if (!work) {
    return [];
  }

  if (!rule.breakStartTime || !rule.breakEndTime) {
    return [work];
  }

  const rawBreak = buildIntervalForDay(dateIso, rule.breakStartTime, rule.breakEndTime, zone);
  const breakInterval = rawBreak ? clampInterval(rawBreak, work) : null;

  return breakInterval ? subtractIntervals([work], [breakInterval]) : [work];
}

export function resolveDays(range: DateRange, rules: AvailabilityRule[], zone: string): DayAvailability[] {
  const { overridesByDate, recurringByWeekday } = indexRules(rules);

  return enumerateDates(range, zone).map((dateIso) => {
    const day = parseIsoDate(dateIso, zone);
    if (!day) {
      throw new Error(`Invalid date: ${dateIso}`);
    }

    const rule = overridesByDate.get(dateIso) ?? recurringByWeekday.get(weekdayOf(day)) ?? null;
    if (!rule) {
      return { date: dateIso, source: null, intervals: [] };
    }

    return {
      date: dateIso,
      source: rule.kind,
      intervals: ruleToOpenIntervals(dateIso, rule, zone),
    };
  });
}
