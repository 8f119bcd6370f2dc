import { KeyedLock } from "../../src/lib/keyedLock";
import { BookingCoordinator } from "../../src/services/appointments/booking";
import { createSchedulingContext } from "../../src/services/appointments/context";
import {
  createInMemoryStores,
  InMemoryAppointmentStore,
  InMemorySchedulingStores,
} from "../../src/services/appointments/memoryStores";
import type { SchedulingContext } from "../../src/services/appointments/stores";
import type {
  AvailabilityRule,
  RecurringAvailabilityRule,
  Service,
  Therapist,
} from "../../src/services/appointments/types";

/** Monday 2 November 2026; "now" in tests is two weeks earlier. */
export const MONDAY = "2026-11-02";
export const TUESDAY = "2026-11-03";
export const NOW = new Date("2026-10-19T08:00:00.000Z");

export const SWEDISH_60: Service = { id: "svc-60", name: "Swedish massage", durationMin: 60, isActive: true };
export const DEEP_90: Service = { id: "svc-90", name: "Deep tissue massage", durationMin: 90, isActive: true };
export const RETIRED_45: Service = { id: "svc-retired", name: "Retired ritual", durationMin: 45, isActive: false };

export const ROBIN: Therapist = {
  id: "thr-robin",
  firstName: "Robin",
  lastName: "Hale",
  isActive: true,
  serviceIds: [SWEDISH_60.id, DEEP_90.id, RETIRED_45.id],
};

export const CASEY: Therapist = {
  id: "thr-casey",
  firstName: "Casey",
  lastName: "Lund",
  isActive: true,
  serviceIds: [SWEDISH_60.id],
};

export function recurringRule(
  therapistId: string,
  weekday: number,
  overrides: Partial<RecurringAvailabilityRule> = {}
): RecurringAvailabilityRule {
  return {
    kind: "recurring",
    id: `rule-${therapistId}-${weekday}`,
    therapistId,
    weekday,
    isAvailable: true,
    startTime: "09:00",
    endTime: "17:00",
    breakStartTime: "12:00",
    breakEndTime: "13:00",
    ...overrides,
  };
}

/** `at("2026-11-02", "09:00")` in UTC, the zone most tests run in. */
export function at(date: string, time: string): Date {
  return new Date(`${date}T${time}:00.000Z`);
}

export function iso(date: string, time: string): string {
  return at(date, time).toISOString();
}

export type TestSchedulingOptions = {
  rules?: AvailabilityRule[];
  therapists?: Therapist[];
  services?: Service[];
  appointments?: InMemoryAppointmentStore;
  timezone?: string;
  stepMin?: number | null;
  maxRangeDays?: number;
  lockTimeoutMs?: number;
  maxRetries?: number;
  now?: () => Date;
  lock?: KeyedLock;
};

export type TestScheduling = {
  ctx: SchedulingContext;
  stores: InMemorySchedulingStores;
  booking: BookingCoordinator;
};

export function buildScheduling(options: TestSchedulingOptions = {}): TestScheduling {
  const stores = createInMemoryStores({
    therapists: options.therapists ?? [ROBIN, CASEY],
    services: options.services ?? [SWEDISH_60, DEEP_90, RETIRED_45],
    rules: options.rules ?? [recurringRule(ROBIN.id, 1)],
  });

  if (options.appointments) {
    stores.appointments = options.appointments;
  }

  const ctx = createSchedulingContext(
    stores,
    {
      timezone: options.timezone ?? "UTC",
      slotStepMin: options.stepMin ?? null,
      maxRangeDays: options.maxRangeDays ?? 31,
      lockTimeoutMs: options.lockTimeoutMs ?? 500,
      maxRetries: options.maxRetries ?? 3,
    },
    options.now ?? (() => NOW)
  );

  return { ctx, stores, booking: new BookingCoordinator(ctx, options.lock) };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });

  return { promise, resolve };
}
