import { DateTime } from "luxon";
import { DayAvailability, resolveDays } from "../../lib/availability";
import { generateSlots } from "../../lib/slots";
import { DateRange, dateRangeToInterval, parseIsoDate } from "../../lib/time";
import { filterConflictingSlots } from "./conflicts";
import { SchedulingError } from "./errors";
import type { SchedulingContext } from "./stores";
import { AvailableSlot, Service, Therapist, therapistDisplayName } from "./types";

export type SlotSearch = {
  serviceId: string;
  therapistId?: string;
  from: string;
  to: string;
};

export type SlotCheckInput = {
  therapistId: string;
  startAt: Date;
  durationMin: number;
  excludeAppointmentId?: string;
};

/** FREE: bookable. OUTSIDE_HOURS: not a slot the therapist offers. TAKEN: overlaps an active appointment. */
export type SlotCheck = "FREE" | "OUTSIDE_HOURS" | "TAKEN";

export function stepFor(ctx: SchedulingContext, durationMin: number): number {
  return ctx.settings.stepMin ?? durationMin;
}

export function validateDateRange(ctx: SchedulingContext, range: DateRange): DateRange {
  const { timezone, maxRangeDays } = ctx.settings;
  const from = parseIsoDate(range.from, timezone);
  const to = parseIsoDate(range.to, timezone);

  if (!from || !to) {
    throw new SchedulingError("INVALID_REQUEST", "from and to must be valid YYYY-MM-DD dates");
  }

  if (to <= from) {
    throw new SchedulingError("INVALID_REQUEST", "from must be before to");
  }

  const days = Math.round(to.diff(from, "days").days);
  if (days > maxRangeDays) {
    throw new SchedulingError("INVALID_REQUEST", `Date range cannot exceed ${maxRangeDays} days`);
  }

  return { from: range.from, to: range.to };
}

async function getTherapistOrThrow(ctx: SchedulingContext, therapistId: string): Promise<Therapist> {
  const therapist = await ctx.stores.therapists.getTherapist(therapistId);
  if (!therapist) {
    throw new SchedulingError("NOT_FOUND", "Therapist not found");
  }

  return therapist;
}

export async function resolveTherapistAvailability(
  ctx: SchedulingContext,
  therapistId: string,
  range: DateRange
): Promise<DayAvailability[]> {
  await getTherapistOrThrow(ctx, therapistId);
  const rules = await ctx.stores.availability.getRules(therapistId, range);
  return resolveDays(range, rules, ctx.settings.timezone);
}

async function resolveSearchTherapists(
  ctx: SchedulingContext,
  service: Service,
  therapistId: string | undefined
): Promise<Therapist[]> {
  if (!therapistId) {
    const therapists = await ctx.stores.therapists.listForService(service.id);
    return therapists.filter((therapist) => therapist.isActive);
  }

  const therapist = await getTherapistOrThrow(ctx, therapistId);
  if (!therapist.isActive || !therapist.serviceIds.includes(service.id)) {
    throw new SchedulingError("INVALID_REQUEST", "Selected therapist cannot perform this service");
  }

  return [therapist];
}

export async function findAvailableSlots(
  ctx: SchedulingContext,
  search: SlotSearch
): Promise<AvailableSlot[]> {
  const range = validateDateRange(ctx, search);

  const service = await ctx.stores.services.getService(search.serviceId);
  if (!service) {
    throw new SchedulingError("NOT_FOUND", "Service not found");
  }
  if (!service.isActive) {
    throw new SchedulingError("INVALID_REQUEST", "Service is not active");
  }

  const therapists = await resolveSearchTherapists(ctx, service, search.therapistId);
  const window = dateRangeToInterval(range, ctx.settings.timezone);
  const nowMs = ctx.now().getTime();
  const stepMin = stepFor(ctx, service.durationMin);

  const perTherapist = await Promise.all(
    therapists.map(async (therapist) => {
      const days = await resolveTherapistAvailability(ctx, therapist.id, range);
      const candidates = generateSlots(
        days.flatMap((day) => day.intervals),
        service.durationMin,
        stepMin
      );
      const free = await filterConflictingSlots(ctx.stores.appointments, candidates, {
        therapistId: therapist.id,
        window,
      });
      const therapistName = therapistDisplayName(therapist);

      return free
        .filter((slot) => slot.startMs >= nowMs)
        .map(
          (slot): AvailableSlot => ({
            startAt: new Date(slot.startMs),
            endAt: new Date(slot.endMs),
            therapistId: therapist.id,
            therapistName,
            serviceId: service.id,
            durationMin: service.durationMin,
          })
        );
    })
  );

  return perTherapist.flat().sort((a, b) => {
    const byStart = a.startAt.getTime() - b.startAt.getTime();
    if (byStart !== 0) {
      return byStart;
    }

    return a.therapistName.localeCompare(b.therapistName);
  });
}

/**
 * Re-runs resolve, generate and conflict-check for one exact interval. The
 * write path calls this at commit time instead of trusting a listed slot.
 */
export async function checkSlot(ctx: SchedulingContext, input: SlotCheckInput): Promise<SlotCheck> {
  const { timezone } = ctx.settings;
  const startLocal = DateTime.fromJSDate(input.startAt, { zone: timezone });
  if (!startLocal.isValid) {
    return "OUTSIDE_HOURS";
  }

  const dayStart = startLocal.startOf("day");
  const range: DateRange = {
    from: dayStart.toFormat("yyyy-MM-dd"),
    to: dayStart.plus({ days: 1 }).toFormat("yyyy-MM-dd"),
  };

  const days = await resolveTherapistAvailability(ctx, input.therapistId, range);
  const startMs = input.startAt.getTime();
  let requested: { startMs: number; endMs: number } | null = null;

  for (const candidate of generateSlots(
    days.flatMap((day) => day.intervals),
    input.durationMin,
    stepFor(ctx, input.durationMin)
  )) {
    if (candidate.startMs === startMs) {
      requested = candidate;
      break;
    }
  }

  if (!requested) {
    return "OUTSIDE_HOURS";
  }

  const free = await filterConflictingSlots(ctx.stores.appointments, [requested], {
    therapistId: input.therapistId,
    window: requested,
    excludeAppointmentId: input.excludeAppointmentId,
  });

  return free.length > 0 ? "FREE" : "TAKEN";
}
