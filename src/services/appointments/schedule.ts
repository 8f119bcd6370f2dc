import { DateRange, dateRangeToInterval } from "../../lib/time";
import type { DayAvailability } from "../../lib/availability";
import { resolveTherapistAvailability, validateDateRange } from "./availability";
import { SchedulingError } from "./errors";
import type { SchedulingContext } from "./stores";
import type { Appointment } from "./types";

export async function getAppointment(ctx: SchedulingContext, appointmentId: string): Promise<Appointment> {
  const appointment = await ctx.stores.appointments.findById(appointmentId);
  if (!appointment) {
    throw new SchedulingError("NOT_FOUND", "Appointment not found");
  }

  return appointment;
}

/** Every appointment of the therapist touching the range, any status, by start time. */
export async function getTherapistSchedule(
  ctx: SchedulingContext,
  therapistId: string,
  range: DateRange
): Promise<Appointment[]> {
  const validRange = validateDateRange(ctx, range);

  const therapist = await ctx.stores.therapists.getTherapist(therapistId);
  if (!therapist) {
    throw new SchedulingError("NOT_FOUND", "Therapist not found");
  }

  return ctx.stores.appointments.listForTherapist(
    therapistId,
    dateRangeToInterval(validRange, ctx.settings.timezone)
  );
}

export async function getClientAppointments(ctx: SchedulingContext, clientId: string): Promise<Appointment[]> {
  return ctx.stores.appointments.listForClient(clientId);
}

/** Open intervals per day after overrides and breaks, before any appointment is taken out. */
export async function getTherapistAvailability(
  ctx: SchedulingContext,
  therapistId: string,
  range: DateRange
): Promise<DayAvailability[]> {
  return resolveTherapistAvailability(ctx, therapistId, validateDateRange(ctx, range));
}
