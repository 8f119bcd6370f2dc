import { KeyedLock, LockTimeoutError } from "../../lib/keyedLock";
import { checkSlot, SlotCheck } from "./availability";
import {
  AppointmentOverlapError,
  bookingFailed,
  BookingResult,
  bookingSucceeded,
  SchedulingError,
} from "./errors";
import { AppointmentStatus, checkReschedulable, checkTransition } from "./status";
import type { SchedulingContext } from "./stores";
import type { Appointment, Service } from "./types";

const MINUTE_MS = 60_000;

export type BookRequest = {
  clientId: string;
  therapistId: string;
  serviceId: string;
  startAt: Date;
  notes?: string | null;
};

type CommitOutcome = BookingResult | { retry: true };

function slotUnavailable(check: Exclude<SlotCheck, "FREE">): BookingResult {
  return check === "TAKEN"
    ? bookingFailed("CONFLICT", "Selected slot is no longer available")
    : bookingFailed("INVALID_REQUEST", "Requested time is not an available slot for this therapist");
}

function therapistBusy(): BookingResult {
  return bookingFailed("TRANSIENT", "Therapist schedule is busy, please retry");
}

// Lookups under the lock can still miss (a therapist removed meanwhile); the
// write path reports that as a result.
function failedLookup(error: unknown): BookingResult {
  if (error instanceof SchedulingError) {
    return bookingFailed(error.kind, error.message);
  }

  throw error;
}

function isValidDate(value: Date): boolean {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Write path. Every commit takes the therapist's lock, re-checks the exact
 * interval, then writes through a store that also enforces the overlap rule
 * and version compare-and-swap.
 */
export class BookingCoordinator {
  private readonly lock: KeyedLock;

  constructor(
    private readonly ctx: SchedulingContext,
    lock?: KeyedLock
  ) {
    this.lock = lock ?? new KeyedLock();
  }

  async book(request: BookRequest): Promise<BookingResult> {
    if (!isValidDate(request.startAt)) {
      return bookingFailed("INVALID_REQUEST", "startAt must be a valid datetime");
    }

    const service = await this.ctx.stores.services.getService(request.serviceId);
    if (!service) {
      return bookingFailed("NOT_FOUND", "Service not found");
    }
    if (!service.isActive) {
      return bookingFailed("INVALID_REQUEST", "Service is not active");
    }

    const therapist = await this.ctx.stores.therapists.getTherapist(request.therapistId);
    if (!therapist) {
      return bookingFailed("NOT_FOUND", "Therapist not found");
    }
    if (!therapist.isActive || !therapist.serviceIds.includes(service.id)) {
      return bookingFailed("INVALID_REQUEST", "Selected therapist cannot perform this service");
    }

    const pastCheck = this.rejectIfPast(request.startAt);
    if (pastCheck) {
      return pastCheck;
    }

    return this.insertGuarded(request, service, "booking.book");
  }

  /** New appointment for the same client, therapist and service at another time. */
  async rebook(previousAppointmentId: string, startAt: Date, notes?: string | null): Promise<BookingResult> {
    const previous = await this.ctx.stores.appointments.findById(previousAppointmentId);
    if (!previous) {
      return bookingFailed("NOT_FOUND", "Previous appointment not found");
    }

    return this.book({
      clientId: previous.clientId,
      therapistId: previous.therapistId,
      serviceId: previous.serviceId,
      startAt,
      notes: notes ?? previous.notes,
    });
  }

  /** In-place move; the appointment keeps its id, duration and SCHEDULED status. */
  async reschedule(appointmentId: string, newStartAt: Date): Promise<BookingResult> {
    if (!isValidDate(newStartAt)) {
      return bookingFailed("INVALID_REQUEST", "startAt must be a valid datetime");
    }

    const pastCheck = this.rejectIfPast(newStartAt);
    if (pastCheck) {
      return pastCheck;
    }

    return this.withAppointmentLock(appointmentId, "booking.reschedule", async (current) => {
      const reschedulable = checkReschedulable(current.status);
      if (!reschedulable.allowed) {
        return bookingFailed("INVALID_STATE", reschedulable.message);
      }

      const durationMin = Math.round((current.endsAt.getTime() - current.startsAt.getTime()) / MINUTE_MS);
      const slot = await checkSlot(this.ctx, {
        therapistId: current.therapistId,
        startAt: newStartAt,
        durationMin,
        excludeAppointmentId: current.id,
      });
      if (slot !== "FREE") {
        return slotUnavailable(slot);
      }

      try {
        const updated = await this.ctx.stores.appointments.updateTime(current.id, {
          expectedVersion: current.version,
          startsAt: newStartAt,
          endsAt: new Date(newStartAt.getTime() + durationMin * MINUTE_MS),
          changedAt: this.ctx.now(),
        });

        if (!updated) {
          return { retry: true };
        }

        console.log(
          `[booking.reschedule] moved appointmentId=${updated.id} from=${current.startsAt.toISOString()} to=${updated.startsAt.toISOString()}`
        );
        return bookingSucceeded(updated.id);
      } catch (error) {
        if (error instanceof AppointmentOverlapError) {
          return slotUnavailable("TAKEN");
        }
        throw error;
      }
    });
  }

  async cancel(appointmentId: string, reason?: string | null): Promise<BookingResult> {
    return this.transition(appointmentId, AppointmentStatus.CANCELLED, "booking.cancel", reason ?? null);
  }

  async complete(appointmentId: string): Promise<BookingResult> {
    return this.transition(appointmentId, AppointmentStatus.COMPLETED, "booking.complete");
  }

  async markNoShow(appointmentId: string): Promise<BookingResult> {
    return this.transition(appointmentId, AppointmentStatus.NO_SHOW, "booking.noShow");
  }

  private rejectIfPast(startAt: Date): BookingResult | null {
    if (startAt.getTime() <= this.ctx.now().getTime()) {
      return bookingFailed("INVALID_REQUEST", "startAt must be in the future");
    }

    return null;
  }

  private async transition(
    appointmentId: string,
    target: AppointmentStatus,
    logTag: string,
    cancellationReason: string | null = null
  ): Promise<BookingResult> {
    return this.withAppointmentLock(appointmentId, logTag, async (current) => {
      const check = checkTransition(current.status, target);
      if (!check.allowed) {
        return bookingFailed("INVALID_STATE", check.message);
      }

      const updated = await this.ctx.stores.appointments.updateStatus(current.id, {
        expectedVersion: current.version,
        status: target,
        cancellationReason,
        changedAt: this.ctx.now(),
      });

      if (!updated) {
        return { retry: true };
      }

      console.log(`[${logTag}] appointmentId=${updated.id} status=${current.status}->${updated.status}`);
      return bookingSucceeded(updated.id);
    });
  }

  private async insertGuarded(request: BookRequest, service: Service, logTag: string): Promise<BookingResult> {
    const startsAt = new Date(request.startAt);
    const endsAt = new Date(startsAt.getTime() + service.durationMin * MINUTE_MS);

    try {
      return await this.lock.run(request.therapistId, this.ctx.settings.lockTimeoutMs, async () => {
        const slot = await checkSlot(this.ctx, {
          therapistId: request.therapistId,
          startAt: startsAt,
          durationMin: service.durationMin,
        });
        if (slot !== "FREE") {
          return slotUnavailable(slot);
        }

        try {
          const created = await this.ctx.stores.appointments.insert({
            clientId: request.clientId,
            therapistId: request.therapistId,
            serviceId: service.id,
            startsAt,
            endsAt,
            notes: request.notes ?? null,
          });

          console.log(
            `[${logTag}] created appointmentId=${created.id} clientId=${created.clientId} therapistId=${created.therapistId} startsAt=${created.startsAt.toISOString()}`
          );
          return bookingSucceeded(created.id);
        } catch (error) {
          if (error instanceof AppointmentOverlapError) {
            return slotUnavailable("TAKEN");
          }
          throw error;
        }
      });
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        console.log(`[${logTag}] lock timeout therapistId=${request.therapistId} timeoutMs=${error.timeoutMs}`);
        return therapistBusy();
      }
      return failedLookup(error);
    }
  }

  /**
   * Loads the appointment, locks its therapist and re-reads it under the lock
   * before handing it to `apply`. A version miss is retried up to
   * `maxRetries` times, then surfaced as TRANSIENT.
   */
  private async withAppointmentLock(
    appointmentId: string,
    logTag: string,
    apply: (current: Appointment) => Promise<CommitOutcome>
  ): Promise<BookingResult> {
    const { appointments } = this.ctx.stores;
    const { lockTimeoutMs, maxRetries } = this.ctx.settings;

    const existing = await appointments.findById(appointmentId);
    if (!existing) {
      return bookingFailed("NOT_FOUND", "Appointment not found");
    }

    try {
      return await this.lock.run(existing.therapistId, lockTimeoutMs, async () => {
        for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
          const current = await appointments.findById(appointmentId);
          if (!current) {
            return bookingFailed("NOT_FOUND", "Appointment not found");
          }

          const outcome = await apply(current);
          if (!("retry" in outcome)) {
            return outcome;
          }

          console.log(`[${logTag}] version conflict appointmentId=${appointmentId} attempt=${attempt + 1}`);
        }

        return therapistBusy();
      });
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        console.log(`[${logTag}] lock timeout appointmentId=${appointmentId} timeoutMs=${error.timeoutMs}`);
        return therapistBusy();
      }
      return failedLookup(error);
    }
  }
}
