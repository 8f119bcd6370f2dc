export type BookingErrorKind =
  | "NOT_FOUND"
  | "INVALID_REQUEST"
  | "CONFLICT"
  | "INVALID_STATE"
  | "TRANSIENT";

export type BookingResult =
  | { success: true; appointmentId: string }
  | { success: false; errorKind: BookingErrorKind; message: string };

export function bookingSucceeded(appointmentId: string): BookingResult {
  return { success: true, appointmentId };
}

export function bookingFailed(errorKind: BookingErrorKind, message: string): BookingResult {
  return { success: false, errorKind, message };
}

/** Thrown by the read path; the write path returns a `BookingResult` instead. */
export class SchedulingError extends Error {
  constructor(
    public readonly kind: BookingErrorKind,
    message: string
  ) {
    super(message);
    this.name = "SchedulingError";
  }
}

/** Raised by an appointment store when a write would break the per-therapist exclusion rule. */
export class AppointmentOverlapError extends Error {
  constructor(
    public readonly therapistId: string,
    public readonly startsAt: Date,
    public readonly endsAt: Date
  ) {
    super(
      `Therapist ${therapistId} already has an active appointment overlapping ${startsAt.toISOString()}..${endsAt.toISOString()}`
    );
    this.name = "AppointmentOverlapError";
  }
}
