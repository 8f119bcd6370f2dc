import { Response } from "express";
import { z } from "zod";
import { BookingErrorKind, BookingResult, SchedulingError } from "../services/appointments/errors";
import { zodErrorToMessage } from "./validate";

const STATUS_BY_KIND: Record<BookingErrorKind, number> = {
  NOT_FOUND: 404,
  INVALID_REQUEST: 400,
  CONFLICT: 409,
  INVALID_STATE: 409,
  TRANSIENT: 503,
};

function statusForErrorKind(kind: BookingErrorKind): number {
  return STATUS_BY_KIND[kind];
}

function sendError(res: Response, kind: BookingErrorKind, message: string): void {
  if (kind === "TRANSIENT") {
    res.setHeader("Retry-After", "1");
  }

  res.status(statusForErrorKind(kind)).json({ error: message, errorKind: kind });
}

export function sendBookingResult(res: Response, result: BookingResult, successStatus = 200): void {
  if (result.success) {
    res.status(successStatus).json({ ok: true, appointmentId: result.appointmentId });
    return;
  }

  sendError(res, result.errorKind, result.message);
}

export function handleRouteError(res: Response, error: unknown, logTag: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: zodErrorToMessage(error), errorKind: "INVALID_REQUEST" });
    return;
  }

  if (error instanceof SchedulingError) {
    sendError(res, error.kind, error.message);
    return;
  }

  console.error(`[${logTag}]`, error);
  res.status(500).json({ error: "Internal server error" });
}
