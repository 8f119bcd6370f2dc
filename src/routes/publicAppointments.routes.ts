import { DateTime } from "luxon";
import { Router } from "express";
import { z } from "zod";
import { handleRouteError, sendBookingResult } from "../lib/http";
import { optionalString, parseOrThrow } from "../lib/validate";
import type { BookingCoordinator } from "../services/appointments/booking";
import { getAppointment, getClientAppointments } from "../services/appointments/schedule";
import type { SchedulingContext } from "../services/appointments/stores";
import type { Appointment } from "../services/appointments/types";

const startAtSchema = z.string().datetime({ offset: true });
const notesSchema = optionalString.pipe(z.string().max(1000).optional());

const createAppointmentSchema = z.object({
  clientId: z.string().trim().min(1),
  therapistId: z.string().trim().min(1),
  serviceId: z.string().trim().min(1),
  startAt: startAtSchema,
  notes: notesSchema,
});

const rescheduleSchema = z.object({
  startAt: startAtSchema,
});

const cancelSchema = z.object({
  reason: optionalString.pipe(z.string().max(500).optional()),
});

const rebookSchema = z.object({
  startAt: startAtSchema,
  notes: notesSchema,
});

function toInstant(isoWithOffset: string): Date {
  return DateTime.fromISO(isoWithOffset, { setZone: true }).toUTC().toJSDate();
}

export function serializeAppointment(appointment: Appointment) {
  return {
    id: appointment.id,
    clientId: appointment.clientId,
    therapistId: appointment.therapistId,
    serviceId: appointment.serviceId,
    startAt: appointment.startsAt.toISOString(),
    endAt: appointment.endsAt.toISOString(),
    status: appointment.status,
    notes: appointment.notes,
    cancellationReason: appointment.cancellationReason,
    cancelledAt: appointment.cancelledAt ? appointment.cancelledAt.toISOString() : null,
  };
}

export function createPublicAppointmentsRouter(
  booking: BookingCoordinator,
  scheduling: SchedulingContext
): Router {
  const router = Router();

  router.post("/appointments", async (req, res) => {
    try {
      const payload = parseOrThrow(createAppointmentSchema, req.body);
      const result = await booking.book({
        clientId: payload.clientId,
        therapistId: payload.therapistId,
        serviceId: payload.serviceId,
        startAt: toInstant(payload.startAt),
        notes: payload.notes,
      });

      sendBookingResult(res, result, 201);
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.create");
    }
  });

  router.get("/appointments/:id", async (req, res) => {
    try {
      const appointment = await getAppointment(scheduling, req.params.id);
      res.json(serializeAppointment(appointment));
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.get");
    }
  });

  router.get("/clients/:clientId/appointments", async (req, res) => {
    try {
      const appointments = await getClientAppointments(scheduling, req.params.clientId);
      res.json({
        clientId: req.params.clientId,
        appointments: appointments.map(serializeAppointment),
      });
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.listForClient");
    }
  });

  router.post("/appointments/:id/reschedule", async (req, res) => {
    try {
      const payload = parseOrThrow(rescheduleSchema, req.body);
      const result = await booking.reschedule(req.params.id, toInstant(payload.startAt));
      sendBookingResult(res, result);
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.reschedule");
    }
  });

  router.post("/appointments/:id/cancel", async (req, res) => {
    try {
      const payload = parseOrThrow(cancelSchema, req.body ?? {});
      const result = await booking.cancel(req.params.id, payload.reason);
      sendBookingResult(res, result);
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.cancel");
    }
  });

  router.post("/appointments/:id/rebook", async (req, res) => {
    try {
      const payload = parseOrThrow(rebookSchema, req.body);
      const result = await booking.rebook(req.params.id, toInstant(payload.startAt), payload.notes);
      sendBookingResult(res, result, 201);
    } catch (error) {
      handleRouteError(res, error, "publicAppointments.rebook");
    }
  });

  return router;
}
