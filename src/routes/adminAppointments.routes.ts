import { Router } from "express";
import { z } from "zod";
import { handleRouteError, sendBookingResult } from "../lib/http";
import { isoDateString, parseOrThrow } from "../lib/validate";
import type { BookingCoordinator } from "../services/appointments/booking";
import { getTherapistAvailability, getTherapistSchedule } from "../services/appointments/schedule";
import type { SchedulingContext } from "../services/appointments/stores";
import { serializeAppointment } from "./publicAppointments.routes";

const dateRangeQuerySchema = z.object({
  from: isoDateString,
  to: isoDateString,
});

// Staff-facing; authentication is applied in front of this router by the host.
export function createAdminAppointmentsRouter(
  booking: BookingCoordinator,
  scheduling: SchedulingContext
): Router {
  const router = Router();

  router.get("/therapists/:therapistId/schedule", async (req, res) => {
    try {
      const query = parseOrThrow(dateRangeQuerySchema, req.query);
      const items = await getTherapistSchedule(scheduling, req.params.therapistId, query);

      res.json({
        therapistId: req.params.therapistId,
        from: query.from,
        to: query.to,
        appointments: items.map(serializeAppointment),
      });
    } catch (error) {
      handleRouteError(res, error, "adminAppointments.schedule");
    }
  });

  router.get("/therapists/:therapistId/availability", async (req, res) => {
    try {
      const query = parseOrThrow(dateRangeQuerySchema, req.query);
      const days = await getTherapistAvailability(scheduling, req.params.therapistId, query);

      res.json({
        therapistId: req.params.therapistId,
        from: query.from,
        to: query.to,
        days: days.map((day) => ({
          date: day.date,
          source: day.source,
          intervals: day.intervals.map((interval) => ({
            startAt: new Date(interval.startMs).toISOString(),
            endAt: new Date(interval.endMs).toISOString(),
          })),
        })),
      });
    } catch (error) {
      handleRouteError(res, error, "adminAppointments.availability");
    }
  });

  router.post("/appointments/:id/complete", async (req, res) => {
    try {
      const result = await booking.complete(req.params.id);
      sendBookingResult(res, result);
    } catch (error) {
      handleRouteError(res, error, "adminAppointments.complete");
    }
  });

  router.post("/appointments/:id/no-show", async (req, res) => {
    try {
      const result = await booking.markNoShow(req.params.id);
      sendBookingResult(res, result);
    } catch (error) {
      handleRouteError(res, error, "adminAppointments.noShow");
    }
  });

  return router;
}
