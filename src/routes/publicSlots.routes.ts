import { Router } from "express";
import { z } from "zod";
import { handleRouteError } from "../lib/http";
import { isoDateString, optionalString, parseOrThrow } from "../lib/validate";
import { findAvailableSlots } from "../services/appointments/availability";
import type { SchedulingContext } from "../services/appointments/stores";

const listSlotsQuerySchema = z.object({
  serviceId: z.string().min(1),
  therapistId: optionalString,
  from: isoDateString,
  to: isoDateString,
});

export function createPublicSlotsRouter(scheduling: SchedulingContext): Router {
  const router = Router();

  router.get("/slots", async (req, res) => {
    try {
      const query = parseOrThrow(listSlotsQuerySchema, req.query);
      const slots = await findAvailableSlots(scheduling, query);

      res.json({
        serviceId: query.serviceId,
        therapistId: query.therapistId ?? null,
        from: query.from,
        to: query.to,
        slots: slots.map((slot) => ({
          startAt: slot.startAt.toISOString(),
          endAt: slot.endAt.toISOString(),
          therapistId: slot.therapistId,
          therapistName: slot.therapistName,
          durationMin: slot.durationMin,
        })),
      });
    } catch (error) {
      handleRouteError(res, error, "publicSlots.list");
    }
  });

  return router;
}
