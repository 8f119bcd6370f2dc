import express, { Express } from "express";
import cors from "cors";
import { createAdminAppointmentsRouter } from "./routes/adminAppointments.routes";
import { createPublicAppointmentsRouter } from "./routes/publicAppointments.routes";
import { createPublicSlotsRouter } from "./routes/publicSlots.routes";
import type { BookingCoordinator } from "./services/appointments/booking";
import type { SchedulingContext } from "./services/appointments/stores";

export type AppDependencies = {
  scheduling: SchedulingContext;
  booking: BookingCoordinator;
  corsOrigins: string[];
};

export function createApp({ scheduling, booking, corsOrigins }: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      credentials: true,
      origin(origin, callback) {
        if (!origin || corsOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        callback(new Error("Not allowed by CORS"));
      },
    })
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api", createPublicSlotsRouter(scheduling));
  app.use("/api", createPublicAppointmentsRouter(booking, scheduling));
  app.use("/api/admin", createAdminAppointmentsRouter(booking, scheduling));

  return app;
}
