import { describe, expect, it } from "vitest";
import { SchedulingError } from "../../src/services/appointments/errors";
import {
  getAppointment,
  getClientAppointments,
  getTherapistAvailability,
  getTherapistSchedule,
} from "../../src/services/appointments/schedule";
import { at, buildScheduling, CASEY, MONDAY, recurringRule, ROBIN, SWEDISH_60, TUESDAY } from "../helpers/fixtures";

const WEDNESDAY = "2026-11-04";

function bookAt(time: string, clientId: string, therapistId = ROBIN.id) {
  return {
    clientId,
    therapistId,
    serviceId: SWEDISH_60.id,
    startAt: at(MONDAY, time),
  };
}

describe("getClientAppointments", () => {
  it("lists the client's appointments of any status, latest first", async () => {
    const { ctx, booking } = buildScheduling({
      rules: [recurringRule(ROBIN.id, 1), recurringRule(CASEY.id, 1)],
    });
    await booking.book(bookAt("09:00", "client-1"));
    const cancelled = await booking.book(bookAt("14:00", "client-1", CASEY.id));
    await booking.book(bookAt("11:00", "client-2"));
    if (cancelled.success) {
      await booking.cancel(cancelled.appointmentId);
    }

    const appointments = await getClientAppointments(ctx, "client-1");

    expect(appointments.map((item) => [item.startsAt.toISOString(), item.therapistId, item.status])).toEqual([
      [at(MONDAY, "14:00").toISOString(), CASEY.id, "CANCELLED"],
      [at(MONDAY, "09:00").toISOString(), ROBIN.id, "SCHEDULED"],
    ]);
  });

  it("returns nothing for a client without appointments", async () => {
    const { ctx } = buildScheduling();

    expect(await getClientAppointments(ctx, "client-unknown")).toEqual([]);
  });
});

describe("getTherapistAvailability", () => {
  it("returns the open intervals of each day in the range", async () => {
    const { ctx } = buildScheduling();

    expect(await getTherapistAvailability(ctx, ROBIN.id, { from: MONDAY, to: WEDNESDAY })).toEqual([
      {
        date: MONDAY,
        source: "recurring",
        intervals: [
          { startMs: at(MONDAY, "09:00").getTime(), endMs: at(MONDAY, "12:00").getTime() },
          { startMs: at(MONDAY, "13:00").getTime(), endMs: at(MONDAY, "17:00").getTime() },
        ],
      },
      { date: TUESDAY, source: null, intervals: [] },
    ]);
  });

  it("validates the range and the therapist", async () => {
    const { ctx } = buildScheduling({ maxRangeDays: 7 });

    await expect(getTherapistAvailability(ctx, ROBIN.id, { from: MONDAY, to: "2026-11-30" })).rejects.toMatchObject({
      kind: "INVALID_REQUEST",
      message: "Date range cannot exceed 7 days",
    });
    await expect(getTherapistAvailability(ctx, "thr-missing", { from: MONDAY, to: TUESDAY })).rejects.toBeInstanceOf(
      SchedulingError
    );
  });
});

describe("getTherapistSchedule and getAppointment", () => {
  it("lists the therapist's day and reads one appointment", async () => {
    const { ctx, booking } = buildScheduling();
    const late = await booking.book(bookAt("15:00", "client-1"));
    await booking.book(bookAt("09:00", "client-2"));

    const schedule = await getTherapistSchedule(ctx, ROBIN.id, { from: MONDAY, to: TUESDAY });

    expect(schedule.map((item) => item.clientId)).toEqual(["client-2", "client-1"]);
    const lateId = late.success ? late.appointmentId : "";
    expect(await getAppointment(ctx, lateId)).toMatchObject({ startsAt: at(MONDAY, "15:00") });
    await expect(getAppointment(ctx, "apt-missing")).rejects.toMatchObject({
      kind: "NOT_FOUND",
      message: "Appointment not found",
    });
  });
});
