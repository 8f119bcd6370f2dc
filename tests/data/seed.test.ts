import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadSeedData } from "../../src/data/seed";
import { findAvailableSlots } from "../../src/services/appointments/availability";
import { createSchedulingContext } from "../../src/services/appointments/context";
import { createInMemoryStores } from "../../src/services/appointments/memoryStores";
import { NOW } from "../helpers/fixtures";

const settings = {
  timezone: "Europe/Brussels",
  slotStepMin: null,
  maxRangeDays: 31,
  lockTimeoutMs: 500,
  maxRetries: 3,
};

describe("loadSeedData", () => {
  it("loads the bundled demo data", async () => {
    const seed = await loadSeedData();

    expect(seed.services).toHaveLength(4);
    expect(seed.therapists.map((therapist) => therapist.id)).toEqual(["thr-alex", "thr-sam"]);
    expect(seed.rules).toHaveLength(7);
  });

  it("closes a therapist on an override date", async () => {
    const ctx = createSchedulingContext(createInMemoryStores(await loadSeedData()), settings, () => NOW);
    const search = { serviceId: "svc-swedish-60", therapistId: "thr-sam" };

    const holiday = await findAvailableSlots(ctx, { ...search, from: "2026-12-25", to: "2026-12-26" });
    const regularFriday = await findAvailableSlots(ctx, { ...search, from: "2026-12-18", to: "2026-12-19" });

    expect(holiday).toEqual([]);
    expect(regularFriday.map((slot) => slot.startAt.toISOString())).toEqual([
      "2026-12-18T07:00:00.000Z",
      "2026-12-18T08:00:00.000Z",
      "2026-12-18T09:00:00.000Z",
      "2026-12-18T11:30:00.000Z",
      "2026-12-18T12:30:00.000Z",
      "2026-12-18T13:30:00.000Z",
    ]);
  });

  it("rejects a file with an out-of-range weekday", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "seed-test-"));
    const file = path.join(dir, "seed.json");
    await writeFile(
      file,
      JSON.stringify({
        services: [],
        therapists: [],
        rules: [
          {
            kind: "recurring",
            id: "rule-1",
            therapistId: "thr-1",
            weekday: 7,
            isAvailable: true,
            startTime: "09:00",
            endTime: "17:00",
            breakStartTime: null,
            breakEndTime: null,
          },
        ],
      })
    );

    await expect(loadSeedData(file)).rejects.toBeInstanceOf(ZodError);
  });
});
