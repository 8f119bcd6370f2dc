import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { SchedulingSeed } from "../services/appointments/memoryStores";
import { hhmmString, isoDateString, parseOrThrow } from "../lib/validate";

export const DEFAULT_SEED_PATH = path.resolve(__dirname, "../../data/seed.json");

const nullableTime = hhmmString.nullable();

const workingHoursShape = {
  id: z.string().min(1),
  therapistId: z.string().min(1),
  isAvailable: z.boolean(),
  startTime: nullableTime,
  endTime: nullableTime,
  breakStartTime: nullableTime,
  breakEndTime: nullableTime,
};

const ruleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("override"), date: isoDateString, ...workingHoursShape }),
  z.object({ kind: z.literal("recurring"), weekday: z.int().min(0).max(6), ...workingHoursShape }),
]);

const seedSchema = z.object({
  services: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().trim().min(1),
      durationMin: z.int().positive(),
      isActive: z.boolean(),
    })
  ),
  therapists: z.array(
    z.object({
      id: z.string().min(1),
      firstName: z.string().trim().min(1),
      lastName: z.string().trim(),
      isActive: z.boolean(),
      serviceIds: z.array(z.string().min(1)),
    })
  ),
  rules: z.array(ruleSchema),
});

export async function loadSeedData(filePath: string = DEFAULT_SEED_PATH): Promise<SchedulingSeed> {
  const raw = await readFile(filePath, "utf8");
  const seed = parseOrThrow(seedSchema, JSON.parse(raw));

  console.log(
    `[seed] loaded services=${seed.services.length} therapists=${seed.therapists.length} rules=${seed.rules.length}`
  );
  return seed;
}
