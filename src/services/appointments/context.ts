import type { AppConfig } from "../../lib/config";
import type { SchedulingContext, SchedulingStores } from "./stores";

type SchedulingConfig = Pick<
  AppConfig,
  "timezone" | "slotStepMin" | "maxRangeDays" | "lockTimeoutMs" | "maxRetries"
>;

export function createSchedulingContext(
  stores: SchedulingStores,
  config: SchedulingConfig,
  now: () => Date = () => new Date()
): SchedulingContext {
  return {
    stores,
    settings: {
      timezone: config.timezone,
      stepMin: config.slotStepMin,
      maxRangeDays: config.maxRangeDays,
      lockTimeoutMs: config.lockTimeoutMs,
      maxRetries: config.maxRetries,
    },
    now,
  };
}
