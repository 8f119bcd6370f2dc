import { DEFAULT_BUSINESS_TIMEZONE, isValidTimezone } from "./time";

export type AppConfig = {
  port: number;
  timezone: string;
  slotStepMin: number | null;
  maxRangeDays: number;
  lockTimeoutMs: number;
  maxRetries: number;
  corsOrigins: string[];
  seedDemoData: boolean;
};

const DEFAULT_PORT = 3000;
const DEFAULT_MAX_RANGE_DAYS = 31;
const DEFAULT_LOCK_TIMEOUT_MS = 2000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_CORS_ORIGINS = ["http://localhost:4200"];

function toBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }

  return fallback;
}

function toInteger(value: string | undefined, fallback: number, min: number): number {
  if (!value || value.trim().length === 0) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function toOptionalPositiveInteger(value: string | undefined): number | null {
  const parsed = toInteger(value, 0, 1);
  return parsed > 0 ? parsed : null;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timezone = env.BUSINESS_TIMEZONE?.trim() || DEFAULT_BUSINESS_TIMEZONE;

  if (!isValidTimezone(timezone)) {
    throw new Error(`Invalid BUSINESS_TIMEZONE: ${timezone}`);
  }

  return {
    port: toInteger(env.PORT, DEFAULT_PORT, 1),
    timezone,
    slotStepMin: toOptionalPositiveInteger(env.SLOT_STEP_MIN),
    maxRangeDays: toInteger(env.MAX_RANGE_DAYS, DEFAULT_MAX_RANGE_DAYS, 1),
    lockTimeoutMs: toInteger(env.BOOKING_LOCK_TIMEOUT_MS, DEFAULT_LOCK_TIMEOUT_MS, 1),
    maxRetries: toInteger(env.BOOKING_MAX_RETRIES, DEFAULT_MAX_RETRIES, 0),
    corsOrigins: toList(env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
    seedDemoData: toBoolean(env.SEED_DEMO_DATA, false),
  };
}
