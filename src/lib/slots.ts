import type { TimeInterval } from "./time";

const MINUTE_MS = 60_000;

export type SlotCandidate = TimeInterval;

/**
 * Duration-aligned candidates inside each open interval. Starts are stepped
 * from the interval's own begin and a slot never runs past the interval end.
 * The returned iterable is lazy and can be walked any number of times.
 */
export function generateSlots(
  intervals: readonly TimeInterval[],
  durationMin: number,
  stepMin: number = durationMin
): Iterable<SlotCandidate> {
  if (!Number.isInteger(durationMin) || durationMin <= 0) {
    throw new RangeError(`durationMin must be a positive integer, got ${durationMin}`);
  }
  if (!Number.isInteger(stepMin) || stepMin <= 0) {
    throw new RangeError(`stepMin must be a positive integer, got ${stepMin}`);
  }

  const durationMs = durationMin * MINUTE_MS;
  const stepMs = stepMin * MINUTE_MS;
  const snapshot = intervals.map((interval) => ({ ...interval }));

  return {
    *[Symbol.iterator]() {
      for (const interval of snapshot) {
        for (let startMs = interval.startMs; startMs + durationMs <= interval.endMs; startMs += stepMs) {
          yield { startMs, endMs: startMs + durationMs };
        }
      }
    },
  };
}
