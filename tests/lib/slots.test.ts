import { describe, expect, it } from "vitest";
import { generateSlots } from "../../src/lib/slots";
import { at, iso, MONDAY } from "../helpers/fixtures";

const workday = [
  { startMs: at(MONDAY, "09:00").getTime(), endMs: at(MONDAY, "12:00").getTime() },
  { startMs: at(MONDAY, "13:00").getTime(), endMs: at(MONDAY, "17:00").getTime() },
];

function starts(slots: Iterable<{ startMs: number }>): string[] {
  return [...slots].map((slot) => new Date(slot.startMs).toISOString());
}

describe("generateSlots", () => {
  it("steps by the duration when no step is given", () => {
    expect(starts(generateSlots(workday, 60))).toEqual([
      iso(MONDAY, "09:00"),
      iso(MONDAY, "10:00"),
      iso(MONDAY, "11:00"),
      iso(MONDAY, "13:00"),
      iso(MONDAY, "14:00"),
      iso(MONDAY, "15:00"),
      iso(MONDAY, "16:00"),
    ]);
  });

  it("uses a finer step and drops the partial fit at the end", () => {
    const morning = [{ startMs: at(MONDAY, "09:00").getTime(), endMs: at(MONDAY, "10:30").getTime() }];

    expect(starts(generateSlots(morning, 60, 15))).toEqual([
      iso(MONDAY, "09:00"),
      iso(MONDAY, "09:15"),
      iso(MONDAY, "09:30"),
    ]);
  });

  it("gives every slot exactly the service duration", () => {
    for (const slot of generateSlots(workday, 90, 30)) {
      expect(slot.endMs - slot.startMs).toBe(90 * 60_000);
    }
  });

  it("yields nothing when the duration does not fit", () => {
    const short = [{ startMs: at(MONDAY, "09:00").getTime(), endMs: at(MONDAY, "09:45").getTime() }];

    expect([...generateSlots(short, 60)]).toEqual([]);
  });

  it("can be iterated again with the same result", () => {
    const slots = generateSlots(workday, 60);

    expect([...slots]).toEqual([...slots]);
  });

  it("is unaffected by later changes to the input array", () => {
    const intervals = [{ ...workday[0] }];
    const slots = generateSlots(intervals, 60);
    intervals[0].endMs = intervals[0].startMs;

    expect(starts(slots)).toEqual([iso(MONDAY, "09:00"), iso(MONDAY, "10:00"), iso(MONDAY, "11:00")]);
  });

  it("produces candidates lazily", () => {
    const year = [{ startMs: 0, endMs: 365 * 24 * 60 * 60_000 }];
    const iterator = generateSlots(year, 1)[Symbol.iterator]();

    expect(iterator.next().value).toEqual({ startMs: 0, endMs: 60_000 });
    expect(iterator.next().value).toEqual({ startMs: 60_000, endMs: 120_000 });
  });

  it("rejects a non-positive duration or step", () => {
    expect(() => generateSlots(workday, 0)).toThrow(RangeError);
    expect(() => generateSlots(workday, 60, 0)).toThrow(RangeError);
  });
});
