import type { SlotCandidate } from "../../lib/slots";
import { intervalsOverlap, TimeInterval } from "../../lib/time";
import type { AppointmentStore } from "./stores";

type ConflictQuery = {
  therapistId: string;
  window: TimeInterval;
  excludeAppointmentId?: string;
};

export function removeConflicts(
  candidates: Iterable<SlotCandidate>,
  busy: readonly TimeInterval[]
): SlotCandidate[] {
  const free: SlotCandidate[] = [];

  for (const candidate of candidates) {
    const hasConflict = busy.some((block) =>
      intervalsOverlap(candidate.startMs, candidate.endMs, block.startMs, block.endMs)
    );

    if (!hasConflict) {
      free.push(candidate);
    }
  }

  return free;
}

export async function filterConflictingSlots(
  appointments: AppointmentStore,
  candidates: Iterable<SlotCandidate>,
  query: ConflictQuery
): Promise<SlotCandidate[]> {
  const busy = await appointments.getActiveForTherapist(
    query.therapistId,
    query.window,
    query.excludeAppointmentId
  );

  return removeConflicts(candidates, busy);
}
