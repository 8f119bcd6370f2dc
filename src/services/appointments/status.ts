export const AppointmentStatus = {
  SCHEDULED: "SCHEDULED",
  COMPLETED: "COMPLETED",
  CANCELLED: "CANCELLED",
  NO_SHOW: "NO_SHOW",
} as const;

export type AppointmentStatus = (typeof AppointmentStatus)[keyof typeof AppointmentStatus];

/**
 * The only place legal status changes are listed. Anything not in here is
 * rejected, including a transition to the status the appointment already has.
 */
const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  [AppointmentStatus.SCHEDULED]: [
    AppointmentStatus.CANCELLED,
    AppointmentStatus.COMPLETED,
    AppointmentStatus.NO_SHOW,
  ],
  [AppointmentStatus.COMPLETED]: [],
  [AppointmentStatus.CANCELLED]: [],
  [AppointmentStatus.NO_SHOW]: [],
};

const STATUS_LABELS: Record<AppointmentStatus, string> = {
  [AppointmentStatus.SCHEDULED]: "scheduled",
  [AppointmentStatus.COMPLETED]: "completed",
  [AppointmentStatus.CANCELLED]: "cancelled",
  [AppointmentStatus.NO_SHOW]: "marked as no-show",
};

export type TransitionCheck = { allowed: true } | { allowed: false; message: string };

export function isTerminalStatus(status: AppointmentStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

// Cancelled rows free their interval; completed and no-show rows keep it.
export function blocksSchedule(status: AppointmentStatus): boolean {
  return status !== AppointmentStatus.CANCELLED;
}

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function checkTransition(from: AppointmentStatus, to: AppointmentStatus): TransitionCheck {
  if (canTransition(from, to)) {
    return { allowed: true };
  }

  if (isTerminalStatus(from)) {
    return { allowed: false, message: `Appointment is already ${STATUS_LABELS[from]}` };
  }

  return { allowed: false, message: `Cannot move appointment from ${from} to ${to}` };
}

export function checkReschedulable(status: AppointmentStatus): TransitionCheck {
  if (status === AppointmentStatus.SCHEDULED) {
    return { allowed: true };
  }

  return {
    allowed: false,
    message: `Only scheduled appointments can be rescheduled (appointment is ${STATUS_LABELS[status]})`,
  };
}
