import type { AppointmentStatus } from "./status";

type WorkingHours = {
  isAvailable: boolean;
  startTime: string | null;
  endTime: string | null;
  breakStartTime: string | null;
  breakEndTime: string | null;
};

export type OverrideAvailabilityRule = WorkingHours & {
  kind: "override";
  id: string;
  therapistId: string;
  date: string;
};

export type RecurringAvailabilityRule = WorkingHours & {
  kind: "recurring";
  id: string;
  therapistId: string;
  /** 0 = Sunday .. 6 = Saturday */
  weekday: number;
};

export type AvailabilityRule = OverrideAvailabilityRule | RecurringAvailabilityRule;

export type Service = {
  id: string;
  name: string;
  durationMin: number;
  isActive: boolean;
};

export type Therapist = {
  id: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  serviceIds: string[];
};

export type Appointment = {
  id: string;
  clientId: string;
  therapistId: string;
  serviceId: string;
  startsAt: Date;
  endsAt: Date;
  status: AppointmentStatus;
  notes: string | null;
  cancellationReason: string | null;
  cancelledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  version: number;
};

export type NewAppointment = Pick<
  Appointment,
  "clientId" | "therapistId" | "serviceId" | "startsAt" | "endsAt" | "notes"
>;

export type AvailableSlot = {
  startAt: Date;
  endAt: Date;
  therapistId: string;
  therapistName: string;
  serviceId: string;
  durationMin: number;
};

export function therapistDisplayName(therapist: Pick<Therapist, "firstName" | "lastName">): string {
  return `${therapist.firstName} ${therapist.lastName}`.trim();
}
