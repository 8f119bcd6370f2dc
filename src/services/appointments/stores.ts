import type { DateRange, TimeInterval } from "../../lib/time";
import type { AppointmentStatus } from "./status";
import type {
  Appointment,
  AvailabilityRule,
  NewAppointment,
  Service,
  Therapist,
} from "./types";

export interface AvailabilityStore {
  /** Overrides dated inside `range` plus every recurring rule of the therapist. */
  getRules(therapistId: string, range: DateRange): Promise<AvailabilityRule[]>;
}

export type StatusChange = {
  expectedVersion: number;
  status: AppointmentStatus;
  cancellationReason?: string | null;
  changedAt: Date;
};

export type TimeChange = {
  expectedVersion: number;
  startsAt: Date;
  endsAt: Date;
  changedAt: Date;
};

/**
 * `insert` and `updateTime` must reject, with `AppointmentOverlapError`, any
 * write that would leave two non-cancelled appointments of one therapist
 * overlapping. `updateStatus` and `updateTime` are compare-and-swap on
 * `version` and resolve to `null` when the row moved underneath the caller.
 */
export interface AppointmentStore {
  getActiveForTherapist(
    therapistId: string,
    window: TimeInterval,
    excludeAppointmentId?: string
  ): Promise<TimeInterval[]>;
  findById(id: string): Promise<Appointment | null>;
  listForTherapist(therapistId: string, window: TimeInterval): Promise<Appointment[]>;
  /** Every appointment of the client, any status, latest first. */
  listForClient(clientId: string): Promise<Appointment[]>;
  insert(appointment: NewAppointment): Promise<Appointment>;
  updateStatus(id: string, change: StatusChange): Promise<Appointment | null>;
  updateTime(id: string, change: TimeChange): Promise<Appointment | null>;
}

export interface ServiceCatalog {
  getService(serviceId: string): Promise<Service | null>;
}

export interface TherapistDirectory {
  getTherapist(therapistId: string): Promise<Therapist | null>;
  listForService(serviceId: string): Promise<Therapist[]>;
}

export type SchedulingStores = {
  availability: AvailabilityStore;
  appointments: AppointmentStore;
  services: ServiceCatalog;
  therapists: TherapistDirectory;
};

export type SchedulingSettings = {
  timezone: string;
  /** Slot step in minutes; `null` steps by the service duration. */
  stepMin: number | null;
  maxRangeDays: number;
  lockTimeoutMs: number;
  maxRetries: number;
};

export type SchedulingContext = {
  stores: SchedulingStores;
  settings: SchedulingSettings;
  now: () => Date;
};
